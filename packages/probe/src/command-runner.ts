import { spawnSync } from "node:child_process";

export const DEFAULT_PROBE_MAX_BUFFER_BYTES = 8 * 1024 * 1024;

export interface CommandResult {
  stdout: Buffer;
}

/**
 * Runs an external command to completion and hands back its raw stdout,
 * whatever the exit status. Throws only when the process could not be
 * started at all.
 */
export interface CommandRunner {
  run(command: string, args: string[]): CommandResult;
}

export function createSpawnCommandRunner(
  maxBuffer: number = DEFAULT_PROBE_MAX_BUFFER_BYTES
): CommandRunner {
  return {
    run: (command, args) => {
      const result = spawnSync(command, args, {
        windowsHide: true,
        maxBuffer,
        stdio: ["ignore", "pipe", "pipe"]
      });
      // ENOBUFS still leaves the captured prefix of stdout usable.
      if (result.error && errorCode(result.error) !== "ENOBUFS") {
        throw result.error;
      }
      return { stdout: result.stdout ?? Buffer.alloc(0) };
    }
  };
}

export const defaultCommandRunner: CommandRunner = createSpawnCommandRunner();

function errorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}
