import { asErrorMessage } from "@media-inspector/core";
import { analyzeFile, createSpawnCommandRunner } from "@media-inspector/probe";
import { loadInspectorConfig } from "./inspector-config";
import { createFileLogger } from "./logger";
import { InspectorSession } from "./session";
import { runTerminal } from "./terminal";

async function main(): Promise<void> {
  const config = loadInspectorConfig(process.env);
  const commandRunner = createSpawnCommandRunner(config.probeMaxBufferBytes);
  let session: InspectorSession | undefined;
  const logger = createFileLogger(config.logFile, {
    onWriteError: (error) => {
      session?.notify(`Logging disabled: ${asErrorMessage(error)}`);
    }
  });

  session = new InspectorSession({
    analyze: (filePath) => analyzeFile(filePath, { commandRunner, ffprobePath: config.ffprobePath }),
    notificationTtlMs: config.notificationTtlMs,
    logger
  });

  await runTerminal(session, { input: process.stdin, output: process.stdout }, logger);
}

main().then(
  () => {
    process.exit(0);
  },
  (error: unknown) => {
    process.stdout.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  }
);
