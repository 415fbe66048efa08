import { existsSync } from "node:fs";
import path from "node:path";
import { MediaRecord } from "@media-inspector/core";
import { CommandRunner, defaultCommandRunner } from "./command-runner";
import { ExtractionError, PathNotFoundError, ProbeInvocationError } from "./errors";
import { extractBitrate, extractCodec, extractFrameRate, extractResolution } from "./rules";

export const DEFAULT_FFPROBE_PATH = "ffprobe";

export type AnalyzeResult =
  | { ok: true; record: MediaRecord }
  | { ok: false; error: ExtractionError };

export interface AnalyzeOptions {
  commandRunner?: CommandRunner;
  ffprobePath?: string;
  pathExists?: (filePath: string) => boolean;
}

export function buildProbeArgs(filePath: string): string[] {
  return ["-i", filePath, "-show_streams", "-show_format", "-hide_banner", "-of", "json"];
}

/**
 * Probes one file and turns the report into a record. The exit status of the
 * probe is ignored: whatever reached stdout is kept and scanned, so a partial
 * report still yields a record with "Unknown" in the fields it lacks.
 */
export function analyzeFile(filePath: string, options: AnalyzeOptions = {}): AnalyzeResult {
  const pathExists = options.pathExists ?? existsSync;
  if (!pathExists(filePath)) {
    return { ok: false, error: new PathNotFoundError(filePath) };
  }

  const command = options.ffprobePath ?? DEFAULT_FFPROBE_PATH;
  const commandRunner = options.commandRunner ?? defaultCommandRunner;

  let stdout: Buffer;
  try {
    stdout = commandRunner.run(command, buildProbeArgs(filePath)).stdout;
  } catch (error) {
    return { ok: false, error: new ProbeInvocationError(command, error) };
  }

  return { ok: true, record: extractMediaRecord(filePath, decodeLossy(stdout)) };
}

export function extractMediaRecord(filePath: string, rawOutput: string): MediaRecord {
  const { name, container } = describePath(filePath);
  return Object.freeze({
    name,
    container,
    codec: extractCodec(rawOutput),
    resolution: extractResolution(rawOutput),
    frameRate: extractFrameRate(rawOutput),
    bitrate: extractBitrate(rawOutput),
    path: filePath,
    rawOutput
  });
}

export function describePath(filePath: string): { name: string; container: string } {
  const ext = path.extname(filePath);
  return {
    name: path.basename(filePath, ext),
    container: ext.startsWith(".") ? ext.slice(1) : ext
  };
}

// Invalid UTF-8 sequences become U+FFFD instead of failing the analysis.
export function decodeLossy(bytes: Buffer): string {
  return bytes.toString("utf8");
}
