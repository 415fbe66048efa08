import { DEFAULT_FFPROBE_PATH, DEFAULT_PROBE_MAX_BUFFER_BYTES } from "@media-inspector/probe";

export const DEFAULT_NOTIFICATION_TTL_MS = 3000;

export interface InspectorConfig {
  ffprobePath: string;
  notificationTtlMs: number;
  probeMaxBufferBytes: number;
  logFile: string;
}

export function loadInspectorConfig(env: NodeJS.ProcessEnv): InspectorConfig {
  return {
    ffprobePath: env.FFPROBE_PATH?.trim() || DEFAULT_FFPROBE_PATH,
    notificationTtlMs: normalizePositiveInt(env.NOTIFICATION_TTL_MS, DEFAULT_NOTIFICATION_TTL_MS),
    probeMaxBufferBytes: normalizePositiveInt(
      env.PROBE_MAX_BUFFER_BYTES,
      DEFAULT_PROBE_MAX_BUFFER_BYTES
    ),
    logFile: env.INSPECTOR_LOG_FILE?.trim() ?? ""
  };
}

function normalizePositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(1, Math.floor(parsed));
}
