export type TimestampMs = number;

export const UNKNOWN = "Unknown";
export type Unknown = typeof UNKNOWN;

export const CODEC_LABELS = ["H.264", "H.265", "VP9", "AV1", "Hap", "MJPEG"] as const;
export const RESOLUTION_LABELS = ["1920x1080", "1280x720", "3840x2160"] as const;
export const FRAME_RATE_LABELS = ["25", "30", "24", "60"] as const;

export type CodecLabel = (typeof CODEC_LABELS)[number] | Unknown;
export type ResolutionLabel = (typeof RESOLUTION_LABELS)[number] | Unknown;
export type FrameRateLabel = (typeof FRAME_RATE_LABELS)[number] | Unknown;

/** Megabits per second with one fractional digit, e.g. "8.0". */
export type BitrateLabel = string;

/**
 * One analyzed file. Records are frozen when created and never change after
 * they enter a catalogue.
 */
export interface MediaRecord {
  readonly name: string;
  readonly container: string;
  readonly codec: CodecLabel;
  readonly resolution: ResolutionLabel;
  readonly frameRate: FrameRateLabel;
  readonly bitrate: BitrateLabel;
  readonly path: string;
  readonly rawOutput: string;
}

export type FilterField = "container" | "codec" | "resolution" | "frameRate" | "bitrate";

export const FILTER_FIELDS: ReadonlyArray<{ key: FilterField; label: string }> = [
  { key: "container", label: "Container" },
  { key: "codec", label: "Codec" },
  { key: "resolution", label: "Resolution" },
  { key: "frameRate", label: "Frame rate" },
  { key: "bitrate", label: "Bitrate" }
];

export interface FilterPredicate {
  readonly field: FilterField;
  readonly value: string;
}

export function filterFieldLabel(field: FilterField): string {
  return FILTER_FIELDS.find((item) => item.key === field)?.label ?? field;
}
