import {
  BitrateLabel,
  CodecLabel,
  FrameRateLabel,
  ResolutionLabel,
  UNKNOWN
} from "@media-inspector/core";

/**
 * A single entry of a priority-ordered rule table. Tables are evaluated top
 * to bottom and the first matching rule decides the label.
 */
export interface ExtractionRule<L extends string> {
  readonly label: L;
  readonly matches: (text: string) => boolean;
}

const containsAny =
  (...tokens: string[]) =>
  (text: string): boolean =>
    tokens.some((token) => text.includes(token));

const containsAll =
  (...tokens: string[]) =>
  (text: string): boolean =>
    tokens.every((token) => text.includes(token));

export const CODEC_RULES: ReadonlyArray<ExtractionRule<CodecLabel>> = [
  { label: "H.264", matches: containsAny("h264") },
  { label: "H.265", matches: containsAny("hevc", "h265") },
  { label: "VP9", matches: containsAny("vp9") },
  { label: "AV1", matches: containsAny("av01") },
  { label: "Hap", matches: containsAny("hap") },
  { label: "MJPEG", matches: containsAny("mjpeg") }
];

export const RESOLUTION_LINE_GUARD = containsAll("width", "height");

export const RESOLUTION_RULES: ReadonlyArray<ExtractionRule<ResolutionLabel>> = [
  { label: "1920x1080", matches: containsAll("1920", "1080") },
  { label: "1280x720", matches: containsAll("1280", "720") },
  { label: "3840x2160", matches: containsAll("3840", "2160") }
];

export const FRAME_RATE_RULES: ReadonlyArray<ExtractionRule<FrameRateLabel>> = [
  { label: "25", matches: containsAny("25/1", '"25"') },
  { label: "30", matches: containsAny("30/1", '"30"') },
  { label: "24", matches: containsAny("24/1", '"24"') },
  { label: "60", matches: containsAny("60/1", '"60"') }
];

export function firstMatch<L extends string>(
  rules: ReadonlyArray<ExtractionRule<L>>,
  text: string
): L | undefined {
  return rules.find((rule) => rule.matches(text))?.label;
}

export function extractCodec(output: string): CodecLabel {
  return firstMatch(CODEC_RULES, output) ?? UNKNOWN;
}

// Width and height only count when they share a line.
export function extractResolution(output: string): ResolutionLabel {
  for (const line of splitLines(output)) {
    if (!RESOLUTION_LINE_GUARD(line)) {
      continue;
    }
    const label = firstMatch(RESOLUTION_RULES, line);
    if (label) {
      return label;
    }
  }
  return UNKNOWN;
}

export function extractFrameRate(output: string): FrameRateLabel {
  return firstMatch(FRAME_RATE_RULES, output) ?? UNKNOWN;
}

export function extractBitrate(output: string): BitrateLabel {
  const line = splitLines(output).find(
    (candidate) => candidate.includes("bit_rate") && !candidate.includes("max_bit_rate")
  );
  if (line === undefined) {
    return UNKNOWN;
  }

  const colon = line.indexOf(":");
  if (colon < 0) {
    return UNKNOWN;
  }
  const comma = line.indexOf(",", colon);
  if (comma < 0) {
    return UNKNOWN;
  }

  const bitsPerSecond = parseDecimal(line.slice(colon + 1, comma).trim().replaceAll('"', ""));
  if (bitsPerSecond === undefined) {
    return UNKNOWN;
  }
  return formatMegabits(bitsPerSecond / 1_000_000);
}

/**
 * One fractional digit, always in positional notation. Exact ties round half
 * to even. In binary floating point a tie at the first decimal is only
 * possible for values ending in .25 or .75.
 */
export function formatMegabits(value: number): string {
  if (Math.abs(value) >= 1e21) {
    // Integral at this magnitude; toFixed would switch to exponent notation.
    return `${BigInt(value).toString()}.0`;
  }
  const isTie = Number.isInteger(value * 4) && !Number.isInteger(value * 2);
  if (!isTie) {
    return value.toFixed(1);
  }
  const lower = Math.floor(value * 10);
  const tenths = lower % 2 === 0 ? lower : lower + 1;
  return (tenths / 10).toFixed(1);
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseDecimal(text: string): number | undefined {
  if (!DECIMAL_PATTERN.test(text)) {
    return undefined;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

export function splitLines(text: string): string[] {
  const lines = text.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}
