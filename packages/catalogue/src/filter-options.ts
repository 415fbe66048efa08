import { FilterField } from "@media-inspector/core";

export type FilterOptions = Readonly<Record<FilterField, ReadonlyArray<string>>>;

export const DEFAULT_FILTER_OPTIONS: FilterOptions = {
  container: ["mp4", "mov", "avi", "mkv", "jpg", "png"],
  codec: ["H.264", "H.265", "VP9", "AV1", "Hap", "DXV3"],
  resolution: ["1920x1080", "1280x720", "3840x2160", "2560x1440"],
  frameRate: ["24", "25", "30", "50", "60"],
  bitrate: ["1", "5", "10", "15", "20"]
};

/**
 * Next value when stepping through a field's options: none, first, ..., last,
 * none again. A value outside the list restarts at the first option.
 */
export function nextOptionValue(
  options: ReadonlyArray<string>,
  current: string | undefined
): string | undefined {
  if (options.length === 0) {
    return undefined;
  }
  if (current === undefined) {
    return options[0];
  }
  const index = options.indexOf(current);
  if (index < 0) {
    return options[0];
  }
  return options[index + 1];
}
