import { MediaRecord } from "@media-inspector/core";

export function makeRecord(overrides: Partial<MediaRecord> = {}): MediaRecord {
  return {
    name: "clip",
    container: "mp4",
    codec: "H.264",
    resolution: "1920x1080",
    frameRate: "25",
    bitrate: "8.0",
    path: "/media/clip.mp4",
    rawOutput: "",
    ...overrides
  };
}
