import { describe, expect, it } from "vitest";
import { MediaRecord } from "@media-inspector/core";
import {
  AnalyzeResult,
  PathNotFoundError,
  ProbeInvocationError,
  extractMediaRecord
} from "@media-inspector/probe";
import { KeyPress } from "../keys";
import { InspectorSession, STATUS_DEFAULTS } from "../session";
import { charKey, keyOf } from "./key-helpers";

const TTL = 3000;

function typeText(session: InspectorSession, text: string): void {
  for (const char of text) {
    session.handleKey(charKey(char));
  }
}

function press(session: InspectorSession, ...keys: KeyPress[]): void {
  for (const key of keys) {
    session.handleKey(key);
  }
}

function record(name: string, overrides: Partial<MediaRecord> = {}): MediaRecord {
  return { ...extractMediaRecord(`/media/${name}.mp4`, ""), ...overrides };
}

interface Harness {
  session: InspectorSession;
  clock: { now: number };
  analyzed: string[];
}

function createHarness(results: Record<string, AnalyzeResult> = {}): Harness {
  const clock = { now: 1_000 };
  const analyzed: string[] = [];
  const session = new InspectorSession({
    notificationTtlMs: TTL,
    now: () => clock.now,
    analyze: (filePath) => {
      analyzed.push(filePath);
      return results[filePath] ?? { ok: false, error: new PathNotFoundError(filePath) };
    }
  });
  return { session, clock, analyzed };
}

function seeded(records: MediaRecord[]): Harness {
  const results: Record<string, AnalyzeResult> = {};
  for (const item of records) {
    results[item.path] = { ok: true, record: item };
  }
  const harness = createHarness(results);
  for (const item of records) {
    harness.session.addFile(item.path);
  }
  return harness;
}

describe("InspectorSession modes", () => {
  it("starts browsing and routes mode keys", () => {
    const { session } = createHarness();

    expect(session.mode.kind).toBe("browsing");

    press(session, charKey("h"));
    expect(session.mode.kind).toBe("viewing-help");
    press(session, charKey("q"));
    expect(session.mode.kind).toBe("viewing-help");
    press(session, keyOf("escape"));
    expect(session.mode.kind).toBe("browsing");

    press(session, charKey("r"));
    expect(session.mode).toEqual({ kind: "viewing-raw-output", scroll: 0 });
    press(session, keyOf("escape"));

    press(session, charKey("a"));
    expect(session.mode.kind).toBe("adding-file");
  });

  it("quits only from browsing", () => {
    const { session } = createHarness();

    expect(session.handleKey(charKey("q"))).toBe("quit");
    expect(session.handleKey(keyOf("c", { ctrl: true }))).toBe("quit");

    session.handleKey(charKey("a"));
    expect(session.handleKey(charKey("q"))).toBe("continue");
    expect(session.mode.kind).toBe("adding-file");
  });

  it("cycles the tab index modulo three", () => {
    const { session } = createHarness();

    press(session, keyOf("tab"), keyOf("tab"));
    expect(session.tabIndex).toBe(2);
    press(session, keyOf("tab"));
    expect(session.tabIndex).toBe(0);
  });
});

describe("InspectorSession adding files", () => {
  it("analyzes the typed path and reports the duration", () => {
    const clip = record("clip");
    const clock = { now: 2_000 };
    const analyzed: string[] = [];
    const session = new InspectorSession({
      notificationTtlMs: TTL,
      now: () => clock.now,
      analyze: (filePath) => {
        analyzed.push(filePath);
        clock.now += 1_234;
        return { ok: true, record: clip };
      }
    });

    press(session, charKey("a"));
    typeText(session, "/media/clip.mp4");
    press(session, keyOf("return"));

    expect(analyzed).toEqual(["/media/clip.mp4"]);
    expect(session.mode.kind).toBe("browsing");
    expect(session.records()).toEqual([clip]);
    expect(session.lastScan).toEqual({ startedAt: 2_000, durationMs: 1_234, path: "/media/clip.mp4" });
    expect(session.currentNotification(clock.now)).toBe("File analyzed in 1.23s");
  });

  it("uses two-decimal seconds in the success notification", () => {
    const clip = record("clip");
    const { session, clock } = createHarness({ "/media/clip.mp4": { ok: true, record: clip } });

    session.addFile("/media/clip.mp4");

    expect(session.currentNotification(clock.now)).toBe("File analyzed in 0.00s");
  });

  it("turns a missing path into a notification and keeps the catalogue", () => {
    const kept = record("kept");
    const { session, clock } = createHarness({ "/media/kept.mp4": { ok: true, record: kept } });
    session.addFile("/media/kept.mp4");
    const before = session.records().length;

    press(session, charKey("a"));
    typeText(session, "/nope.mov");
    press(session, keyOf("return"));

    expect(session.records()).toHaveLength(before);
    expect(session.mode.kind).toBe("browsing");
    expect(session.statusText(clock.now)).toBe("File does not exist");
  });

  it("reports ffprobe launch failures", () => {
    const { session, clock } = createHarness({
      "/media/a.mp4": {
        ok: false,
        error: new ProbeInvocationError("ffprobe", new Error("spawnSync ffprobe ENOENT"))
      }
    });

    session.addFile("/media/a.mp4");

    expect(session.currentNotification(clock.now)).toBe(
      "Error analyzing file: Failed to run ffprobe: spawnSync ffprobe ENOENT"
    );
  });

  it("reports unexpected throws from the analyzer", () => {
    const session = new InspectorSession({
      notificationTtlMs: TTL,
      now: () => 0,
      analyze: () => {
        throw new Error("boom");
      }
    });

    session.addFile("/media/a.mp4");

    expect(session.currentNotification(0)).toBe("Error analyzing file: boom");
  });

  it("reports a whitespace path as missing", () => {
    const { session, clock, analyzed } = createHarness();

    press(session, charKey("a"), charKey(" "), keyOf("return"));

    expect(analyzed).toEqual([" "]);
    expect(session.records()).toEqual([]);
    expect(session.statusText(clock.now)).toBe("File does not exist");
  });

  it("returns to browsing without analyzing an empty buffer", () => {
    const { session, analyzed } = createHarness();

    press(session, charKey("a"), keyOf("return"));

    expect(analyzed).toEqual([]);
    expect(session.mode.kind).toBe("browsing");
  });

  it("discards the buffer on escape", () => {
    const { session, analyzed } = createHarness();

    press(session, charKey("a"));
    typeText(session, "/tmp/x.mp4");
    press(session, keyOf("escape"), charKey("a"));

    expect(analyzed).toEqual([]);
    expect(session.snapshot().input).toEqual({ value: "", cursor: 0 });
  });

  it("forwards editing keys to the buffer", () => {
    const { session } = createHarness();

    press(session, charKey("a"));
    typeText(session, "abc");
    press(session, keyOf("backspace"), keyOf("left"), charKey("X"));

    expect(session.snapshot().input).toEqual({ value: "aXb", cursor: 2 });
  });

  it("appends the same path twice", () => {
    const clip = record("clip");
    const { session } = createHarness({ "/media/clip.mp4": { ok: true, record: clip } });

    session.addFile("/media/clip.mp4");
    session.addFile("/media/clip.mp4");

    expect(session.records()).toHaveLength(2);
  });
});

describe("InspectorSession selection", () => {
  it("wraps in both directions", () => {
    const { session } = seeded([record("a"), record("b"), record("c")]);

    press(session, charKey("k"));
    expect(session.cursor).toBe(2);
    press(session, keyOf("down"));
    expect(session.cursor).toBe(0);
    press(session, charKey("j"), charKey("j"));
    expect(session.cursor).toBe(2);
    press(session, keyOf("up"));
    expect(session.cursor).toBe(1);
  });

  it("does nothing on an empty view", () => {
    const { session } = createHarness();

    press(session, keyOf("down"), keyOf("up"));

    expect(session.cursor).toBe(0);
  });

  it("moves over the filtered view", () => {
    const { session } = seeded([
      record("a", { codec: "H.264" }),
      record("b", { codec: "VP9" }),
      record("c", { codec: "H.264" })
    ]);
    press(session, charKey("2"));
    expect(session.view().map((item) => item.name)).toEqual(["a", "c"]);

    press(session, keyOf("down"));
    expect(session.selectedRecord()?.name).toBe("c");
    press(session, keyOf("down"));
    expect(session.selectedRecord()?.name).toBe("a");
  });
});

describe("InspectorSession clear", () => {
  it("empties the view, the filters and the cursor", () => {
    const { session, clock } = seeded([record("a"), record("b"), record("c")]);
    press(session, charKey("1"), keyOf("down"));
    expect(session.filters()).toEqual([{ field: "container", value: "mp4" }]);

    press(session, charKey("c"));

    expect(session.view()).toEqual([]);
    expect(session.filters()).toEqual([]);
    expect(session.cursor).toBe(0);
    expect(session.mode.kind).toBe("browsing");
    expect(session.currentNotification(clock.now)).toBe("All files cleared");
  });
});

describe("InspectorSession filters", () => {
  it("cycles a field through its options with digit keys", () => {
    const { session, clock } = seeded([record("a", { frameRate: "25" }), record("b", { frameRate: "30" })]);

    press(session, charKey("4"));
    expect(session.filters()).toEqual([{ field: "frameRate", value: "24" }]);
    expect(session.view()).toEqual([]);
    expect(session.currentNotification(clock.now)).toBe("Filter Frame rate: 24");

    press(session, charKey("4"));
    expect(session.view().map((item) => item.name)).toEqual(["a"]);

    press(session, charKey("4"), charKey("4"), charKey("4"), charKey("4"));
    expect(session.filters()).toEqual([]);
    expect(session.currentNotification(clock.now)).toBe("Filter Frame rate removed");
  });

  it("resets the cursor when filters change", () => {
    const { session } = seeded([record("a"), record("b")]);
    press(session, keyOf("down"));

    press(session, charKey("1"));

    expect(session.cursor).toBe(0);
  });

  it("clears filters without touching the catalogue", () => {
    const { session, clock } = seeded([record("a")]);
    press(session, charKey("2"), charKey("1"));

    press(session, charKey("x"));

    expect(session.filters()).toEqual([]);
    expect(session.records()).toHaveLength(1);
    expect(session.currentNotification(clock.now)).toBe("Filters cleared");
  });
});

describe("InspectorSession raw output", () => {
  it("scrolls down without bound and up to zero", () => {
    const { session } = createHarness();

    press(session, charKey("r"), keyOf("up"));
    expect(session.snapshot().scroll).toBe(0);

    press(session, keyOf("down"), keyOf("down"), keyOf("down"), keyOf("up"));
    expect(session.snapshot().scroll).toBe(2);
  });

  it("resets the scroll offset on entry", () => {
    const { session } = createHarness();

    press(session, charKey("r"), keyOf("down"), keyOf("escape"), charKey("r"));

    expect(session.snapshot().scroll).toBe(0);
  });
});

describe("InspectorSession notifications", () => {
  it("expires after the lifetime and falls back to the mode default", () => {
    const { session, clock } = createHarness();
    session.notify("hello");
    const createdAt = clock.now;

    expect(session.statusText(createdAt + TTL - 1)).toBe("hello");
    expect(session.statusText(createdAt + TTL + 1)).toBe(STATUS_DEFAULTS.browsing);
    expect(session.currentNotification(createdAt)).toBeUndefined();
  });

  it("uses the default for each mode", () => {
    const { session } = createHarness();

    expect(session.statusText()).toBe("Ready - Press 'h' for help");
    press(session, charKey("a"));
    expect(session.statusText()).toBe("Enter file path...");
    press(session, keyOf("escape"), charKey("r"));
    expect(session.statusText()).toBe("Viewing raw output - Press Esc to return");
    press(session, keyOf("escape"), charKey("h"));
    expect(session.statusText()).toBe("Help - Press Esc to return");
  });
});

describe("end to end", () => {
  it("extracts the documented attributes", () => {
    const report = [
      '{"streams": [{"codec_name": "h264",',
      '"width":1920,"height":1080,',
      '"r_frame_rate": "25/1",',
      'bit_rate: "8000000",',
      "}]}"
    ].join("\n");
    const parsed = extractMediaRecord("/media/sample.mp4", report);
    const { session } = createHarness({ "/media/sample.mp4": { ok: true, record: parsed } });

    press(session, charKey("a"));
    typeText(session, "/media/sample.mp4");
    press(session, keyOf("enter"));

    const [added] = session.view();
    expect(added?.codec).toBe("H.264");
    expect(added?.resolution).toBe("1920x1080");
    expect(added?.frameRate).toBe("25");
    expect(added?.bitrate).toBe("8.0");
    expect(session.snapshot().selected?.rawOutput).toBe(report);
  });
});
