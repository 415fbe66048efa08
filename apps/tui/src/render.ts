import { FILTER_FIELDS, MediaRecord, filterFieldLabel } from "@media-inspector/core";
import { countByField } from "@media-inspector/catalogue";
import { SessionSnapshot, TAB_LABELS } from "./session";

export interface ScreenSize {
  columns: number;
  rows: number;
}

export interface Screen {
  lines: string[];
  cursor?: { row: number; column: number };
}

export const TITLE = "Media Inspector";
export const EMPTY_FILES_MESSAGE = "No files loaded. Press 'a' to add files, 'h' for help";
export const NO_SELECTION_MESSAGE = "No file selected";

const HIGHLIGHT_SYMBOL = ">> ";

interface TableColumn {
  header: string;
  share: number;
  value: (record: MediaRecord) => string;
}

const COLUMNS: ReadonlyArray<TableColumn> = [
  { header: "Name", share: 25, value: (record) => `${record.name}.${record.container}` },
  { header: "Container", share: 12, value: (record) => record.container },
  { header: "Codec", share: 15, value: (record) => record.codec },
  { header: "Resolution", share: 15, value: (record) => record.resolution },
  { header: "FPS", share: 8, value: (record) => record.frameRate },
  { header: "Bitrate(Mbps)", share: 15, value: (record) => record.bitrate }
];

export const HELP_LINES: ReadonlyArray<string> = [
  "Key Bindings:",
  "",
  "  q - Quit application",
  "  a - Add file",
  "  r - Show raw ffprobe output",
  "  c - Clear all files",
  "  h - Show this help",
  "  ↑/k - Previous file",
  "  ↓/j - Next file",
  "  Tab - Switch tabs",
  "  1-5 - Cycle container/codec/resolution/fps/bitrate filter",
  "  x - Clear filters",
  "",
  "In raw output: ↑/↓ scroll, Esc returns",
  "While adding a file: Enter analyzes, Esc cancels"
];

const ADD_FILE_HELP: ReadonlyArray<string> = [
  "Enter the full path to a video or image file",
  "Press Enter to analyze, Esc to cancel",
  "",
  "Examples:",
  "  /path/to/video.mp4",
  "  /path/to/image.jpg"
];

/**
 * Lays the snapshot out as plain text lines of exactly `columns` width.
 * Pure: the same snapshot and size always give the same screen.
 */
export function renderScreen(snapshot: SessionSnapshot, size: ScreenSize): Screen {
  const columns = Math.max(20, size.columns);
  const rows = Math.max(8, size.rows);
  const bodyHeight = rows - 5;

  const header = [centre(TITLE, columns), renderTabs(snapshot.tabIndex, columns), rule(columns)];
  const body = renderBody(snapshot, columns, bodyHeight);
  const footer = [rule(columns), fit(snapshot.status, columns)];

  const lines = [...header, ...body.lines.slice(0, bodyHeight).map((line) => fit(line, columns))];
  while (lines.length < header.length + bodyHeight) {
    lines.push(fit("", columns));
  }
  lines.push(...footer);

  const cursor = body.cursor
    ? { row: header.length + body.cursor.row, column: Math.min(columns - 1, body.cursor.column) }
    : undefined;
  return { lines, cursor };
}

function renderBody(snapshot: SessionSnapshot, columns: number, height: number): Screen {
  switch (snapshot.mode) {
    case "adding-file":
      return renderAddFile(snapshot, columns);
    case "viewing-raw-output":
      return { lines: renderRawOutput(snapshot, columns, height) };
    case "viewing-help":
      return { lines: HELP_LINES.map((line) => fit(line, columns)) };
    case "browsing":
      if (snapshot.tabIndex === 1) {
        return { lines: renderFilters(snapshot, columns) };
      }
      if (snapshot.tabIndex === 2) {
        return { lines: renderStats(snapshot, columns) };
      }
      return { lines: renderFileTable(snapshot, columns, height) };
  }
}

export function renderTabs(selected: number, columns: number): string {
  const labels = TAB_LABELS.map((label, index) =>
    index === selected ? `[${label}]` : ` ${label} `
  );
  return fit(` ${labels.join(" | ")}`, columns);
}

export function renderFileTable(snapshot: SessionSnapshot, columns: number, height: number): string[] {
  if (snapshot.view.length === 0) {
    return [
      fit(`Files (0/${snapshot.catalogueSize})`, columns),
      "",
      centre(EMPTY_FILES_MESSAGE, columns)
    ];
  }

  const widths = columnWidths(columns - HIGHLIGHT_SYMBOL.length);
  const rowsVisible = Math.max(1, height - 2);
  // Scroll just far enough to keep the cursor row on screen.
  const first = Math.max(0, snapshot.cursor - rowsVisible + 1);
  const blank = " ".repeat(HIGHLIGHT_SYMBOL.length);

  const headers = COLUMNS.map((column, i) => fit(column.header, widths[i] ?? 0));
  const lines = [
    fit(`Files (${snapshot.view.length}/${snapshot.catalogueSize})`, columns),
    fit(blank + headers.join(" "), columns)
  ];
  snapshot.view.slice(first, first + rowsVisible).forEach((record, offset) => {
    const marker = first + offset === snapshot.cursor ? HIGHLIGHT_SYMBOL : blank;
    const cells = COLUMNS.map((column, i) => fit(column.value(record), widths[i] ?? 0));
    lines.push(fit(marker + cells.join(" "), columns));
  });
  return lines;
}

export function renderRawOutput(snapshot: SessionSnapshot, columns: number, height: number): string[] {
  const title = fit("Raw ffprobe output", columns);
  if (!snapshot.selected) {
    return [title, fit(NO_SELECTION_MESSAGE, columns)];
  }
  const content = snapshot.selected.rawOutput.split("\n").map((line) => line.replace(/\r$/, ""));
  const visible = content.slice(snapshot.scroll, snapshot.scroll + height - 1);
  return [title, ...visible.map((line) => fit(line, columns))];
}

function renderAddFile(snapshot: SessionSnapshot, columns: number): Screen {
  const prompt = "File Path: ";
  const value = snapshot.input?.value ?? "";
  const lines = [fit("Add File", columns), fit(prompt + value, columns), "", ...ADD_FILE_HELP];
  return {
    lines,
    cursor: { row: 1, column: prompt.length + (snapshot.input?.cursor ?? 0) }
  };
}

function renderFilters(snapshot: SessionSnapshot, columns: number): string[] {
  const lines = [fit("Active filters:", columns)];
  if (snapshot.filters.length === 0) {
    lines.push(fit("  (none)", columns));
  }
  for (const predicate of snapshot.filters) {
    lines.push(fit(`  ${filterFieldLabel(predicate.field)} contains "${predicate.value}"`, columns));
  }
  lines.push("", fit("Options (press the number to cycle, x to clear):", columns));
  FILTER_FIELDS.forEach((item, index) => {
    const active = snapshot.filters.find((predicate) => predicate.field === item.key)?.value;
    const options = snapshot.filterOptions[item.key].map((option) =>
      option === active ? `[${option}]` : option
    );
    lines.push(fit(`  ${index + 1} ${item.label}: ${options.join(" ")}`, columns));
  });
  return lines;
}

function renderStats(snapshot: SessionSnapshot, columns: number): string[] {
  const lines = [
    fit(`Files: ${snapshot.catalogueSize} total, ${snapshot.view.length} shown`, columns),
    fit(
      snapshot.lastScan
        ? `Last analysis: ${(snapshot.lastScan.durationMs / 1000).toFixed(2)}s (${snapshot.lastScan.path})`
        : "Last analysis: -",
      columns
    )
  ];
  for (const field of ["codec", "resolution"] as const) {
    const counts = countByField(snapshot.view, field);
    lines.push("", fit(`${filterFieldLabel(field)}:`, columns));
    if (counts.length === 0) {
      lines.push(fit("  -", columns));
    }
    for (const { value, count } of counts) {
      lines.push(fit(`  ${value}: ${count}`, columns));
    }
  }
  return lines;
}

export function columnWidths(available: number): number[] {
  const gaps = COLUMNS.length - 1;
  const usable = Math.max(COLUMNS.length, available - gaps);
  return COLUMNS.map((column) => Math.max(1, Math.floor((usable * column.share) / 100)));
}

/** Truncates or right-pads to exactly `width` characters. */
export function fit(text: string, width: number): string {
  const chars = [...text];
  if (chars.length > width) {
    return chars.slice(0, width).join("");
  }
  return text + " ".repeat(width - chars.length);
}

function centre(text: string, width: number): string {
  const length = [...text].length;
  const left = Math.max(0, Math.floor((width - length) / 2));
  return fit(" ".repeat(left) + text, width);
}

function rule(width: number): string {
  return "─".repeat(width);
}
