import {
  FILTER_FIELDS,
  FilterField,
  FilterPredicate,
  MediaRecord,
  TimestampMs,
  asErrorMessage,
  filterFieldLabel
} from "@media-inspector/core";
import {
  Catalogue,
  DEFAULT_FILTER_OPTIONS,
  FilterOptions,
  nextOptionValue
} from "@media-inspector/catalogue";
import { AnalyzeResult, PathNotFoundError } from "@media-inspector/probe";
import { KeyPress, isChar, isCtrl, isNamed } from "./keys";
import { Logger, silentLogger } from "./logger";
import { Notification, createNotification, isNotificationExpired } from "./notification";
import { TextInput } from "./text-input";

export type InspectorMode =
  | { kind: "browsing" }
  | { kind: "adding-file"; input: TextInput }
  | { kind: "viewing-raw-output"; scroll: number }
  | { kind: "viewing-help" };

export type InspectorModeKind = InspectorMode["kind"];

export type SessionSignal = "continue" | "quit";

export const TAB_LABELS = ["Files", "Filters", "Stats"] as const;

export const STATUS_DEFAULTS: Readonly<Record<InspectorModeKind, string>> = {
  browsing: "Ready - Press 'h' for help",
  "adding-file": "Enter file path...",
  "viewing-raw-output": "Viewing raw output - Press Esc to return",
  "viewing-help": "Help - Press Esc to return"
};

// Digit keys in browsing mode step through the filter options of one field.
const FILTER_KEYS: ReadonlyArray<{ char: string; field: FilterField }> = FILTER_FIELDS.map(
  (item, index) => ({ char: String(index + 1), field: item.key })
);

export interface LastScan {
  startedAt: TimestampMs;
  durationMs: number;
  path: string;
}

export interface InspectorSessionOptions {
  analyze: (filePath: string) => AnalyzeResult;
  notificationTtlMs: number;
  now?: () => TimestampMs;
  logger?: Logger;
  filterOptions?: FilterOptions;
}

/** Read-only picture of the session handed to the renderer. */
export interface SessionSnapshot {
  mode: InspectorModeKind;
  tabIndex: number;
  catalogueSize: number;
  view: ReadonlyArray<MediaRecord>;
  cursor: number;
  selected: MediaRecord | undefined;
  filters: ReadonlyArray<FilterPredicate>;
  filterOptions: FilterOptions;
  notification: string | undefined;
  status: string;
  scroll: number;
  input: { value: string; cursor: number } | undefined;
  lastScan: LastScan | undefined;
}

export class InspectorSession {
  private readonly catalogue = new Catalogue();
  private readonly analyze: (filePath: string) => AnalyzeResult;
  private readonly now: () => TimestampMs;
  private readonly logger: Logger;
  private readonly notificationTtlMs: number;
  private readonly filterOptions: FilterOptions;
  private modeState: InspectorMode = { kind: "browsing" };
  private cursorIndex = 0;
  private tab = 0;
  private notificationState: Notification | undefined;
  private lastScanState: LastScan | undefined;

  constructor(options: InspectorSessionOptions) {
    this.analyze = options.analyze;
    this.notificationTtlMs = options.notificationTtlMs;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.filterOptions = options.filterOptions ?? DEFAULT_FILTER_OPTIONS;
  }

  get mode(): InspectorMode {
    return this.modeState;
  }

  get cursor(): number {
    return this.cursorIndex;
  }

  get tabIndex(): number {
    return this.tab;
  }

  get lastScan(): LastScan | undefined {
    return this.lastScanState;
  }

  view(): MediaRecord[] {
    return this.catalogue.view();
  }

  records(): ReadonlyArray<MediaRecord> {
    return this.catalogue.list();
  }

  filters(): ReadonlyArray<FilterPredicate> {
    return this.catalogue.filters.list();
  }

  selectedRecord(): MediaRecord | undefined {
    return this.view()[this.cursorIndex];
  }

  handleKey(key: KeyPress): SessionSignal {
    const mode = this.modeState;
    switch (mode.kind) {
      case "browsing":
        return this.handleBrowsingKey(key);
      case "adding-file":
        this.handleAddingFileKey(mode.input, key);
        return "continue";
      case "viewing-raw-output":
        this.handleRawOutputKey(mode, key);
        return "continue";
      case "viewing-help":
        if (isNamed(key, "escape")) {
          this.modeState = { kind: "browsing" };
        }
        return "continue";
    }
  }

  /**
   * Current notification, or undefined once its lifetime has elapsed. An
   * expired notification is dropped here, so this is checked on every render.
   */
  currentNotification(now: TimestampMs = this.now()): string | undefined {
    if (this.notificationState && isNotificationExpired(this.notificationState, now)) {
      this.notificationState = undefined;
    }
    return this.notificationState?.message;
  }

  statusText(now: TimestampMs = this.now()): string {
    return this.currentNotification(now) ?? STATUS_DEFAULTS[this.modeState.kind];
  }

  snapshot(now: TimestampMs = this.now()): SessionSnapshot {
    const view = this.view();
    const mode = this.modeState;
    const notification = this.currentNotification(now);
    return {
      mode: mode.kind,
      tabIndex: this.tab,
      catalogueSize: this.catalogue.size,
      view,
      cursor: this.cursorIndex,
      selected: view[this.cursorIndex],
      filters: this.filters(),
      filterOptions: this.filterOptions,
      notification,
      status: notification ?? STATUS_DEFAULTS[mode.kind],
      scroll: mode.kind === "viewing-raw-output" ? mode.scroll : 0,
      input:
        mode.kind === "adding-file"
          ? { value: mode.input.value, cursor: mode.input.visualCursor }
          : undefined,
      lastScan: this.lastScanState
    };
  }

  notify(message: string): void {
    this.notificationState = createNotification(message, this.now(), this.notificationTtlMs);
  }

  clearAll(): void {
    this.catalogue.clear();
    this.cursorIndex = 0;
    this.notify("All files cleared");
    this.logger.info("catalogue cleared");
  }

  selectNext(): void {
    const length = this.view().length;
    if (length === 0) {
      return;
    }
    this.cursorIndex = this.cursorIndex >= length - 1 ? 0 : this.cursorIndex + 1;
  }

  selectPrevious(): void {
    const length = this.view().length;
    if (length === 0) {
      return;
    }
    this.cursorIndex = this.cursorIndex === 0 ? length - 1 : this.cursorIndex - 1;
  }

  cycleFilter(field: FilterField): void {
    const filters = this.catalogue.filters;
    const next = nextOptionValue(this.filterOptions[field], filters.valueFor(field));
    filters.setForField(field, next);
    this.cursorIndex = 0;
    this.notify(
      next === undefined
        ? `Filter ${filterFieldLabel(field)} removed`
        : `Filter ${filterFieldLabel(field)}: ${next}`
    );
  }

  clearFilters(): void {
    this.catalogue.filters.clear();
    this.cursorIndex = 0;
    this.notify("Filters cleared");
  }

  /** Runs one analysis to completion; failures only ever become notifications. */
  addFile(filePath: string): void {
    const startedAt = this.now();
    let result: AnalyzeResult;
    try {
      result = this.analyze(filePath);
    } catch (error) {
      this.logger.error(`analyze ${filePath} threw: ${asErrorMessage(error)}`);
      this.notify(`Error analyzing file: ${asErrorMessage(error)}`);
      return;
    }

    if (!result.ok) {
      this.logger.error(`analyze ${filePath} failed: ${result.error.message}`);
      this.notify(
        result.error instanceof PathNotFoundError
          ? result.error.message
          : `Error analyzing file: ${result.error.message}`
      );
      return;
    }

    this.catalogue.append(result.record);
    const durationMs = this.now() - startedAt;
    this.lastScanState = { startedAt, durationMs, path: filePath };
    this.logger.info(`analyzed ${filePath} in ${durationMs}ms`);
    this.notify(`File analyzed in ${(durationMs / 1000).toFixed(2)}s`);
  }

  private handleBrowsingKey(key: KeyPress): SessionSignal {
    if (isChar(key, "q") || isCtrl(key, "c")) {
      return "quit";
    }
    if (isChar(key, "a")) {
      this.modeState = { kind: "adding-file", input: new TextInput() };
    } else if (isChar(key, "r")) {
      this.modeState = { kind: "viewing-raw-output", scroll: 0 };
    } else if (isChar(key, "h")) {
      this.modeState = { kind: "viewing-help" };
    } else if (isChar(key, "c")) {
      this.clearAll();
    } else if (isNamed(key, "down") || isChar(key, "j")) {
      this.selectNext();
    } else if (isNamed(key, "up") || isChar(key, "k")) {
      this.selectPrevious();
    } else if (isNamed(key, "tab")) {
      this.tab = (this.tab + 1) % TAB_LABELS.length;
    } else if (isChar(key, "x")) {
      this.clearFilters();
    } else {
      const filterKey = FILTER_KEYS.find((item) => isChar(key, item.char));
      if (filterKey) {
        this.cycleFilter(filterKey.field);
      }
    }
    return "continue";
  }

  private handleAddingFileKey(input: TextInput, key: KeyPress): void {
    if (isNamed(key, "return", "enter")) {
      const filePath = input.value;
      if (filePath.length > 0) {
        this.addFile(filePath);
      }
      input.reset();
      this.modeState = { kind: "browsing" };
      return;
    }
    if (isNamed(key, "escape")) {
      input.reset();
      this.modeState = { kind: "browsing" };
      return;
    }
    input.handleKey(key);
  }

  private handleRawOutputKey(
    mode: Extract<InspectorMode, { kind: "viewing-raw-output" }>,
    key: KeyPress
  ): void {
    if (isNamed(key, "escape")) {
      this.modeState = { kind: "browsing" };
    } else if (isNamed(key, "up")) {
      mode.scroll = Math.max(0, mode.scroll - 1);
    } else if (isNamed(key, "down")) {
      mode.scroll += 1;
    }
  }
}
