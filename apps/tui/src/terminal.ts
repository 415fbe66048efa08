import readline, { Key } from "node:readline";
import { asErrorMessage } from "@media-inspector/core";
import { toKeyPress } from "./keys";
import { Logger } from "./logger";
import { ScreenSize, renderScreen } from "./render";
import { InspectorSession } from "./session";

const ENTER_ALT_SCREEN = "\u001b[?1049h";
const LEAVE_ALT_SCREEN = "\u001b[?1049l";
const HIDE_CURSOR = "\u001b[?25l";
const SHOW_CURSOR = "\u001b[?25h";
const HOME = "\u001b[H";
const CLEAR_LINE = "\u001b[2K";

export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode(mode: boolean): unknown;
}

export interface TerminalOutput {
  isTTY?: boolean;
  columns?: number;
  rows?: number;
  write(chunk: string): unknown;
  on(event: "resize", listener: () => void): unknown;
  off(event: "resize", listener: () => void): unknown;
}

export interface TerminalIo {
  input: TerminalInput;
  output: TerminalOutput;
}

export class TerminalSetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TerminalSetupError";
  }
}

export function formatFrame(lines: string[], cursor: { row: number; column: number } | undefined): string {
  const body = lines.map((line, index) => `\u001b[${index + 1};1H${CLEAR_LINE}${line}`).join("");
  const caret = cursor ? `\u001b[${cursor.row + 1};${cursor.column + 1}H${SHOW_CURSOR}` : HIDE_CURSOR;
  return `${HOME}${body}${caret}`;
}

/**
 * Owns the terminal for the life of the session: raw mode and the alternate
 * screen on entry, both undone on exit. Resolves when the session asks to quit.
 */
export function runTerminal(session: InspectorSession, io: TerminalIo, logger: Logger): Promise<void> {
  const { input, output } = io;
  if (!input.isTTY || !output.isTTY) {
    return Promise.reject(new TerminalSetupError("media-inspector needs an interactive terminal"));
  }

  const size = (): ScreenSize => ({ columns: output.columns ?? 80, rows: output.rows ?? 24 });
  const draw = () => {
    const screen = renderScreen(session.snapshot(), size());
    output.write(formatFrame(screen.lines, screen.cursor));
  };

  return new Promise<void>((resolve, reject) => {
    const teardown = () => {
      input.off("keypress", onKeypress);
      output.off("resize", onResize);
      input.setRawMode(false);
      input.pause();
      output.write(`${SHOW_CURSOR}${LEAVE_ALT_SCREEN}`);
    };

    const fail = (error: unknown) => {
      teardown();
      reject(error);
      logger.error(`terminal loop failed: ${asErrorMessage(error)}`);
    };

    const onKeypress = (str: string | undefined, key: Key | undefined) => {
      try {
        if (session.handleKey(toKeyPress(str, key)) === "quit") {
          teardown();
          logger.info("session ended");
          resolve();
          return;
        }
        draw();
      } catch (error) {
        fail(error);
      }
    };

    const onResize = () => {
      try {
        draw();
      } catch (error) {
        fail(error);
      }
    };

    try {
      readline.emitKeypressEvents(input);
      input.setRawMode(true);
      input.resume();
      output.write(`${ENTER_ALT_SCREEN}${HIDE_CURSOR}`);
      input.on("keypress", onKeypress);
      output.on("resize", onResize);
      logger.info("session started");
      draw();
    } catch (error) {
      fail(error);
    }
  });
}
