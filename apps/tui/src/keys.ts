import type { Key } from "node:readline";

/** Press-only key event, shaped after readline's keypress payload. */
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}

export function toKeyPress(str: string | undefined, key: Key | undefined): KeyPress {
  return {
    name: key?.name,
    sequence: key?.sequence ?? str,
    ctrl: key?.ctrl ?? false,
    meta: key?.meta ?? false,
    shift: key?.shift ?? false
  };
}

/** The printable character a key types, if any. */
export function printableChar(key: KeyPress): string | undefined {
  if (key.ctrl || key.meta || key.sequence === undefined) {
    return undefined;
  }
  const chars = [...key.sequence];
  if (chars.length !== 1) {
    return undefined;
  }
  const code = key.sequence.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f ? key.sequence : undefined;
}

export function isChar(key: KeyPress, char: string): boolean {
  return printableChar(key) === char;
}

export function isNamed(key: KeyPress, ...names: string[]): boolean {
  return !key.ctrl && !key.meta && key.name !== undefined && names.includes(key.name);
}

export function isCtrl(key: KeyPress, name: string): boolean {
  return key.ctrl && key.name === name;
}
