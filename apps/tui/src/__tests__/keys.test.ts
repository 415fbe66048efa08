import { describe, expect, it } from "vitest";
import { isChar, isNamed, printableChar, toKeyPress } from "../keys";
import { charKey, keyOf } from "./key-helpers";

describe("toKeyPress", () => {
  it("copies readline key fields", () => {
    expect(toKeyPress("q", { name: "q", sequence: "q", ctrl: false, meta: false, shift: false })).toEqual({
      name: "q",
      sequence: "q",
      ctrl: false,
      meta: false,
      shift: false
    });
  });

  it("falls back to the raw string when readline gives no key", () => {
    expect(toKeyPress("/", undefined)).toEqual({
      name: undefined,
      sequence: "/",
      ctrl: false,
      meta: false,
      shift: false
    });
  });
});

describe("printableChar", () => {
  it("accepts single visible characters", () => {
    expect(printableChar(charKey("/"))).toBe("/");
    expect(printableChar(keyOf("space", { sequence: " " }))).toBe(" ");
  });

  it("rejects control sequences and modified keys", () => {
    expect(printableChar(keyOf("return", { sequence: "\r" }))).toBeUndefined();
    expect(printableChar(keyOf("up", { sequence: "\u001b[A" }))).toBeUndefined();
    expect(printableChar(keyOf("backspace", { sequence: "\u007f" }))).toBeUndefined();
    expect(printableChar(keyOf("a", { ctrl: true, sequence: "\u0001" }))).toBeUndefined();
  });
});

describe("matchers", () => {
  it("distinguishes case for command characters", () => {
    expect(isChar(charKey("q"), "q")).toBe(true);
    expect(isChar(charKey("Q"), "q")).toBe(false);
  });

  it("matches named keys without modifiers", () => {
    expect(isNamed(keyOf("escape"), "escape")).toBe(true);
    expect(isNamed(keyOf("return"), "return", "enter")).toBe(true);
    expect(isNamed(keyOf("up", { meta: true }), "up")).toBe(false);
  });
});
