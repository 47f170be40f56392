import { describe, expect, test } from "vitest";

import { stripAnsi } from "../src/render/ansi";
import { superscript } from "../src/render/glyphs";
import { displayWidth, layoutFragments, padStart } from "../src/render/text";
import type { Control, Fragment } from "../src/render/types";
import { detectViewport } from "../src/render/viewport";

const layout = (fragments: Fragment[], width: number, prefix = "") =>
  layoutFragments(fragments, {
    width,
    firstPrefix: prefix,
    restPrefix: prefix,
  });

const text = (value: string): Fragment => ({ kind: "text", text: value });
const open = (control: Control): Fragment => ({ kind: "open", control });
const close: Fragment = { kind: "close" };

describe("displayWidth", () => {
  test("counts code points", () => {
    expect(displayWidth("abc")).toBe(3);
    expect(displayWidth("日本")).toBe(2);
    expect(displayWidth("😀")).toBe(1);
  });
});

describe("padStart", () => {
  test("pads on the left", () => {
    expect(padStart("7", 3)).toBe("  7");
    expect(padStart("¹", 2)).toBe(" ¹");
  });

  test("leaves wide enough strings alone", () => {
    expect(padStart("long", 2)).toBe("long");
  });
});

describe("layoutFragments", () => {
  test("keeps runs of spaces inside a line", () => {
    expect(layout([text("a  b")], 0)).toEqual(["a  b"]);
  });

  test("drops spaces at a line break", () => {
    expect(layout([text("aa   bb")], 4)).toEqual(["aa", "bb"]);
  });

  test("breaks at newlines", () => {
    expect(layout([text("a\nb")], 0)).toEqual(["a", "b"]);
  });

  test("never splits a word longer than the width", () => {
    expect(layout([text("abcdefghij xy")], 5)).toEqual(["abcdefghij", "xy"]);
  });

  test("counts the prefix toward the width", () => {
    expect(layout([text("ab cd")], 5, "> ")).toEqual(["> ab", "> cd"]);
  });

  test("reopens controls after the prefix of a new line", () => {
    const bold = { open: "<b>", close: "</b>" };
    expect(layout([open(bold), text("aa bb"), close], 4, "> ")).toEqual([
      "> <b>aa</b>",
      "> <b>bb</b>",
    ]);
  });

  test("reopens an outer control sharing the same close sequence", () => {
    const a = { open: "<A>", close: "</>" };
    const b = { open: "<B>", close: "</>" };
    expect(
      layout([open(a), text("x"), open(b), text("y"), close, text("z"), close], 0)
    ).toEqual(["<A>x<B>y</><A>z</>"]);
  });

  test("ignores a close without an open control", () => {
    expect(layout([text("a"), close], 0)).toEqual(["a"]);
  });
});

describe("glyph helpers", () => {
  test("superscript", () => {
    expect(superscript(1)).toBe("¹");
    expect(superscript(12)).toBe("¹²");
    expect(superscript(30)).toBe("³⁰");
  });

  test("stripAnsi removes SGR and hyperlink sequences", () => {
    expect(
      stripAnsi("\x1b[1mbold\x1b[22m \x1b]8;;https://x.test\x1b\\l\x1b]8;;\x1b\\")
    ).toBe("bold l");
  });
});

describe("viewport", () => {
  test("clamps the terminal width", () => {
    expect(detectViewport({ columns: 300, isTTY: true })).toEqual({
      width: 200,
    });
    expect(detectViewport({ columns: 10, isTTY: true })).toEqual({
      width: 40,
    });
    expect(detectViewport({ columns: 100, isTTY: true })).toEqual({
      width: 100,
    });
  });

  test("uses the default width off a terminal", () => {
    expect(detectViewport({ columns: 100, isTTY: false })).toEqual({
      width: 80,
    });
    expect(detectViewport({})).toEqual({ width: 80 });
  });
});
