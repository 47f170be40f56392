/**
 * Text measurement and line layout for terminal rendering.
 */

import type { Control, Fragment } from "./types";

/** Visible width: one column per code point. */
export function displayWidth(str: string): number {
  return [...str].length;
}

// C0 controls except newline, DEL, C1 controls
const CONTROL_CHARS = /[\u0000-\u0009\u000B-\u001F\u007F-\u009F]/g;

/** Replace characters a terminal would act on with U+FFFD. */
export function replaceControls(text: string): string {
  return text.replace(CONTROL_CHARS, "\uFFFD");
}

/**
 * Pad a string to a minimum display width (left side).
 */
export function padStart(str: string, length: number, char = " "): string {
  const width = displayWidth(str);
  if (width >= length) {
    return str;
  }
  return char.repeat(length - width) + str;
}

export interface LayoutOptions {
  /** Wrap column including the prefix; 0 disables wrapping */
  width: number;
  /** Prefix of the first line (list marker, quote bar, indentation) */
  firstPrefix: string;
  /** Prefix of every following line */
  restPrefix: string;
}

/**
 * Word-wrapping line composer.
 *
 * Words are maximal runs of non-space characters; control sequences are
 * zero-width and travel with the word they touch. At each line break the
 * open controls are closed and reopened after the next prefix so every
 * line is self-contained.
 */
class LineComposer {
  private readonly lines: string[] = [];
  private readonly active: Control[] = [];
  private line: string;
  private column: number;
  private hasWords = false;
  private pendingSpaces = 0;
  private word: Fragment[] = [];
  private wordWidth = 0;

  constructor(private readonly options: LayoutOptions) {
    this.line = options.firstPrefix;
    this.column = displayWidth(options.firstPrefix);
  }

  add(fragment: Fragment): void {
    if (fragment.kind !== "text") {
      this.word.push(fragment);
      return;
    }
    for (const char of fragment.text) {
      if (char === "\n") {
        this.flushWord();
        this.breakLine();
      } else if (char === " ") {
        this.flushWord();
        this.pendingSpaces += 1;
      } else {
        this.appendChar(char);
      }
    }
  }

  finish(): string[] {
    this.flushWord();
    this.lines.push(this.line + this.closeAll());
    return this.lines;
  }

  private appendChar(char: string): void {
    const last = this.word.at(-1);
    if (last?.kind === "text") {
      last.text += char;
    } else {
      this.word.push({ kind: "text", text: char });
    }
    this.wordWidth += 1;
  }

  private flushWord(): void {
    if (this.word.length === 0) {
      return;
    }

    if (this.wordWidth > 0) {
      const { width } = this.options;
      const needed = this.column + this.pendingSpaces + this.wordWidth;
      if (this.hasWords && width > 0 && needed > width) {
        this.breakLine();
      } else if (this.pendingSpaces > 0) {
        this.line += " ".repeat(this.pendingSpaces);
        this.column += this.pendingSpaces;
      }
      this.pendingSpaces = 0;
      this.hasWords = true;
      this.column += this.wordWidth;
    }

    for (const piece of this.word) {
      this.emit(piece);
    }
    this.word = [];
    this.wordWidth = 0;
  }

  private emit(piece: Fragment): void {
    switch (piece.kind) {
      case "text":
        this.line += piece.text;
        return;
      case "open":
        this.active.push(piece.control);
        this.line += piece.control.open;
        return;
      case "close": {
        const closed = this.active.pop();
        if (!closed) {
          return;
        }
        this.line += closed.close;
        // An outer region sharing the same reset sequence was just ended too
        for (const control of this.active) {
          if (control.close === closed.close) {
            this.line += control.open;
          }
        }
        return;
      }
    }
  }

  private closeAll(): string {
    return [...this.active]
      .reverse()
      .map((control) => control.close)
      .join("");
  }

  private breakLine(): void {
    this.lines.push(this.line + this.closeAll());
    this.line =
      this.options.restPrefix +
      this.active.map((control) => control.open).join("");
    this.column = displayWidth(this.options.restPrefix);
    this.hasWords = false;
    this.pendingSpaces = 0;
  }
}

/**
 * Lay out inline fragments as wrapped lines, prefixes included.
 * Spaces inside a line are kept; spaces at a line break are dropped.
 */
export function layoutFragments(
  fragments: readonly Fragment[],
  options: LayoutOptions
): string[] {
  const composer = new LineComposer(options);
  for (const fragment of fragments) {
    composer.add(fragment);
  }
  return composer.finish();
}
