/**
 * Character references understood by the parser and produced by the
 * writers.
 */

const NAMED: Readonly<Record<string, string>> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: "\u00a0",
};

const REFERENCE = /&(?:#(\d+)|#[xX]([0-9A-Fa-f]+)|([A-Za-z][A-Za-z0-9]*));/y;

export type ReferenceMatch =
  | { ok: true; value: string; length: number }
  | { ok: false; reason: string };

/**
 * Decode the character reference starting at `offset` (which must hold
 * `&`).
 */
export function matchReference(source: string, offset: number): ReferenceMatch {
  REFERENCE.lastIndex = offset;
  const match = REFERENCE.exec(source);
  if (!match) {
    return { ok: false, reason: "Malformed character reference" };
  }

  const [whole, decimal, hex, name] = match;
  if (name !== undefined) {
    const value = Object.hasOwn(NAMED, name) ? NAMED[name] : undefined;
    if (value === undefined) {
      return { ok: false, reason: `Unknown character reference "&${name};"` };
    }
    return { ok: true, value, length: whole.length };
  }

  const codePoint =
    decimal !== undefined ? Number.parseInt(decimal, 10) : Number.parseInt(hex ?? "", 16);
  if (!isScalarValue(codePoint)) {
    return { ok: false, reason: `Invalid code point in "${whole}"` };
  }
  return { ok: true, value: String.fromCodePoint(codePoint), length: whole.length };
}

function isScalarValue(codePoint: number): boolean {
  return (
    Number.isSafeInteger(codePoint) &&
    codePoint > 0 &&
    codePoint <= 0x10ffff &&
    (codePoint < 0xd800 || codePoint > 0xdfff)
  );
}

/** Escape text content: `&`, `<` and `>`. */
export function escapeText(value: string): string {
  return value.replace(/[&<>]/g, (char) => ESCAPES[char] ?? char);
}

/** Escape a double-quoted attribute value. */
export function escapeAttribute(value: string): string {
  return value.replace(/[&<>"]/g, (char) => ESCAPES[char] ?? char);
}

const ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
};

/** Numeric reference for a single character, e.g. `&#32;`. */
export function numericReference(char: string): string {
  return `&#${char.codePointAt(0) ?? 0};`;
}
