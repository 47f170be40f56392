const METACHARACTERS = new Set([..."\\`*_{}[]()#+-|~"]);

const ENTITIES: Readonly<Record<string, string>> = {
  "<": "&lt;",
  ">": "&gt;",
  "&": "&amp;",
  "\u00a0": "&nbsp;",
};

/**
 * Escape plain text for the outline format. A newline becomes a
 * backslash hard break.
 */
export function escapeOutline(value: string): string {
  let out = "";
  for (const char of value) {
    if (METACHARACTERS.has(char)) {
      out += `\\${char}`;
    } else if (char === "\n") {
      out += "\\\n";
    } else if (char === "\r") {
      continue;
    } else {
      out += ENTITIES[char] ?? char;
    }
  }
  return out;
}

const DESTINATION_SAFE = /[A-Za-z0-9\-._~:/?#@!$&'*+,;=%[\]]/;
const HEX = "0123456789ABCDEF";

/** Percent-encode a link destination byte by byte. */
export function escapeDestination(href: string): string {
  let out = "";
  for (const byte of new TextEncoder().encode(href)) {
    const char = String.fromCharCode(byte);
    if (byte < 0x80 && DESTINATION_SAFE.test(char)) {
      out += char;
    } else {
      out += `%${HEX.charAt(byte >> 4)}${HEX.charAt(byte & 0x0f)}`;
    }
  }
  return out;
}

function longestBacktickRun(value: string): number {
  let longest = 0;
  let current = 0;
  for (const char of value) {
    current = char === "`" ? current + 1 : 0;
    longest = Math.max(longest, current);
  }
  return longest;
}

/** Backtick code span; the fence is longer than any backtick run inside. */
export function codeSpan(content: string): string {
  const flat = content.replace(/\r\n|[\r\n]/g, " ");
  const fence = "`".repeat(longestBacktickRun(flat) + 1);
  const pad =
    flat.startsWith(" ") ||
    flat.endsWith(" ") ||
    flat.startsWith("`") ||
    flat.endsWith("`");
  return pad ? `${fence} ${flat} ${fence}` : `${fence}${flat}${fence}`;
}
