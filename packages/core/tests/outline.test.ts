import { describe, expect, test } from "vitest";

import {
  blockquote,
  bold,
  bulletList,
  code,
  document,
  header,
  highlight,
  italic,
  link,
  listItem,
  orderedList,
  paragraph,
  strike,
  underline,
} from "../src/document";
import {
  codeSpan,
  escapeDestination,
  escapeOutline,
  toOutline,
  writeOutline,
} from "../src/outline";
import { parse } from "../src/markup";
import { StringSink } from "../src/sink";

describe("toOutline", () => {
  test("writes a bullet list", () => {
    const doc = document(
      bulletList(listItem(paragraph("One")), listItem(paragraph("Two")))
    );
    expect(toOutline(doc)).toBe("- One\n- Two\n");
  });

  test("separates top-level blocks with a blank line", () => {
    const doc = document(paragraph("a"), header(1, "T"), header(3, "Small"));
    expect(toOutline(doc)).toBe("a\n\n# T\n\n### Small\n");
  });

  test("writes every inline style", () => {
    const doc = document(
      paragraph(
        bold("b"),
        " ",
        italic("i"),
        " ",
        underline("u"),
        " ",
        strike("s"),
        " ",
        highlight("h"),
        " ",
        code("c")
      )
    );
    expect(toOutline(doc)).toBe(
      "**b** _i_ <u>u</u> <s>s</s> <mark>h</mark> `c`\n"
    );
  });

  test("escapes metacharacters in text", () => {
    const doc = document(paragraph("1 * 2 = [x] #tag <b> & done_"));
    expect(toOutline(doc)).toBe(
      "1 \\* 2 = \\[x\\] \\#tag &lt;b&gt; &amp; done\\_\n"
    );
  });

  test("writes links with a percent-encoded destination", () => {
    const doc = document(paragraph(link("https://x.test/a b", "site")));
    expect(toOutline(doc)).toBe("[site](https://x.test/a%20b)\n");
  });

  test("labels an empty link with its normalized target", () => {
    const doc = document(paragraph(link(" mailto:a@b.com ")));
    expect(toOutline(doc)).toBe("[a@b.com](mailto:a@b.com)\n");
  });

  test("indents nested lists under their item", () => {
    const doc = document(
      orderedList(
        listItem(
          paragraph("A"),
          bulletList(listItem(paragraph("x")), listItem(paragraph("y")))
        ),
        listItem(paragraph("B"))
      )
    );
    expect(toOutline(doc)).toBe("1. A\n\n   - x\n   - y\n2. B\n");
  });

  test("indents item content to the width of a two-digit marker", () => {
    const items = Array.from({ length: 9 }, (_, index) =>
      listItem(paragraph(String(index + 1)))
    );
    const doc = document(
      orderedList(
        ...items,
        listItem(paragraph("J"), bulletList(listItem(paragraph("x"))))
      )
    );
    const head = items.map((_, index) => `${index + 1}. ${index + 1}\n`);
    expect(toOutline(doc)).toBe(`${head.join("")}10. J\n\n    - x\n`);
  });

  test("keeps a parsed nested list inside its numbered item", () => {
    const parsed = parse("<ol><li><p>A</p><ul><li><p>x</p></li></ul></li></ol>");
    expect(parsed.isOk()).toBe(true);
    if (parsed.isOk()) {
      expect(toOutline(parsed.value)).toBe("1. A\n\n   - x\n");
    }
  });

  test("separates a paragraph after a nested list with a blank line", () => {
    const doc = document(
      bulletList(
        listItem(bulletList(listItem(paragraph("x"))), paragraph("B"))
      )
    );
    expect(toOutline(doc)).toBe("-\n  - x\n\n  B\n");
  });

  test("separates a quote inside an item from the text before it", () => {
    const doc = document(
      orderedList(listItem(paragraph("a"), blockquote(paragraph("q"))))
    );
    expect(toOutline(doc)).toBe("1. a\n\n   > q\n");
  });

  test("puts the marker alone when an item starts with a list", () => {
    const doc = document(
      bulletList(listItem(bulletList(listItem(paragraph("inner")))))
    );
    expect(toOutline(doc)).toBe("-\n  - inner\n");
  });

  test("writes an empty item as a bare marker", () => {
    expect(toOutline(document(orderedList(listItem())))).toBe("1.\n");
  });

  test("joins text blocks in one item with a hard break", () => {
    const doc = document(
      bulletList(listItem(paragraph("first"), paragraph("second")))
    );
    expect(toOutline(doc)).toBe("- first\\\n  second\n");
  });

  test("prefixes quoted lines", () => {
    const doc = document(blockquote(paragraph("a"), paragraph("b")));
    expect(toOutline(doc)).toBe("> a\n>\n> b\n");
  });

  test("turns a newline inside text into a hard break", () => {
    expect(toOutline(document(paragraph("a\nb")))).toBe("a\\\nb\n");
  });

  test("streams to a sink", () => {
    const sink = new StringSink();
    const result = writeOutline(document(header(2, "Hi")), sink);
    expect(result.isOk()).toBe(true);
    expect(sink.toString()).toBe("## Hi\n");
  });
});

describe("escaping helpers", () => {
  test("escapeOutline", () => {
    expect(escapeOutline("a\u00a0b")).toBe("a&nbsp;b");
    expect(escapeOutline("x\r\ny")).toBe("x\\\ny");
    expect(escapeOutline("\\|~")).toBe("\\\\\\|\\~");
  });

  test("escapeDestination encodes non-ASCII as UTF-8 bytes", () => {
    expect(escapeDestination("https://例.test")).toBe(
      "https://%E4%BE%8B.test"
    );
    expect(escapeDestination("a(b)")).toBe("a%28b%29");
  });

  test("codeSpan fences around backtick runs", () => {
    expect(codeSpan("plain")).toBe("`plain`");
    expect(codeSpan("a`b")).toBe("``a`b``");
    expect(codeSpan("`x")).toBe("`` `x ``");
    expect(codeSpan("a\nb")).toBe("`a b`");
  });
});
