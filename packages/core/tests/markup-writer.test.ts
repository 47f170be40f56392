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
  type Document,
} from "../src/document";
import { parse } from "../src/markup/parser";
import { toMarkup, writeMarkup } from "../src/markup/writer";
import { StringSink } from "../src/sink";

function reparse(markup: string): Document {
  const result = parse(markup);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

describe("toMarkup", () => {
  test("writes the canonical layout", () => {
    const doc = document(
      header(1, "Title"),
      paragraph("Hello ", bold("world"), "!"),
      bulletList(
        listItem(paragraph("One")),
        listItem(paragraph("Two"), blockquote(paragraph("Quoted")))
      )
    );

    expect(toMarkup(doc)).toBe(
      [
        "<h1>Title</h1>",
        "",
        "<p>Hello <b>world</b>!</p>",
        "",
        "<ul>",
        "  <li>",
        "    <p>One</p>",
        "  </li>",
        "  <li>",
        "    <p>Two</p>",
        "    <blockquote>",
        "      <p>Quoted</p>",
        "    </blockquote>",
        "  </li>",
        "</ul>",
        "",
      ].join("\n")
    );
  });

  test("writes nothing for an empty document", () => {
    expect(toMarkup(document())).toBe("");
  });

  test("escapes text and attribute values", () => {
    expect(toMarkup(document(paragraph("a < b & c > d")))).toBe(
      "<p>a &lt; b &amp; c &gt; d</p>\n"
    );
    expect(toMarkup(document(paragraph(link('x?a=1&b="2"', "go"))))).toBe(
      '<p><a href="x?a=1&amp;b=&quot;2&quot;">go</a></p>\n'
    );
  });

  test("uses one tag per style", () => {
    const doc = document(
      paragraph(
        bold("b"),
        italic("i"),
        underline("u"),
        strike("s"),
        highlight("h"),
        code("c")
      )
    );
    expect(toMarkup(doc)).toBe(
      "<p><b>b</b><i>i</i><u>u</u><s>s</s><mark>h</mark><code>c</code></p>\n"
    );
  });

  test("encodes whitespace the parser would collapse or trim", () => {
    const doc = document(paragraph(" lead", bold("mid  dle"), "trail "));
    expect(toMarkup(doc)).toBe(
      "<p>&#32;lead<b>mid&#32;&#32;dle</b>trail&#32;</p>\n"
    );
    expect(toMarkup(document(paragraph("a\nb")))).toBe("<p>a&#10;b</p>\n");
  });

  test("writes code content verbatim apart from metacharacters", () => {
    expect(toMarkup(document(paragraph(code("  x  < y"))))).toBe(
      "<p><code>  x  &lt; y</code></p>\n"
    );
  });

  test("streams to a sink", () => {
    const sink = new StringSink();
    const result = writeMarkup(document(paragraph("a"), paragraph("b")), sink);
    expect(result.isOk()).toBe(true);
    expect(sink.toString()).toBe("<p>a</p>\n\n<p>b</p>\n");
  });
});

describe("round trip", () => {
  const documents: Array<[string, Document]> = [
    ["empty", document()],
    ["plain paragraph", document(paragraph("Hello world"))],
    ["empty paragraph", document(paragraph())],
    [
      "all headers",
      document(header(1, "One"), header(2, "Two"), header(3, "Three")),
    ],
    [
      "all styles",
      document(
        paragraph(
          bold("b ", italic("bi")),
          " ",
          underline("u"),
          " ",
          strike("s"),
          " ",
          highlight("h"),
          " ",
          code("c  c"),
          " ",
          link("https://x.test/?q=1&r=2", "link ", bold("text"))
        )
      ),
    ],
    ["empty link", document(paragraph(link("https://x.test")))],
    ["empty style", document(paragraph("x", bold()))],
    [
      "edge whitespace",
      document(paragraph(" lead", bold("mid  dle"), "trail ")),
    ],
    ["whitespace only", document(paragraph("   "))],
    ["code at edges", document(paragraph(code(" a "), " b ", code(" c ")))],
    ["metacharacters", document(paragraph(`<a href="x"> & </a>`))],
    ["unicode", document(paragraph("naïve · 日本 😀 "))],
    [
      "nested lists",
      document(
        orderedList(
          listItem(
            paragraph("A"),
            bulletList(listItem(paragraph("x")), listItem())
          ),
          listItem(paragraph("B"), paragraph("B2"))
        )
      ),
    ],
    [
      "nested quotes",
      document(
        blockquote(
          paragraph("outer"),
          blockquote(header(2, "inner")),
          bulletList(listItem(blockquote()))
        )
      ),
    ],
  ];

  test.each(documents)("parse(toMarkup(d)) equals d: %s", (_name, doc) => {
    expect(reparse(toMarkup(doc))).toEqual(doc);
  });

  test.each(documents)("canonical form is stable: %s", (_name, doc) => {
    const once = toMarkup(doc);
    expect(toMarkup(reparse(once))).toBe(once);
  });

  test("differently formatted input canonicalizes identically", () => {
    const compact = reparse("<ul><li><p>One <b>two</b></p></li></ul>");
    const loose = reparse(
      "<ul>\n  <li>\n <p>  One\n   <B>two</B>  </p></li>\n\n</ul>\n"
    );
    expect(toMarkup(loose)).toBe(toMarkup(compact));
  });
});
