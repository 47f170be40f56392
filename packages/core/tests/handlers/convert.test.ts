import { createLogger, silentLogger } from "@tdoc/shared";
import { describe, expect, test } from "vitest";

import { convertHandler } from "../../src/handlers/convert";
import type { HandlerContext } from "../../src/handlers/types";
import { formattingStyle } from "../../src/render/terminal";
import { DEFAULT_CONFIG } from "../../src/schema/config";
import { StringSink, type TextSink } from "../../src/sink";

const ctx: HandlerContext = { config: DEFAULT_CONFIG, logger: silentLogger };

const SOURCE =
  '<p>Hi <a href="https://x.test">x</a></p><ul><li><p>a</p></li></ul>';

describe("convertHandler", () => {
  test("writes the outline format and reports counts", async () => {
    const sink = new StringSink();
    const result = await convertHandler(
      { source: SOURCE, format: "markdown", style: formattingStyle(), sink },
      ctx
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ format: "markdown", blocks: 3, links: 1 });
    }
    expect(sink.toString()).toBe("Hi [x](https://x.test)\n\n- a\n");
  });

  test("writes gemtext", async () => {
    const sink = new StringSink();
    const result = await convertHandler(
      { source: SOURCE, format: "gemini", style: formattingStyle(), sink },
      ctx
    );

    expect(result.isOk() && result.value.format).toBe("gemini");
    expect(sink.toString()).toBe("Hi x\n=> https://x.test x\n\n* a\n");
  });

  test("writes canonical markup from bytes", async () => {
    const sink = new StringSink();
    const result = await convertHandler(
      {
        source: new TextEncoder().encode("<p>  café </p>"),
        format: "ftml",
        style: formattingStyle(),
        sink,
      },
      ctx
    );

    expect(result.isOk()).toBe(true);
    expect(sink.toString()).toBe("<p>café</p>\n");
  });

  test("text output never carries escape sequences", async () => {
    const style = formattingStyle({ ansi: true });
    const text = new StringSink();
    const terminal = new StringSink();

    await convertHandler(
      { source: "<p><b>x</b></p>", format: "text", style, sink: text },
      ctx
    );
    await convertHandler(
      { source: "<p><b>x</b></p>", format: "terminal", style, sink: terminal },
      ctx
    );

    expect(text.toString()).toBe("*x*\n");
    expect(terminal.toString()).toBe("\x1b[1mx\x1b[22m\n");
  });

  test("returns the parse error and writes nothing", async () => {
    const sink = new StringSink();
    const result = await convertHandler(
      { source: "<p>", format: "ftml", style: formattingStyle(), sink },
      ctx
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(
        "<p> is never closed at line 1, column 1"
      );
    }
    expect(sink.toString()).toBe("");
  });

  test("returns the sink error", async () => {
    const failure = new Error("closed");
    const sink: TextSink = {
      write() {
        throw failure;
      },
    };
    const result = await convertHandler(
      { source: "<p>a</p>", format: "ftml", style: formattingStyle(), sink },
      ctx
    );
    expect(result.isErr() && result.error).toBe(failure);
  });

  test("logs each step with the source name", async () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: "debug",
      write: (line) => lines.push(line),
    });

    await convertHandler(
      {
        source: SOURCE,
        name: "doc.ftml",
        format: "markdown",
        style: formattingStyle(),
        sink: new StringSink(),
      },
      { config: DEFAULT_CONFIG, logger }
    );
    await convertHandler(
      {
        source: "<p>",
        name: "bad.ftml",
        format: "markdown",
        style: formattingStyle(),
        sink: new StringSink(),
      },
      { config: DEFAULT_CONFIG, logger }
    );

    expect(lines).toEqual([
      '[debug] Parsed document {"source":"doc.ftml","blocks":3,"links":1}',
      '[debug] Wrote document {"source":"doc.ftml","format":"markdown"}',
      '[debug] Parse failed {"source":"bad.ftml","kind":"UnclosedElement","offset":0}',
    ]);
  });
});
