import { describe, expect, test } from "vitest";

import { createLogger, isLogLevel } from "../src/logger";

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(line) };
}

describe("createLogger", () => {
  test("drops messages below the minimum level", () => {
    const out = capture();
    const logger = createLogger({ level: "warn", write: out.write });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("also shown");

    expect(out.lines).toEqual(["[warn] shown", "[error] also shown"]);
  });

  test("formats name and merged context", () => {
    const out = capture();
    const logger = createLogger({
      level: "debug",
      name: "parse",
      context: { file: "a.ftml" },
      write: out.write,
    });

    logger.debug("parsed", { blocks: 2 });

    expect(out.lines).toEqual([
      '[debug] parse: parsed {"file":"a.ftml","blocks":2}',
    ]);
  });

  test("child loggers inherit level, name and context", () => {
    const out = capture();
    const logger = createLogger({
      level: "info",
      name: "cli",
      context: { a: 1 },
      write: out.write,
    });

    const child = logger.child({ b: 2 });
    child.debug("hidden");
    child.info("hello");

    expect(out.lines).toEqual(['[info] cli: hello {"a":1,"b":2}']);
  });

  test("silent loggers write nothing", () => {
    const out = capture();
    const logger = createLogger({ silent: true, write: out.write });

    logger.fatal("nope");

    expect(out.lines).toEqual([]);
  });
});

describe("isLogLevel", () => {
  test("accepts known levels only", () => {
    expect(isLogLevel("trace")).toBe(true);
    expect(isLogLevel("fatal")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
