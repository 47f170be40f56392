import { createLogger } from "@tdoc/shared";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import {
  applyEnvOverrides,
  getConfigPaths,
  getConfigValue,
  loadConfig,
  parseConfigText,
  serializeConfigObject,
} from "../src/config";
import { resolvePaths } from "../src/paths";
import { DEFAULT_CONFIG } from "../src/schema/config";

let root: string;
let xdg: string;
let projectDir: string;
let cwd: string;

function capture() {
  const lines: string[] = [];
  const logger = createLogger({
    level: "warn",
    write: (line) => lines.push(line),
  });
  return { lines, logger };
}

async function writeUserConfig(content: string): Promise<void> {
  await mkdir(join(xdg, "tdoc"), { recursive: true });
  await writeFile(join(xdg, "tdoc", "config.toml"), content);
}

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "tdoc-config-"));
  xdg = join(root, "xdg");
  projectDir = join(root, "project");
  cwd = join(projectDir, "docs", "nested");
  await mkdir(cwd, { recursive: true });
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("loadConfig", () => {
  test("returns defaults without config files", async () => {
    const config = await loadConfig({ cwd, env: { XDG_CONFIG_HOME: xdg } });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config).toEqual({
      render: { color: "auto", link_index_format: "superscript" },
      log_level: "warn",
    });
  });

  test("merges user, project and environment in order", async () => {
    await writeUserConfig(
      'log_level = "info"\n[render]\nwidth = 60\ncolor = "never"\n'
    );
    await writeFile(
      join(projectDir, ".tdoc.toml"),
      "[render]\nwidth = 72 # project width\n"
    );

    const files = await loadConfig({ cwd, env: { XDG_CONFIG_HOME: xdg } });
    expect(files.log_level).toBe("info");
    expect(files.render).toEqual({
      width: 72,
      color: "never",
      link_index_format: "superscript",
    });

    const withEnv = await loadConfig({
      cwd,
      env: {
        XDG_CONFIG_HOME: xdg,
        TDOC_RENDER_WIDTH: "100",
        TDOC_OUTPUT_DEFAULT_FORMAT: "markdown",
      },
    });
    expect(withEnv.render.width).toBe(100);
    expect(withEnv.output).toEqual({ default_format: "markdown" });
  });

  test("warns about and skips an unparseable environment value", async () => {
    await writeUserConfig("[render]\nwidth = 60\n");
    const { lines, logger } = capture();

    const config = await loadConfig({
      cwd,
      env: { XDG_CONFIG_HOME: xdg, TDOC_RENDER_WIDTH: "wide" },
      logger,
    });

    expect(config.render.width).toBe(60);
    expect(lines).toEqual([
      '[warn] Ignoring TDOC_RENDER_WIDTH {"reason":"Invalid integer value: wide"}',
    ]);
  });

  test("falls back to defaults for an invalid config", async () => {
    await writeUserConfig('[render]\ncolor = "sometimes"\n');
    const { lines, logger } = capture();

    const config = await loadConfig({
      cwd,
      env: { XDG_CONFIG_HOME: xdg },
      logger,
    });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /^\[warn\] Failed to parse config, using defaults \{"issues":\["render\.color: /
    );
  });

  test("throws for an invalid config in strict mode", async () => {
    await writeUserConfig("[render]\nwidth = -1\n");
    await expect(
      loadConfig({ cwd, env: { XDG_CONFIG_HOME: xdg }, strict: true })
    ).rejects.toThrow();
  });
});

describe("config paths", () => {
  test("honors XDG_CONFIG_HOME", () => {
    expect(resolvePaths({ XDG_CONFIG_HOME: "/home/test/.xdg" })).toEqual({
      config: "/home/test/.xdg/tdoc",
      configFile: "/home/test/.xdg/tdoc/config.toml",
    });
  });

  test("finds the project config in a parent directory", async () => {
    await writeFile(join(projectDir, ".tdoc.toml"), "");
    expect(await getConfigPaths(cwd, { XDG_CONFIG_HOME: xdg })).toEqual({
      user: join(xdg, "tdoc", "config.toml"),
      project: join(projectDir, ".tdoc.toml"),
    });
  });
});

describe("applyEnvOverrides", () => {
  test("trims string values into their section", () => {
    expect(applyEnvOverrides({}, { TDOC_RENDER_COLOR: " always " })).toEqual({
      render: { color: "always" },
    });
  });

  test("ignores unrelated variables", () => {
    expect(applyEnvOverrides({ a: 1 }, { HOME: "/home/test" })).toEqual({
      a: 1,
    });
  });
});

describe("TOML subset", () => {
  test("parseConfigText", () => {
    const text = [
      "# tdoc settings",
      'log_level = "debug" # trailing comment',
      "",
      "[render]",
      "width = 40",
      'flags = [1, "a,b", true]',
      "name = bare",
      "ratio = 0.5",
    ].join("\n");

    expect(parseConfigText(text)).toEqual({
      log_level: "debug",
      render: { width: 40, flags: [1, "a,b", true], name: "bare", ratio: 0.5 },
    });
  });

  test("keeps # inside quoted strings", () => {
    expect(parseConfigText('title = "a # b"')).toEqual({ title: "a # b" });
  });

  test("serializeConfigObject", () => {
    expect(
      serializeConfigObject({
        log_level: "warn",
        render: { width: 60, color: "auto" },
      })
    ).toBe('log_level = "warn"\n\n[render]\nwidth = 60\ncolor = "auto"\n');
  });

  test("serialized config parses back", () => {
    const config = {
      log_level: "info",
      render: { width: 100, link_index_format: "bracketed" },
      output: { default_format: "markdown" },
    };
    expect(parseConfigText(serializeConfigObject(config))).toEqual(config);
  });
});

describe("getConfigValue", () => {
  test("reads dotted keys", () => {
    expect(getConfigValue(DEFAULT_CONFIG, "render.color")).toBe("auto");
    expect(getConfigValue(DEFAULT_CONFIG, "log_level")).toBe("warn");
  });

  test("returns undefined for missing keys", () => {
    expect(getConfigValue(DEFAULT_CONFIG, "render.missing")).toBeUndefined();
    expect(getConfigValue(DEFAULT_CONFIG, "log_level.deep")).toBeUndefined();
  });
});
