import { silentLogger, type Logger } from "@tdoc/shared";
import { readFile, stat } from "node:fs/promises";
import { dirname, join } from "node:path";

import { resolvePaths } from "./paths";
import { DEFAULT_CONFIG, TdocConfigSchema, type TdocConfig } from "./schema/config";

const PROJECT_CONFIG_FILENAME = ".tdoc.toml";

// --------------------------------------------------------------------------
// Environment variable overrides
// --------------------------------------------------------------------------

type EnvParser<T> = (value: string) => T;

const parseEnvInteger: EnvParser<number> = (value) => {
  const num = Number.parseInt(value, 10);
  if (Number.isNaN(num)) {
    throw new TypeError(`Invalid integer value: ${value}`);
  }
  return num;
};

const parseEnvString: EnvParser<string> = (value) => value.trim();

interface EnvMapping {
  path: string[];
  parse: EnvParser<unknown>;
}

/**
 * Mapping of environment variable names to config paths and parsers.
 *
 * Naming convention: TDOC_{SECTION}_{KEY} (all uppercase, underscores)
 *
 * Precedence (highest to lowest):
 * 1. Environment variables
 * 2. Project config (.tdoc.toml)
 * 3. User config (~/.config/tdoc/config.toml)
 * 4. Schema defaults
 */
const ENV_MAP: Record<string, EnvMapping> = {
  TDOC_LOG_LEVEL: { path: ["log_level"], parse: parseEnvString },

  // Render section
  TDOC_RENDER_WIDTH: { path: ["render", "width"], parse: parseEnvInteger },
  TDOC_RENDER_COLOR: { path: ["render", "color"], parse: parseEnvString },
  TDOC_RENDER_LINK_INDEX_FORMAT: {
    path: ["render", "link_index_format"],
    parse: parseEnvString,
  },

  // Output section
  TDOC_OUTPUT_DEFAULT_FORMAT: {
    path: ["output", "default_format"],
    parse: parseEnvString,
  },
};

/**
 * Apply environment variable overrides to config.
 * Env vars take precedence over file-based config; unparseable values are
 * reported and skipped.
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = silentLogger
): Record<string, unknown> {
  for (const [envKey, { path, parse }] of Object.entries(ENV_MAP)) {
    const value = env[envKey];
    if (value === undefined) {
      continue;
    }
    try {
      setNestedValue(config, path, parse(value));
    } catch (error) {
      logger.warn(`Ignoring ${envKey}`, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return config;
}

// --------------------------------------------------------------------------
// Loading
// --------------------------------------------------------------------------

export interface ConfigPaths {
  user: string;
  project?: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Throw on an invalid config instead of falling back to defaults */
  strict?: boolean;
}

/**
 * Load configuration.
 * Returns user + project config files merged, with env overrides applied.
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<TdocConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const logger = options.logger ?? silentLogger;

  const paths = await getConfigPaths(cwd, env);
  const userConfig = await readConfigFile(paths.user);
  const projectConfig = paths.project
    ? await readConfigFile(paths.project)
    : null;
  logger.debug("Config files", {
    user: userConfig ? paths.user : null,
    project: projectConfig ? (paths.project ?? null) : null,
  });

  const merged = mergeDeep(userConfig ?? {}, projectConfig ?? {});
  const withEnv = applyEnvOverrides(merged, env, logger);

  const parsed = TdocConfigSchema.safeParse(withEnv);
  if (parsed.success) {
    return parsed.data;
  }
  if (options.strict) {
    throw parsed.error;
  }
  logger.warn("Failed to parse config, using defaults", {
    issues: parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    ),
  });
  return DEFAULT_CONFIG;
}

async function readConfigFile(
  path: string
): Promise<Record<string, unknown> | null> {
  if (!(await isFile(path))) {
    return null;
  }
  return parseTOML(await readFile(path, "utf8"));
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function findFileUp(
  filename: string,
  startDir: string
): Promise<string | null> {
  let dir = startDir;

  for (;;) {
    const filePath = join(dir, filename);
    if (await isFile(filePath)) {
      return filePath;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export async function findProjectConfigPath(
  cwd: string = process.cwd()
): Promise<string | null> {
  return await findFileUp(PROJECT_CONFIG_FILENAME, cwd);
}

export async function getConfigPaths(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<ConfigPaths> {
  const project = await findProjectConfigPath(cwd);
  const user = resolvePaths(env).configFile;
  return project ? { user, project } : { user };
}

// --------------------------------------------------------------------------
// TOML subset
// --------------------------------------------------------------------------

/**
 * Simple TOML parser for flat config files.
 * Handles sections, key = value pairs, strings, numbers, booleans and
 * arrays.
 */
function parseTOML(text: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  let currentSection: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const content = stripInlineComment(line.trim());
    if (!content) {
      continue;
    }

    if (content.startsWith("[") && content.endsWith("]")) {
      currentSection = content
        .slice(1, -1)
        .split(".")
        .map((part) => part.trim())
        .filter(Boolean);
      ensureNestedObject(result, currentSection);
      continue;
    }

    const match = content.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.+)$/);
    const key = match?.[1];
    const rawValue = match?.[2];
    if (!key || !rawValue) {
      continue;
    }

    const path = [...currentSection, ...key.split(".")].filter(Boolean);
    setNestedValue(result, path, parseValue(rawValue.trim()));
  }

  return result;
}

/**
 * Parse a TOML value.
 */
function parseValue(value: string): unknown {
  if (value === "true" || value === "false") {
    return value === "true";
  }
  if (/^-?\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  if (/^-?\d+\.\d+$/.test(value)) {
    return Number.parseFloat(value);
  }
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1);
  }
  if (value.startsWith("[") && value.endsWith("]")) {
    const inner = value.slice(1, -1).trim();
    return inner === ""
      ? []
      : splitArrayValues(inner).map((item) => parseValue(item));
  }
  // Bare string
  return value;
}

/** Split array items on commas outside quotes. */
function splitArrayValues(inner: string): string[] {
  const items: string[] = [];
  let current = "";
  let quote = "";

  for (const char of inner) {
    if (quote) {
      current += char;
      if (char === quote) {
        quote = "";
      }
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
      current += char;
      continue;
    }
    if (char === ",") {
      if (current.trim()) {
        items.push(current.trim());
      }
      current = "";
      continue;
    }
    current += char;
  }

  if (current.trim()) {
    items.push(current.trim());
  }
  return items;
}

function stripInlineComment(value: string): string {
  let quote = "";

  for (let i = 0; i < value.length; i += 1) {
    const char = value.charAt(i);
    if (quote) {
      if (char === quote) {
        quote = "";
      }
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
      continue;
    }
    if (char === "#") {
      return value.slice(0, i).trim();
    }
  }

  return value;
}

// --------------------------------------------------------------------------
// Object helpers
// --------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function ensureNestedObject(
  target: Record<string, unknown>,
  path: string[]
): Record<string, unknown> {
  let cursor = target;
  for (const key of path) {
    const existing = cursor[key];
    if (isPlainObject(existing)) {
      cursor = existing;
      continue;
    }
    const next: Record<string, unknown> = {};
    cursor[key] = next;
    cursor = next;
  }
  return cursor;
}

function setNestedValue(
  target: Record<string, unknown>,
  path: string[],
  value: unknown
): void {
  const key = path.at(-1);
  if (key === undefined) {
    return;
  }
  ensureNestedObject(target, path.slice(0, -1))[key] = value;
}

/** Read a dotted key such as "render.width". */
export function getConfigValue(
  config: Record<string, unknown>,
  dottedKey: string
): unknown {
  let cursor: unknown = config;
  for (const key of dottedKey.split(".")) {
    if (!isPlainObject(cursor)) {
      return undefined;
    }
    cursor = cursor[key];
  }
  return cursor;
}

function mergeDeep(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const existing = result[key];
    result[key] =
      isPlainObject(existing) && isPlainObject(value)
        ? mergeDeep(existing, value)
        : value;
  }
  return result;
}

// --------------------------------------------------------------------------
// Serialization
// --------------------------------------------------------------------------

function serializeValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => serializeValue(item)).join(", ")}]`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(String(value));
}

function serializeObject(
  section: Record<string, unknown>,
  prefix: string[] = []
): string[] {
  const lines: string[] = [];
  const entries = Object.entries(section).filter(
    ([, value]) => value !== undefined
  );

  for (const [key, value] of entries) {
    if (!isPlainObject(value)) {
      lines.push(`${key} = ${serializeValue(value)}`);
    }
  }

  for (const [key, value] of entries) {
    if (isPlainObject(value)) {
      const nextPrefix = [...prefix, key];
      lines.push("", `[${nextPrefix.join(".")}]`);
      lines.push(...serializeObject(value, nextPrefix));
    }
  }

  return lines;
}

export function parseConfigText(text: string): Record<string, unknown> {
  return parseTOML(text);
}

export function serializeConfigObject(config: Record<string, unknown>): string {
  return [...serializeObject(config), ""].join("\n");
}
