import envPaths from "env-paths";
import { join } from "node:path";

export interface TdocPaths {
  /** Config directory (~/.config/tdoc) */
  config: string;
  /** User config file */
  configFile: string;
}

/**
 * Resolve paths with XDG override support.
 *
 * On macOS, env-paths uses native Apple paths (~/Library/...) by default,
 * ignoring XDG environment variables. An explicitly set XDG_CONFIG_HOME is
 * honored on every platform.
 */
export function resolvePaths(env: NodeJS.ProcessEnv = process.env): TdocPaths {
  const xdgConfig = env["XDG_CONFIG_HOME"];
  const config = xdgConfig
    ? join(xdgConfig, "tdoc")
    : envPaths("tdoc", { suffix: "" }).config;

  return {
    config,
    configFile: join(config, "config.toml"),
  };
}
