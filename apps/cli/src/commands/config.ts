import {
  getConfigPaths,
  getConfigValue,
  loadConfig,
  serializeConfigObject,
} from "@tdoc/core";
import { Command } from "commander";

import { createCliLogger } from "../utils/logger";
import { writeLine } from "../utils/output";

interface ConfigCommandOptions {
  path?: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatValue(value: unknown): string {
  if (value === undefined) {
    return "";
  }
  return Array.isArray(value) ? JSON.stringify(value) : String(value);
}

export function createConfigCommand(): Command {
  return new Command("config")
    .description("Show the effective configuration")
    .argument("[key]", "Configuration key (dot-separated)")
    .option("--path", "Show config file locations")
    .action(async (key: string | undefined, options: ConfigCommandOptions) => {
      if (options.path) {
        const paths = await getConfigPaths();
        writeLine(`Config:  ${paths.user}`);
        if (paths.project) {
          writeLine(`Project: ${paths.project}`);
        }
        return;
      }

      const config = await loadConfig({ logger: createCliLogger("warn") });
      if (!key) {
        process.stdout.write(serializeConfigObject(config));
        return;
      }

      const value = getConfigValue(config, key.trim());
      if (isPlainObject(value)) {
        process.stdout.write(serializeConfigObject(value));
        return;
      }
      writeLine(formatValue(value));
    });
}
