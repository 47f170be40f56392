import { OUTPUT_FORMATS } from "@tdoc/core";
import { VERSION } from "@tdoc/shared";
import { Command, CommanderError, Option } from "commander";

import { createConfigCommand } from "./commands/config";
import { parseWidth, viewAction } from "./commands/view";
import { CliError } from "./utils/errors";
import { writeErrorLine } from "./utils/output";

/**
 * Build the commander program. A fresh instance per call, so tests can run
 * it repeatedly in one process.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("tdoc")
    .description("Render FTML documents in the terminal or convert them")
    .version(VERSION)
    .exitOverride()
    .argument("[input]", "FTML file to read (- or omitted for stdin)")
    .option("--ansi", "Force ANSI styling and hyperlinks")
    .option("--no-ansi", "Plain ASCII output")
    .option("-w, --width <columns>", "Wrap column (0 disables wrapping)", parseWidth)
    .option("--bracketed", "Use [n] instead of superscript link indices")
    .option("-o, --output <file>", "Write to a file instead of stdout")
    .addOption(
      new Option("-t, --to <format>", "Output format").choices(OUTPUT_FORMATS)
    )
    .option("--verbose", "Log each step to stderr")
    .action(viewAction);

  program.addCommand(createConfigCommand().exitOverride());

  return program;
}

/**
 * Run the CLI and return its exit code. Usage errors are printed by
 * commander; CliErrors as a single line.
 */
export async function run(argv: string[] = process.argv): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof CliError) {
      writeErrorLine(error.message);
      return error.exitCode;
    }
    throw error;
  }
  return 0;
}
