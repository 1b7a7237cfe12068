import { Command } from "commander";
import chalk from "chalk";
import { FilePatternStore } from "../../fs-store.js";
import type { PatternStore } from "../../types.js";
import { describeFailure } from "../../tools.js";
import { createCliLogger, resolveCliConfig, type ConfigOptions } from "../context.js";

const PREVIEW_LENGTH = 100;

interface ReadOptions extends ConfigOptions {
  full?: boolean;
}

/**
 * Create the read command: reads pattern files directly, bypassing the MCP server.
 */
export function createReadCommand(): Command {
  return new Command("read")
    .description("Read pattern documents straight from disk and print their content and length")
    .argument("<patterns...>", "Pattern names to read (e.g. singleton factory)")
    .option("--full", "Print the whole document instead of a preview")
    .option("-d, --dir <path>", "Pattern directory (overrides config.json)")
    .option("-c, --config <path>", "Path to config.json")
    .option("-q, --quiet", "Only log warnings and errors")
    .action((patterns: string[], options: ReadOptions) => {
      const log = createCliLogger(options);
      const config = resolveCliConfig(options, log);
      runRead(new FilePatternStore(config.designPatternsDir, log), patterns, options);
    });
}

/**
 * Prints each requested pattern. Missing or unreadable patterns are reported, not thrown.
 */
export function runRead(store: PatternStore, patterns: readonly string[], options: { full?: boolean } = {}): void {
  for (const name of patterns) {
    console.log(chalk.bold(`\nTesting with '${name}' pattern:`));

    const lookup = store.getPattern(name);
    if (lookup.status !== "found") {
      console.log(chalk.yellow(describeFailure(lookup)));
      continue;
    }

    // Counted in code points so the preview never splits a surrogate pair.
    const chars = [...lookup.text];
    if (options.full || chars.length <= PREVIEW_LENGTH) {
      console.log(lookup.text);
    } else {
      console.log(`Pattern content (first ${PREVIEW_LENGTH} chars):`);
      console.log(`${chars.slice(0, PREVIEW_LENGTH).join("")}...`);
    }
    console.log(chalk.green(`Total content length: ${chars.length} characters`));
  }
}
