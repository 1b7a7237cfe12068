import { Command } from "commander";
import chalk from "chalk";
import { resolve } from "node:path";
import { DEFAULT_EXCLUDED_FILES, cleanDirectory, failedFiles, modifiedFiles, type CleanupReport } from "../../cleanup.js";
import { createCliLogger, resolveCliConfig, type ConfigOptions } from "../context.js";

interface CleanOptions extends ConfigOptions {
  exclude?: string[];
  dryRun?: boolean;
}

/**
 * Create the clean command: strips Russian content and EN:/RU: markers from pattern files.
 */
export function createCleanCommand(): Command {
  return new Command("clean")
    .description("Remove Russian content and EN:/RU: prefixes from markdown pattern files")
    .argument("[dir]", "Directory to clean (defaults to the configured pattern directory)")
    .option("-e, --exclude <files...>", "File names to leave untouched", [...DEFAULT_EXCLUDED_FILES])
    .option("--dry-run", "Report which files would change without writing them")
    .option("-c, --config <path>", "Path to config.json")
    .option("-q, --quiet", "Only log warnings and errors")
    .action((dir: string | undefined, options: CleanOptions) => {
      const log = createCliLogger(options);
      const directory = dir ? resolve(dir) : resolveCliConfig(options, log).designPatternsDir;

      console.log("Starting cleanup of markdown files...");
      console.log(`Directory: ${directory}\n`);

      const report = cleanDirectory(directory, {
        exclude: options.exclude,
        dryRun: options.dryRun,
        logger: log,
      });
      printReport(report);
    });
}

/**
 * Prints the summary of a cleanup run.
 */
export function printReport(report: CleanupReport): void {
  if (report.listingError) {
    console.log(chalk.red(`Could not read ${report.directory}: ${report.listingError}`));
    return;
  }

  if (report.files.length === 0) {
    console.log("No markdown files found to clean.");
    return;
  }

  console.log(`Found ${report.files.length} markdown files to process:`);
  for (const file of report.files) {
    console.log(`  - ${file}`);
  }

  const modified = modifiedFiles(report);
  const failed = failedFiles(report);

  console.log(chalk.bold(`\nCleanup ${report.dryRun ? "dry run " : ""}completed!`));
  console.log(`Files processed: ${report.files.length}`);
  console.log(`Files ${report.dryRun ? "that would be modified" : "modified"}: ${modified.length}`);

  if (modified.length > 0) {
    console.log(`\n${report.dryRun ? "Would modify" : "Modified files"}:`);
    for (const file of modified) {
      console.log(chalk.green(`  [OK] ${file}`));
    }
  }

  if (failed.length > 0) {
    console.log("\nFailed files:");
    for (const { file, message } of failed) {
      console.log(chalk.red(`  [ERROR] ${file}: ${message}`));
    }
  }
}
