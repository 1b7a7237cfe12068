import { writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { errorMessage, listMarkdownFiles, readUtf8File } from "./files.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { sanitizeMarkdown } from "./sanitizer.js";
import { DEFAULT_RULES, type SanitizerRules } from "./sanitizer-rules.js";

/**
 * Hand-written templates and summaries that are never rewritten.
 */
export const DEFAULT_EXCLUDED_FILES: readonly string[] = [
  "singleton.md",
  "singleton_threadsafe.md",
  "README_Generation_Summary.md",
];

export interface CleanupOptions {
  exclude?: readonly string[];
  /** Report what would change without writing anything. */
  dryRun?: boolean;
  rules?: SanitizerRules;
  logger?: Logger;
}

export type FileCleanupResult =
  | { file: string; status: "modified" | "unchanged" }
  | { file: string; status: "failed"; message: string };

export interface CleanupReport {
  directory: string;
  dryRun: boolean;
  /** File names that were considered, in processing order. */
  files: string[];
  excluded: string[];
  results: FileCleanupResult[];
  /** Set when the directory itself could not be listed. */
  listingError?: string;
}

/**
 * Sanitizes one markdown file in place. The file is only written when its
 * cleaned text differs from the original.
 */
export function cleanFile(path: string, options: CleanupOptions = {}): FileCleanupResult {
  const log = options.logger ?? defaultLogger;
  const file = basename(path);

  let original: string;
  try {
    original = readUtf8File(path);
  } catch (err) {
    const message = errorMessage(err);
    log.error(`Error processing ${file}: ${message}`);
    return { file, status: "failed", message };
  }

  const cleaned = sanitizeMarkdown(original, options.rules ?? DEFAULT_RULES);
  if (cleaned === original) {
    log.info(`No changes needed for ${file}`);
    return { file, status: "unchanged" };
  }

  if (!options.dryRun) {
    try {
      writeFileSync(path, cleaned, "utf-8");
    } catch (err) {
      const message = errorMessage(err);
      log.error(`Error writing ${file}: ${message}`);
      return { file, status: "failed", message };
    }
  }

  log.info(`${options.dryRun ? "Would clean" : "Cleaned"} ${file}`);
  return { file, status: "modified" };
}

/**
 * Sanitizes every markdown file in a directory except the excluded ones.
 * A failing file is recorded and the remaining files are still processed.
 */
export function cleanDirectory(directory: string, options: CleanupOptions = {}): CleanupReport {
  const log = options.logger ?? defaultLogger;
  const exclude = new Set(options.exclude ?? DEFAULT_EXCLUDED_FILES);
  const report: CleanupReport = {
    directory,
    dryRun: options.dryRun ?? false,
    files: [],
    excluded: [],
    results: [],
  };

  let names: string[];
  try {
    names = listMarkdownFiles(directory).sort();
  } catch (err) {
    report.listingError = errorMessage(err);
    log.error(`Error listing ${directory}: ${report.listingError}`);
    return report;
  }

  for (const name of names) {
    if (exclude.has(name)) {
      report.excluded.push(name);
    } else {
      report.files.push(name);
    }
  }

  for (const name of report.files) {
    report.results.push(cleanFile(join(directory, name), { ...options, logger: log }));
  }

  return report;
}

export function modifiedFiles(report: CleanupReport): string[] {
  return report.results.filter((r) => r.status === "modified").map((r) => r.file);
}

export function failedFiles(report: CleanupReport): Array<{ file: string; message: string }> {
  const failed: Array<{ file: string; message: string }> = [];
  for (const result of report.results) {
    if (result.status === "failed") failed.push({ file: result.file, message: result.message });
  }
  return failed;
}
