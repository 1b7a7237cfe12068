import { existsSync } from "node:fs";
import { join } from "node:path";
import type { PatternLookup, PatternStore } from "./types.js";
import { PATTERN_SUFFIX, errorMessage, listMarkdownFiles, readUtf8File } from "./files.js";
import { logger as defaultLogger, type Logger } from "./logger.js";

/**
 * Returns why a pattern name is unusable as a file name, or undefined if it is fine.
 * Names are joined straight into a path, so anything that could leave the
 * pattern directory is refused.
 */
export function validatePatternName(name: string): string | undefined {
  if (name.trim() === "") return "Pattern name must not be empty.";
  if (name.includes("/") || name.includes("\\")) return "Pattern name must not contain path separators.";
  if (name.includes("..")) return "Pattern name must not contain parent-directory sequences.";
  if (name.includes("\0")) return "Pattern name must not contain NUL bytes.";
  return undefined;
}

/**
 * Pattern store backed by a directory of `<name>.md` files.
 * Stateless: every call goes to the filesystem.
 */
export class FilePatternStore implements PatternStore {
  private readonly log: Logger;

  constructor(
    readonly directory: string,
    log: Logger = defaultLogger
  ) {
    this.log = log.child("store");
  }

  getPatternPath(name: string): string {
    return join(this.directory, `${name}${PATTERN_SUFFIX}`);
  }

  getPattern(name: string): PatternLookup {
    const reason = validatePatternName(name);
    if (reason) {
      this.log.warn(`Rejected pattern name ${JSON.stringify(name)}: ${reason}`);
      return { status: "invalid", name, reason };
    }

    const path = this.getPatternPath(name);
    this.log.info(`Looking for pattern file: ${path}`);

    if (!existsSync(path)) {
      this.log.warn(`Pattern file not found: ${path}`);
      return { status: "not-found", name, path };
    }

    try {
      const text = readUtf8File(path);
      this.log.info(`Successfully read pattern: ${name}`);
      return { status: "found", name, path, text };
    } catch (err) {
      const message = errorMessage(err);
      this.log.error(`Error reading pattern file ${path}: ${message}`);
      return { status: "error", name, path, message };
    }
  }

  listPatterns(): string[] {
    let files: string[];
    try {
      files = listMarkdownFiles(this.directory);
    } catch (err) {
      this.log.error(`Error listing patterns in ${this.directory}: ${errorMessage(err)}`);
      return [];
    }

    const names = new Set(files.map((file) => file.slice(0, -PATTERN_SUFFIX.length)));
    return [...names].filter((name) => name.length > 0).sort();
  }
}
