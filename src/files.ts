import { readFileSync, readdirSync } from "node:fs";

export const PATTERN_SUFFIX = ".md";

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Reads a file as strict UTF-8. Invalid byte sequences throw instead of
 * being replaced, and a leading byte order mark is kept as-is.
 */
export function readUtf8File(path: string): string {
  return utf8.decode(readFileSync(path));
}

/**
 * Lists the names of markdown files (regular files or symlinks) in a directory.
 * Throws if the directory cannot be read.
 */
export function listMarkdownFiles(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => (entry.isFile() || entry.isSymbolicLink()) && entry.name.endsWith(PATTERN_SUFFIX))
    .map((entry) => entry.name);
}

/**
 * Turns any thrown value into a message suitable for a result payload or log line.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
