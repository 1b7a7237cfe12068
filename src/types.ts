/**
 * Outcome of looking up a pattern document by name.
 * Every failure is reported as data; lookups never throw.
 */
export type PatternLookup =
  | { status: "found"; name: string; path: string; text: string }
  | { status: "not-found"; name: string; path: string }
  | { status: "invalid"; name: string; reason: string }
  | { status: "error"; name: string; path: string; message: string };

/**
 * Read-only access to a collection of pattern documents.
 */
export interface PatternStore {
  /** Directory the documents are read from. */
  readonly directory: string;
  getPattern(name: string): PatternLookup;
  listPatterns(): string[];
}

/**
 * Resolved runtime configuration.
 */
export interface Config {
  baseDir: string;
  designPatternsDir: string;
  /** Path of the config file that was applied, if any. */
  source: string | null;
}
