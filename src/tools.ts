import type { PatternLookup, PatternStore } from "./types.js";

interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

interface ResourceResult {
  [key: string]: unknown;
  contents: Array<{ uri: string; mimeType: string; text: string }>;
}

export const PATTERN_URI_PREFIX = "design-pattern://";
export const PATTERN_LIST_URI = "patterns://list";

/**
 * Resource URI for a pattern. The name is percent-encoded; the server decodes it on read.
 */
export function patternUri(name: string): string {
  return `${PATTERN_URI_PREFIX}${encodeURIComponent(name)}`;
}

/**
 * Message shown to clients for a lookup that did not produce a document.
 */
export function describeFailure(lookup: Exclude<PatternLookup, { status: "found" }>): string {
  switch (lookup.status) {
    case "not-found":
      return `Pattern "${lookup.name}" not found.`;
    case "invalid":
      return `Invalid pattern name "${lookup.name}": ${lookup.reason}`;
    case "error":
      return `Error reading pattern "${lookup.name}": ${lookup.message}`;
  }
}

/**
 * Creates a handler for the `get_design_pattern` tool.
 * Returns the markdown document, or an error result when it cannot be served.
 */
export function createGetPatternHandler(store: PatternStore) {
  return async (args: { pattern: string }): Promise<ToolResult> => {
    const lookup = store.getPattern(args.pattern);
    if (lookup.status !== "found") {
      return {
        content: [{ type: "text", text: describeFailure(lookup) }],
        isError: true,
      };
    }

    return {
      content: [{ type: "text", text: lookup.text }],
    };
  };
}

/**
 * Creates a handler for the `list_design_patterns` tool.
 */
export function createListPatternsHandler(store: PatternStore) {
  return async (): Promise<ToolResult> => {
    return {
      content: [{ type: "text", text: JSON.stringify(store.listPatterns(), null, 2) }],
    };
  };
}

/**
 * Creates the reader behind the `design-pattern://{pattern_name}` resource.
 * Failures are returned as text, like the tool's error messages.
 */
export function createPatternResourceReader(store: PatternStore) {
  return async (uri: URL, name: string): Promise<ResourceResult> => {
    const lookup = store.getPattern(name);
    const text = lookup.status === "found" ? lookup.text : describeFailure(lookup);
    return {
      contents: [{ uri: uri.href, mimeType: "text/markdown", text }],
    };
  };
}

/**
 * Title-cases a pattern name for display: first letter upper, rest lower.
 */
export function displayName(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
}

/**
 * Renders the markdown index served at `patterns://list`.
 */
export function renderPatternIndex(names: readonly string[]): string {
  if (names.length === 0) {
    return "No design patterns available.";
  }

  let result = "# Available Design Patterns\n\n";
  for (const name of names) {
    result += `- [${displayName(name)}](${patternUri(name)})\n`;
  }
  return result;
}

/**
 * Creates the reader behind the `patterns://list` resource.
 */
export function createPatternListReader(store: PatternStore) {
  return async (uri: URL): Promise<ResourceResult> => {
    return {
      contents: [{ uri: uri.href, mimeType: "text/markdown", text: renderPatternIndex(store.listPatterns()) }],
    };
  };
}
