import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PatternStore } from "./types.js";
import {
  PATTERN_LIST_URI,
  createGetPatternHandler,
  createListPatternsHandler,
  createPatternListReader,
  createPatternResourceReader,
  displayName,
  patternUri,
} from "./tools.js";

export const SERVER_NAME = "design-patterns";
export const SERVER_VERSION = "0.1.0";

function decodeName(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    // Malformed escapes are looked up verbatim.
    return raw;
  }
}

/**
 * Creates and configures the MCP server with the pattern tools and resources.
 */
export function createServer(store: PatternStore): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const getPatternHandler = createGetPatternHandler(store);
  const listPatternsHandler = createListPatternsHandler(store);
  const readPattern = createPatternResourceReader(store);
  const readPatternList = createPatternListReader(store);

  server.tool(
    "get_design_pattern",
    "Get the markdown documentation for a specific design pattern. Use list_design_patterns to see which names are available.",
    { pattern: z.string().describe("The name of the design pattern to retrieve (e.g. 'singleton', 'factory')") },
    async (args) => getPatternHandler(args)
  );

  server.tool(
    "list_design_patterns",
    "List the names of all available design patterns.",
    async () => listPatternsHandler()
  );

  server.resource(
    "design-pattern",
    new ResourceTemplate("design-pattern://{pattern_name}", {
      list: async () => ({
        resources: store.listPatterns().map((name) => ({
          uri: patternUri(name),
          name: displayName(name),
          mimeType: "text/markdown",
        })),
      }),
    }),
    { description: "Markdown documentation for one design pattern", mimeType: "text/markdown" },
    async (uri, variables) => {
      const value = variables.pattern_name;
      const name = Array.isArray(value) ? value.join("/") : value;
      return readPattern(uri, decodeName(name));
    }
  );

  server.resource(
    "pattern-list",
    PATTERN_LIST_URI,
    { description: "Index of all available design patterns", mimeType: "text/markdown" },
    async (uri) => readPatternList(uri)
  );

  return server;
}
