import { Command } from "commander";
import chalk from "chalk";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { FilePatternStore } from "../../fs-store.js";
import { createServer } from "../../server.js";
import type { PatternStore } from "../../types.js";
import { PATTERN_LIST_URI } from "../../tools.js";
import { createCliLogger, resolveCliConfig, type ConfigOptions } from "../context.js";

interface ClientOptions extends ConfigOptions {
  pattern?: string;
}

/**
 * Create the client command: exercises the MCP server end to end, in process.
 */
export function createClientCommand(): Command {
  return new Command("client")
    .description("Connect an MCP client to the server in process, list patterns and read one")
    .option("-p, --pattern <name>", "Pattern to read (defaults to the first available)")
    .option("-d, --dir <path>", "Pattern directory (overrides config.json)")
    .option("-c, --config <path>", "Path to config.json")
    .option("-q, --quiet", "Only log warnings and errors")
    .action(async (options: ClientOptions) => {
      const log = createCliLogger(options);
      const config = resolveCliConfig(options, log);
      await runClient(new FilePatternStore(config.designPatternsDir, log), options.pattern);
    });
}

function parseToolResult(result: unknown): { text: string; isError: boolean } {
  const parsed = CallToolResultSchema.parse(result);
  const text = parsed.content.map((item) => (item.type === "text" ? item.text : "")).join("");
  return { text, isError: parsed.isError ?? false };
}

/**
 * Lists tools and patterns through the protocol, then prints one pattern document.
 */
export async function runClient(store: PatternStore, pattern?: string): Promise<void> {
  const server = createServer(store);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  const client = new Client({ name: "design-patterns-client", version: "1.0.0" });
  await client.connect(clientTransport);

  try {
    const tools = await client.listTools();
    console.log(chalk.bold("Available tools:"));
    for (const tool of tools.tools) {
      console.log(`- ${tool.name}`);
    }

    const listed = parseToolResult(await client.callTool({ name: "list_design_patterns", arguments: {} }));
    const names: unknown = JSON.parse(listed.text);
    const patterns = Array.isArray(names) ? names.filter((n): n is string => typeof n === "string") : [];

    const target = pattern ?? patterns[0];
    if (!target) {
      console.log(chalk.red("No patterns found!"));
      return;
    }

    const document = parseToolResult(
      await client.callTool({ name: "get_design_pattern", arguments: { pattern: target } })
    );
    if (document.isError) {
      console.log(chalk.yellow(document.text));
    } else {
      console.log(chalk.bold(`\n${target} pattern content:`));
      console.log("----------------------------");
      console.log(document.text);
      console.log("----------------------------");
    }

    const index = await client.readResource({ uri: PATTERN_LIST_URI });
    console.log(chalk.bold("\nListing all available patterns:"));
    for (const content of index.contents) {
      if ("text" in content && typeof content.text === "string") {
        console.log(content.text);
      }
    }
  } finally {
    await client.close();
    await server.close();
  }
}
