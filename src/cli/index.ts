import { Command } from "commander";
import { createCleanCommand } from "./commands/clean.js";
import { createClientCommand } from "./commands/client.js";
import { createReadCommand } from "./commands/read.js";
import { createCliLogger } from "./context.js";
import { SERVER_VERSION } from "../server.js";

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name("design-patterns")
    .description("Tools for the design patterns MCP server")
    .version(SERVER_VERSION);

  [createCleanCommand, createReadCommand, createClientCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}

/**
 * Runs the CLI. Failures are printed on stdout and the exit code stays 0.
 */
export async function runCli(argv: readonly string[], program: Command = createCli()): Promise<void> {
  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    createCliLogger().error("Command failed", err);
  }
}
