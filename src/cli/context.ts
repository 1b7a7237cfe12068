import { loadConfig } from "../config.js";
import { Logger, logger } from "../logger.js";
import { findProjectRoot } from "../paths.js";
import type { Config } from "../types.js";

export interface ConfigOptions {
  config?: string;
  dir?: string;
  quiet?: boolean;
}

/**
 * Logger for CLI commands: same level as the shared logger, written to stdout.
 */
export function createCliLogger(options: ConfigOptions = {}): Logger {
  return new Logger({ level: options.quiet ? "warn" : logger.getLevel(), stream: "stdout" });
}

/**
 * Resolves configuration for a command: --dir beats config.json, which beats defaults.
 */
export function resolveCliConfig(options: ConfigOptions, log: Logger, rootDir: string = findProjectRoot()): Config {
  return loadConfig({
    rootDir,
    configPath: options.config,
    designPatternsDir: options.dir,
    logger: log,
  });
}
