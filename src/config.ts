import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import type { Config } from "./types.js";
import { errorMessage, readUtf8File } from "./files.js";
import { logger as defaultLogger, type Logger } from "./logger.js";

export const CONFIG_FILE_NAME = "config.json";
export const DEFAULT_PATTERNS_DIR_NAME = "design-patterns";

/**
 * Shape of config.json. Both snake_case and camelCase keys are accepted;
 * unknown keys are ignored.
 */
export const ConfigFileSchema = z.object({
  base_dir: z.string().min(1).optional(),
  baseDir: z.string().min(1).optional(),
  design_patterns_dir: z.string().min(1).optional(),
  designPatternsDir: z.string().min(1).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface LoadConfigOptions {
  /** Project root; the default base directory and config.json location. */
  rootDir: string;
  /** Explicit config file path, overriding `<rootDir>/config.json`. */
  configPath?: string;
  /** Explicit pattern directory, overriding anything in the config file. */
  designPatternsDir?: string;
  logger?: Logger;
}

/**
 * Builds the default configuration for a project root.
 */
export function defaultConfig(rootDir: string): Config {
  return {
    baseDir: rootDir,
    designPatternsDir: join(rootDir, DEFAULT_PATTERNS_DIR_NAME),
    source: null,
  };
}

/**
 * Loads configuration from config.json if available.
 * A missing or malformed file falls back to defaults; this never throws.
 */
export function loadConfig(options: LoadConfigOptions): Config {
  const log = options.logger ?? defaultLogger;
  const configPath = resolve(options.configPath ?? join(options.rootDir, CONFIG_FILE_NAME));

  let config = defaultConfig(options.rootDir);
  const file = readConfigFile(configPath, log);
  if (file) {
    const baseDir = resolve(dirname(configPath), file.base_dir ?? file.baseDir ?? options.rootDir);
    const patternsDir = file.design_patterns_dir ?? file.designPatternsDir;
    config = {
      baseDir,
      designPatternsDir: patternsDir ? resolve(baseDir, patternsDir) : join(baseDir, DEFAULT_PATTERNS_DIR_NAME),
      source: configPath,
    };
    log.info(`Loaded configuration from ${configPath}`);
  } else {
    log.info("Using default configuration");
  }

  if (options.designPatternsDir) {
    config = { ...config, designPatternsDir: resolve(options.designPatternsDir) };
  }

  return config;
}

function readConfigFile(path: string, log: Logger): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readUtf8File(path));
  } catch (err) {
    log.warn(`Error loading config ${path}: ${errorMessage(err)}`);
    return undefined;
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    log.warn(`Invalid config ${path}: ${issues}`);
    return undefined;
  }

  return parsed.data;
}
