import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { FilePatternStore } from "./fs-store.js";
import { createServer } from "./server.js";
import { loadConfig } from "./config.js";
import { findProjectRoot } from "./paths.js";
import { logger } from "./logger.js";

const config = loadConfig({ rootDir: findProjectRoot(), logger });
logger.info(`Using pattern directory: ${config.designPatternsDir}`);

const store = new FilePatternStore(config.designPatternsDir, logger);
logger.info(`Available patterns: ${store.listPatterns().join(", ")}`);

const server = createServer(store);
const transport = new StdioServerTransport();
await server.connect(transport);

logger.info("Design Patterns MCP Server running on stdio");
