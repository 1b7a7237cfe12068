import express from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { FilePatternStore } from "./fs-store.js";
import { createServer } from "./server.js";
import { createApiRouter } from "./api.js";
import { loadConfig } from "./config.js";
import { findProjectRoot } from "./paths.js";
import { logger } from "./logger.js";
import { randomUUID } from "node:crypto";

const PORT = parseInt(process.env.PORT ?? "3001", 10);

const config = loadConfig({ rootDir: findProjectRoot(), logger });
logger.info(`Using pattern directory: ${config.designPatternsDir}`);

const store = new FilePatternStore(config.designPatternsDir, logger);

const app = express();
app.use(express.json());

// Read-only REST access to the same documents the MCP tools serve
app.use("/api", createApiRouter(store));

// Map of active transports by session ID
const transports = new Map<string, StreamableHTTPServerTransport>();

app.all("/mcp", async (req, res) => {
  const header = req.headers["mcp-session-id"];
  const sessionId = typeof header === "string" ? header : undefined;

  if (req.method === "POST" && !sessionId) {
    // New session
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        transports.set(id, transport);
      },
    });
    transport.onclose = () => {
      if (transport.sessionId) transports.delete(transport.sessionId);
    };

    const server = createServer(store);
    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
    return;
  }

  if (sessionId) {
    const transport = transports.get(sessionId);
    if (transport) {
      await transport.handleRequest(req, res, req.body);
      return;
    }
  }

  // No valid session
  res.status(400).json({ error: "Invalid or missing session" });
});

app.listen(PORT, "127.0.0.1", () => {
  logger.info(`Design Patterns MCP Server running on http://127.0.0.1:${PORT}/mcp`);
  logger.info(`REST API available at http://127.0.0.1:${PORT}/api/patterns`);
});
