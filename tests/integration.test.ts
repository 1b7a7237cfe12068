import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, type ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";
import { createServer } from "../src/server.js";
import { FilePatternStore } from "../src/fs-store.js";
import { createPatternDir, removeDir, silentLogger } from "./helpers.js";

const SINGLETON = "# Singleton\n\nOne instance, global access.\n";
const FACTORY = "# Factory\n\nSubclasses choose the product.\n";

function toolText(result: unknown): { text: string; isError: boolean } {
  const parsed = CallToolResultSchema.parse(result);
  const first = parsed.content[0];
  if (first?.type !== "text") throw new Error("expected text content");
  return { text: first.text, isError: parsed.isError ?? false };
}

function resourceText(result: ReadResourceResult): string {
  const first = result.contents[0];
  if (!first || !("text" in first) || typeof first.text !== "string") throw new Error("expected text resource");
  return first.text;
}

describe("MCP Integration", () => {
  let client: Client;
  let dir: string;

  beforeAll(async () => {
    dir = createPatternDir({ "singleton.md": SINGLETON, "factory.md": FACTORY });
    const server = createServer(new FilePatternStore(dir, silentLogger()));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    await server.connect(serverTransport);

    client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await client.close();
    removeDir(dir);
  });

  it("lists available tools", async () => {
    const result = await client.listTools();
    const toolNames = result.tools.map((t) => t.name).sort();
    expect(toolNames).toEqual(["get_design_pattern", "list_design_patterns"]);
  });

  it("get_design_pattern returns the document text", async () => {
    const result = toolText(await client.callTool({ name: "get_design_pattern", arguments: { pattern: "singleton" } }));
    expect(result).toEqual({ text: SINGLETON, isError: false });
  });

  it("get_design_pattern reports a missing pattern without failing the call", async () => {
    const result = toolText(await client.callTool({ name: "get_design_pattern", arguments: { pattern: "nonexistent" } }));
    expect(result).toEqual({ text: 'Pattern "nonexistent" not found.', isError: true });
  });

  it("list_design_patterns returns every pattern name", async () => {
    const result = toolText(await client.callTool({ name: "list_design_patterns", arguments: {} }));
    expect(JSON.parse(result.text)).toEqual(["factory", "singleton"]);
  });

  it("lists each pattern and the index as resources", async () => {
    const result = await client.listResources();
    const uris = result.resources.map((r) => r.uri).sort();
    expect(uris).toEqual(["design-pattern://factory", "design-pattern://singleton", "patterns://list"]);
  });

  it("reads a pattern through the resource template", async () => {
    const result = await client.readResource({ uri: "design-pattern://factory" });
    expect(resourceText(result)).toBe(FACTORY);
  });

  it("reads the pattern index resource", async () => {
    const result = await client.readResource({ uri: "patterns://list" });
    expect(resourceText(result)).toBe(
      "# Available Design Patterns\n\n- [Factory](design-pattern://factory)\n- [Singleton](design-pattern://singleton)\n"
    );
  });

  it("end-to-end: list patterns then read each one", async () => {
    const listed = toolText(await client.callTool({ name: "list_design_patterns", arguments: {} }));
    const names: string[] = JSON.parse(listed.text);

    const texts: string[] = [];
    for (const name of names) {
      texts.push(toolText(await client.callTool({ name: "get_design_pattern", arguments: { pattern: name } })).text);
    }
    expect(texts).toEqual([FACTORY, SINGLETON]);
  });
});

describe("MCP resources with names that need escaping", () => {
  const files: Record<string, string> = {
    "abstract factory.md": "# Abstract Factory\n\nFamilies of related products.\n",
    "c#.md": "# C#\n",
    "Chain.md": "# Chain of Responsibility\n",
  };
  let client: Client;
  let dir: string;

  beforeAll(async () => {
    dir = createPatternDir(files);
    const server = createServer(new FilePatternStore(dir, silentLogger()));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    await server.connect(serverTransport);

    client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await client.close();
    removeDir(dir);
  });

  it("lists percent-encoded URIs", async () => {
    const result = await client.listResources();
    const uris = result.resources.map((r) => r.uri).sort();
    expect(uris).toEqual([
      "design-pattern://Chain",
      "design-pattern://abstract%20factory",
      "design-pattern://c%23",
      "patterns://list",
    ]);
  });

  it("reads back every listed pattern", async () => {
    const result = await client.listResources();
    const texts: Record<string, string> = {};
    for (const resource of result.resources) {
      if (!resource.uri.startsWith("design-pattern://")) continue;
      texts[resource.name] = resourceText(await client.readResource({ uri: resource.uri }));
    }
    expect(texts).toEqual({
      "Abstract factory": files["abstract factory.md"],
      "C#": files["c#.md"],
      Chain: files["Chain.md"],
    });
  });
});
