import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { Command } from "commander";
import { createCli, runCli } from "../src/cli/index.js";
import { runRead } from "../src/cli/commands/read.js";
import { printReport } from "../src/cli/commands/clean.js";
import { runClient } from "../src/cli/commands/client.js";
import { FilePatternStore } from "../src/fs-store.js";
import { createPatternDir, printedLines, removeDir, silentLogger } from "./helpers.js";

const SINGLETON = "# Singleton\n";
const BILINGUAL = "# Factory\n\nRU: Паттерн Фабрика создает объекты.\nEN: Factory creates objects.\n";

describe("CLI", () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    dir = createPatternDir({ "singleton.md": SINGLETON, "factory.md": BILINGUAL, "long.md": "x".repeat(150) });
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    log.mockRestore();
    removeDir(dir);
  });

  it("registers the clean, read and client commands", () => {
    expect(createCli().commands.map((c) => c.name())).toEqual(["clean", "read", "client"]);
  });

  describe("read", () => {
    it("prints short documents in full with their length, and notes missing ones", () => {
      runRead(new FilePatternStore(dir, silentLogger()), ["singleton", "missing"]);

      expect(printedLines(log)).toEqual([
        "\nTesting with 'singleton' pattern:",
        SINGLETON,
        "Total content length: 12 characters",
        "\nTesting with 'missing' pattern:",
        'Pattern "missing" not found.',
      ]);
    });

    it("previews the first 100 characters of long documents", () => {
      runRead(new FilePatternStore(dir, silentLogger()), ["long"]);

      expect(printedLines(log)).toEqual([
        "\nTesting with 'long' pattern:",
        "Pattern content (first 100 chars):",
        `${"x".repeat(100)}...`,
        "Total content length: 150 characters",
      ]);
    });

    it("counts and previews by character, not by UTF-16 unit", () => {
      writeFileSync(join(dir, "emoji.md"), "😀".repeat(150));
      runRead(new FilePatternStore(dir, silentLogger()), ["emoji"]);

      expect(printedLines(log)).toEqual([
        "\nTesting with 'emoji' pattern:",
        "Pattern content (first 100 chars):",
        `${"😀".repeat(100)}...`,
        "Total content length: 150 characters",
      ]);
    });

    it("prints the whole document with --full", () => {
      runRead(new FilePatternStore(dir, silentLogger()), ["long"], { full: true });
      expect(printedLines(log)[1]).toBe("x".repeat(150));
    });
  });

  describe("runCli", () => {
    it("prints command failures on stdout", async () => {
      const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
      const program = new Command("design-patterns").action(() => {
        throw new Error("boom");
      });

      await runCli(["node", "design-patterns"], program);

      const lines = printedLines(log);
      expect(lines[0]).toMatch(/^\[ERROR\] \S+ Command failed$/);
      expect(lines[1]).toMatch(/^Error: boom\n/);
      expect(stderr).not.toHaveBeenCalled();
      stderr.mockRestore();
    });
  });

  describe("clean", () => {
    it("cleans the given directory and leaves excluded files alone", async () => {
      await createCli().parseAsync(["node", "design-patterns", "clean", dir, "--quiet", "--exclude", "long.md"]);

      expect(readFileSync(join(dir, "factory.md"), "utf-8")).toBe("# Factory\n\nFactory creates objects.\n");
      expect(readFileSync(join(dir, "long.md"), "utf-8")).toBe("x".repeat(150));
      expect(printedLines(log)).toContain("  [OK] factory.md");
    });

    it("prints a summary of the run", () => {
      printReport({
        directory: dir,
        dryRun: false,
        files: ["a.md", "b.md"],
        excluded: [],
        results: [
          { file: "a.md", status: "modified" },
          { file: "b.md", status: "failed", message: "boom" },
        ],
      });

      expect(printedLines(log)).toEqual([
        "Found 2 markdown files to process:",
        "  - a.md",
        "  - b.md",
        "\nCleanup completed!",
        "Files processed: 2",
        "Files modified: 1",
        "\nModified files:",
        "  [OK] a.md",
        "\nFailed files:",
        "  [ERROR] b.md: boom",
      ]);
    });

    it("reports an unreadable directory", () => {
      printReport({ directory: "/nowhere", dryRun: false, files: [], excluded: [], results: [], listingError: "ENOENT" });
      expect(printedLines(log)).toEqual(["Could not read /nowhere: ENOENT"]);
    });
  });

  describe("client", () => {
    it("lists tools and prints the requested pattern through the MCP server", async () => {
      await runClient(new FilePatternStore(dir, silentLogger()), "singleton");

      const lines = printedLines(log);
      expect(lines.slice(0, 3)).toEqual(["Available tools:", "- get_design_pattern", "- list_design_patterns"]);
      expect(lines).toContain("\nsingleton pattern content:");
      expect(lines).toContain(SINGLETON);
    });

    it("reads the first available pattern when none is named", async () => {
      await runClient(new FilePatternStore(dir, silentLogger()));
      expect(printedLines(log)).toContain("\nfactory pattern content:");
    });
  });
});
