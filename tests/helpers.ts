import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { stripVTControlCharacters } from "node:util";
import { Logger } from "../src/logger.js";

/**
 * Creates a temporary directory holding the given files. A value of `null`
 * creates a subdirectory with that name instead of a file.
 */
export function createPatternDir(files: Record<string, string | Uint8Array | null>): string {
  const dir = mkdtempSync(join(tmpdir(), "design-patterns-"));
  for (const [name, content] of Object.entries(files)) {
    if (content === null) {
      mkdirSync(join(dir, name));
    } else {
      writeFileSync(join(dir, name), content);
    }
  }
  return dir;
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function silentLogger(): Logger {
  return new Logger({ level: "silent" });
}

/**
 * Lines passed to a console spy, with colour codes removed.
 */
export function printedLines(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((call) => stripVTControlCharacters(String(call[0])));
}
