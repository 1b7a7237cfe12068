import { DEFAULT_RULES, type SanitizerRules } from "./sanitizer-rules.js";

/**
 * `idle` emits cleaned lines; `skipping` discards lines until a resume rule matches.
 */
export type SanitizerState = "idle" | "skipping";

export interface StepResult {
  state: SanitizerState;
  /** The cleaned line to emit, or null when the line is discarded. */
  output: string | null;
}

export function matchSkipTrigger(line: string, rules: SanitizerRules = DEFAULT_RULES): string | undefined {
  return rules.skipTriggers.find((trigger) => line.includes(trigger.text))?.id;
}

export function matchResumeRule(line: string, rules: SanitizerRules = DEFAULT_RULES): string | undefined {
  return rules.resumeRules.find((rule) => rule.matches(line))?.id;
}

/**
 * Applies every line rule, in order, to a single line.
 */
export function cleanLine(line: string, rules: SanitizerRules = DEFAULT_RULES): string {
  let result = line;
  for (const rule of rules.lineRules) {
    let previous: string;
    do {
      previous = result;
      result = result.replace(rule.pattern, "");
    } while (rule.untilStable && result !== previous);
  }
  return result;
}

/**
 * Advances the skip/idle machine by one input line.
 */
export function step(state: SanitizerState, line: string, rules: SanitizerRules = DEFAULT_RULES): StepResult {
  if (matchSkipTrigger(line, rules)) {
    return { state: "skipping", output: null };
  }

  if (state === "skipping" && !matchResumeRule(line, rules)) {
    return { state: "skipping", output: null };
  }

  const cleaned = cleanLine(line, rules);
  // Lines emptied by cleaning are dropped; lines that were blank to begin with are kept.
  if (cleaned.trim() === "" && line.trim() !== "") {
    return { state: "idle", output: null };
  }
  return { state: "idle", output: cleaned };
}

/**
 * Replaces every run of two or more blank lines with a single empty line.
 */
export function collapseBlankLines(lines: readonly string[]): string[] {
  const result: string[] = [];
  let run: string[] = [];

  const flush = () => {
    if (run.length === 1) result.push(run[0]);
    else if (run.length > 1) result.push("");
    run = [];
  };

  for (const line of lines) {
    if (line.trim() === "") {
      run.push(line);
    } else {
      flush();
      result.push(line);
    }
  }
  flush();

  return result;
}

/**
 * Strips Russian content and EN:/RU: markers from a bilingual markdown document.
 * The input's line terminator is kept. Running it on its own output changes nothing.
 */
export function sanitizeMarkdown(content: string, rules: SanitizerRules = DEFAULT_RULES): string {
  const eol = content.includes("\r\n") ? "\r\n" : "\n";
  const kept: string[] = [];
  let state: SanitizerState = "idle";

  for (const line of content.split(/\r?\n/)) {
    const next = step(state, line, rules);
    state = next.state;
    if (next.output !== null) kept.push(next.output);
  }

  return collapseBlankLines(kept).join(eol);
}
