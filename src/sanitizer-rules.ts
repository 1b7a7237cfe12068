/**
 * A line containing `text` anywhere starts a skip region and is discarded.
 */
export interface SkipTrigger {
  id: string;
  text: string;
}

/**
 * A line shape that ends a skip region. `matches` receives the raw line.
 */
export interface ResumeRule {
  id: string;
  matches(line: string): boolean;
}

/**
 * A removal applied to every emitted line; whatever `pattern` matches is deleted.
 * With `untilStable`, the removal repeats until the line stops changing.
 */
export interface LineRule {
  id: string;
  pattern: RegExp;
  untilStable?: boolean;
}

export interface SanitizerRules {
  skipTriggers: readonly SkipTrigger[];
  resumeRules: readonly ResumeRule[];
  lineRules: readonly LineRule[];
}

export const SKIP_TRIGGERS: readonly SkipTrigger[] = [
  { id: "ru-marker", text: "RU:" },
  { id: "ru-purpose", text: "Назначение:" },
  { id: "ru-pattern", text: "Паттерн" },
  { id: "ru-concrete", text: "Конкретные" },
  { id: "ru-abstract-factory", text: "Абстрактная Фабрика" },
  { id: "ru-objects", text: "объектов" },
];

function startsWith(id: string, prefix: string): ResumeRule {
  return { id, matches: (line) => line.trim().startsWith(prefix) };
}

export const RESUME_RULES: readonly ResumeRule[] = [
  startsWith("en-marker", "EN:"),
  startsWith("class-declaration", "class "),
  startsWith("def-declaration", "def "),
  startsWith("from-import", "from "),
  startsWith("import", "import "),
  startsWith("include", "#include"),
  startsWith("comment-block-end", "*/"),
  { id: "blank-line", matches: (line) => line.trim() === "" },
  { id: "code-fence", matches: (line) => line.includes("```") },
];

/**
 * Russian words and phrases removed, with the rest of the line, case-insensitively.
 */
export const RUSSIAN_PHRASES: readonly string[] = [
  "Назначение:",
  "Паттерн",
  "собственный класс",
  "исполнения программы",
  "Конкретные",
  "Абстрактная",
  "объектов",
  "интерфейс",
  "алгоритмов",
];

export const LINE_RULES: readonly LineRule[] = [
  { id: "en-marker", pattern: /\s*EN:\s*/g, untilStable: true },
  { id: "ru-marker", pattern: /\s*RU:\s*.*/gs },
  { id: "cyrillic-tail", pattern: /\p{Script=Cyrillic}+.*/gsu },
  ...RUSSIAN_PHRASES.map((phrase, i) => ({ id: `ru-phrase-${i}`, pattern: new RegExp(`${phrase}.*`, "gisu") })),
  { id: "empty-block-comment", pattern: /^\s*\*\s*$/g },
  { id: "empty-line-comment", pattern: /^\s*\/\/\s*$/g },
  { id: "empty-hash-comment", pattern: /^\s*#\s*$/g },
];

export const DEFAULT_RULES: SanitizerRules = {
  skipTriggers: SKIP_TRIGGERS,
  resumeRules: RESUME_RULES,
  lineRules: LINE_RULES,
};
