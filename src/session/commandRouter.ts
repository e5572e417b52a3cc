export type Intent =
  | { kind: "help" }
  | { kind: "summary" }
  | { kind: "concepts"; topK?: number }
  | { kind: "stats" }
  | { kind: "more_questions"; count: number }
  | { kind: "exit" }
  | { kind: "unknown"; input: string };

export interface RouterOptions {
  defaultQuestionCount: number;
  maxQuestionCount: number;
}

interface IntentRule {
  name: string;
  match(input: string, options: RouterOptions): Intent | null;
}

const DEFAULT_ROUTER_OPTIONS: RouterOptions = {
  defaultQuestionCount: 5,
  maxQuestionCount: 50,
};

const NUMBER_WORDS = new Map<string, number>([
  ["one", 1],
  ["two", 2],
  ["three", 3],
  ["four", 4],
  ["five", 5],
  ["six", 6],
  ["seven", 7],
  ["eight", 8],
  ["nine", 9],
  ["ten", 10],
  ["eleven", 11],
  ["twelve", 12],
  ["fifteen", 15],
  ["twenty", 20],
  ["dozen", 12],
]);

const EXACT_COMMANDS = new Map<string, Intent>([
  ["help", { kind: "help" }],
  ["summary", { kind: "summary" }],
  ["concepts", { kind: "concepts" }],
  ["stats", { kind: "stats" }],
  ["exit", { kind: "exit" }],
  ["quit", { kind: "exit" }],
]);

/** Evaluated in order; the first rule that matches decides the intent. */
const RULES: IntentRule[] = [
  {
    name: "exact-command",
    match: (input) => EXACT_COMMANDS.get(input) ?? null,
  },
  {
    name: "concepts-count",
    match: (input) => {
      const match = /^concepts\s+(\d+)$/.exec(input);
      return match ? { kind: "concepts", topK: Number(match[1]) } : null;
    },
  },
  {
    name: "questions-command",
    match: (input, options) => {
      const match = /^questions?(?:\s+(\S+))?$/.exec(input);
      if (!match) {
        return null;
      }
      return { kind: "more_questions", count: parseCount(match[1], options) };
    },
  },
  {
    name: "more-questions-phrase",
    match: (input, options) => {
      if (!/\bquestions?\b|\bquiz me\b/.test(input)) {
        return null;
      }
      return { kind: "more_questions", count: parseCount(findCountToken(input), options) };
    },
  },
  {
    name: "summary-phrase",
    match: (input) =>
      /\bsummar|\bmain (?:ideas?|points?)\b|\boverview\b|\btl;?dr\b|what is (?:this|it) about/.test(input)
        ? { kind: "summary" }
        : null,
  },
  {
    name: "concepts-phrase",
    match: (input) =>
      /\bconcepts?\b|\bkeywords?\b|\bkey (?:ideas?|terms?|topics?)\b|\bimportant (?:terms?|topics?)\b/.test(input)
        ? { kind: "concepts" }
        : null,
  },
  {
    name: "stats-phrase",
    match: (input) =>
      /\bstats\b|\bstatistics\b|\bword count\b|how long is/.test(input) ? { kind: "stats" } : null,
  },
  {
    name: "exit-phrase",
    match: (input) =>
      /^(?:exit|quit|bye|goodbye|see you|i'?m done)\b/.test(input) ? { kind: "exit" } : null,
  },
  {
    name: "help-phrase",
    match: (input) =>
      /\bhelp\b|what can you do|\bcommands?\b/.test(input) ? { kind: "help" } : null,
  },
];

export function routeInput(raw: string, options: Partial<RouterOptions> = {}): Intent {
  const resolved = { ...DEFAULT_ROUTER_OPTIONS, ...options };
  const input = raw.trim().toLowerCase().replace(/\s+/g, " ").replace(/[?!.]+$/, "");

  if (input) {
    for (const rule of RULES) {
      const intent = rule.match(input, resolved);
      if (intent) {
        return intent;
      }
    }
  }

  return { kind: "unknown", input: raw };
}

function findCountToken(input: string): string | undefined {
  const digits = /\b(\d+)\b/.exec(input);
  if (digits) {
    return digits[1];
  }
  return input.split(" ").find((word) => NUMBER_WORDS.has(word));
}

function parseCount(token: string | undefined, options: RouterOptions): number {
  if (!token) {
    return options.defaultQuestionCount;
  }
  const value = /^\d+$/.test(token) ? Number(token) : NUMBER_WORDS.get(token);
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return options.defaultQuestionCount;
  }
  return Math.min(value, options.maxQuestionCount);
}
