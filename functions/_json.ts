import { isRecord } from "./_utils";

export type JsonObject = Record<string, unknown>;

export interface ParseStrategy {
  name: string;
  /** Returns the candidate text to hand to JSON.parse, or null when the strategy does not apply. */
  candidate: (text: string) => string | null;
}

export type ParseOutcome =
  | { ok: true; value: JsonObject; strategy: string }
  | { ok: false; attempted: string[] };

/**
 * Scans for the first `{` and returns the substring up to its matching `}`,
 * skipping braces inside string literals.
 */
export const extractFirstObject = (text: string): string | null => {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === "\\") escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === "{") depth++;
    else if (char === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  const end = text.lastIndexOf("}");
  return end > start ? text.slice(start, end + 1) : null;
};

export const stripTrailingCommas = (text: string) => text.replace(/,\s*([}\]])/g, "$1");

export const DEFAULT_STRATEGIES: ParseStrategy[] = [
  { name: "strict", candidate: (text) => text.trim() },
  {
    name: "fenced",
    candidate: (text) => {
      const match = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
      return match ? match[1].trim() : null;
    },
  },
  { name: "object-substring", candidate: extractFirstObject },
  {
    name: "trailing-comma-repair",
    candidate: (text) => {
      const extracted = extractFirstObject(text);
      return stripTrailingCommas(extracted ?? text);
    },
  },
];

const tryParseObject = (candidate: string): JsonObject | null => {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

export const parseJsonObject = (text: string, strategies: ParseStrategy[] = DEFAULT_STRATEGIES): ParseOutcome => {
  const attempted: string[] = [];
  for (const strategy of strategies) {
    const candidate = strategy.candidate(text);
    if (candidate === null) continue;
    attempted.push(strategy.name);
    const value = tryParseObject(candidate);
    if (value) {
      return { ok: true, value, strategy: strategy.name };
    }
  }
  return { ok: false, attempted };
};
