export type AnalysisKeyKind = "list" | "text";

export interface AnalysisKey {
  name: string;
  kind: AnalysisKeyKind;
}

export interface AnalysisVariant {
  id: string;
  keys: AnalysisKey[];
  system: string;
  instruction: string;
  maxTokens: number;
}

export type AnalysisResult = Record<string, string[] | string>;

const EXPERT_ROLE = "You are an expert in visual communication and marketing psychology.";

const describeKeys = (keys: AnalysisKey[]) =>
  keys.map((key) => `${key.name} (${key.kind === "list" ? "array of short strings" : "short string"})`).join(", ");

const defineVariant = (
  id: string,
  keys: AnalysisKey[],
  constraints: string,
  maxTokens: number,
): AnalysisVariant => ({
  id,
  keys,
  system: `${EXPERT_ROLE} Given an image, output JSON with exactly these ${keys.length} keys: ${describeKeys(keys)}.${constraints ? ` ${constraints}` : ""}`,
  instruction: `Respond ONLY with JSON containing the keys ${keys.map((key) => key.name).join(", ")}.`,
  maxTokens,
});

const VARIANTS: AnalysisVariant[] = [
  defineVariant(
    "thumbnail",
    [
      { name: "dominant_colors", kind: "list" },
      { name: "hooks", kind: "list" },
      { name: "composition", kind: "text" },
      { name: "text_style", kind: "text" },
      { name: "mood", kind: "text" },
    ],
    "dominant_colors are plain color words; hooks are psychological hooks such as urgency or curiosity.",
    250,
  ),
  defineVariant(
    "hooks",
    [
      { name: "dominant_colors", kind: "list" },
      { name: "hooks", kind: "list" },
    ],
    "Use 3-5 color words for dominant_colors and 1-3 hooks.",
    100,
  ),
  defineVariant(
    "patterns",
    [
      { name: "patterns", kind: "list" },
      { name: "psychology", kind: "list" },
      { name: "pros", kind: "list" },
      { name: "cons", kind: "list" },
    ],
    "Keep every entry under 15 words.",
    600,
  ),
  defineVariant(
    "breakdown",
    [
      { name: "visual_breakdown", kind: "text" },
      { name: "psychology", kind: "text" },
      { name: "pattern", kind: "text" },
    ],
    "Each value is at most three sentences.",
    800,
  ),
];

export const listVariants = () => VARIANTS.map((variant) => variant.id);

export const getVariant = (id: string): AnalysisVariant | undefined =>
  VARIANTS.find((variant) => variant.id === id);

export const defaultAnalysis = (variant: AnalysisVariant): AnalysisResult =>
  Object.fromEntries(variant.keys.map((key) => [key.name, key.kind === "list" ? [] : ""]));

const toList = (value: unknown): string[] => {
  if (typeof value === "string") return value.trim() ? [value] : [];
  if (!Array.isArray(value)) return [];
  return value.flatMap((entry) =>
    typeof entry === "string" ? [entry] : typeof entry === "number" ? [String(entry)] : [],
  );
};

const toText = (value: unknown): string => {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (Array.isArray(value)) return toList(value).join(", ");
  return "";
};

/** Projects a parsed object onto the variant's key set. */
export const normalizeAnalysis = (variant: AnalysisVariant, parsed: Record<string, unknown>): AnalysisResult =>
  Object.fromEntries(
    variant.keys.map((key) => [key.name, key.kind === "list" ? toList(parsed[key.name]) : toText(parsed[key.name])]),
  );
