import { describe, expect, it } from "vitest";
import { defaultAnalysis, getVariant, listVariants, normalizeAnalysis, type AnalysisVariant } from "./_variants";

const variant = (id: string): AnalysisVariant => {
  const found = getVariant(id);
  if (!found) throw new Error(`missing variant ${id}`);
  return found;
};

describe("analysis variants", () => {
  it("ships the built-in key sets", () => {
    expect(listVariants()).toEqual(["thumbnail", "hooks", "patterns", "breakdown"]);
    expect(variant("thumbnail").keys.map((key) => key.name)).toEqual([
      "dominant_colors",
      "hooks",
      "composition",
      "text_style",
      "mood",
    ]);
    expect(variant("thumbnail").maxTokens).toBe(250);
  });

  it("names every key in the system instruction", () => {
    const { system } = variant("patterns");
    expect(system).toContain("exactly these 4 keys");
    for (const key of ["patterns", "psychology", "pros", "cons"]) {
      expect(system).toContain(`${key} (array of short strings)`);
    }
  });

  it("builds empty defaults per key kind", () => {
    expect(defaultAnalysis(variant("breakdown"))).toEqual({ visual_breakdown: "", psychology: "", pattern: "" });
    expect(defaultAnalysis(variant("hooks"))).toEqual({ dominant_colors: [], hooks: [] });
  });
});

describe("normalizeAnalysis", () => {
  it("keeps well-formed values unchanged", () => {
    const parsed = {
      dominant_colors: ["red", "yellow", "black"],
      hooks: ["urgency", "curiosity"],
      composition: "face left, text right",
      text_style: "bold sans",
      mood: "excited",
    };
    expect(normalizeAnalysis(variant("thumbnail"), parsed)).toEqual(parsed);
  });

  it("fills missing keys and drops unknown ones", () => {
    expect(normalizeAnalysis(variant("thumbnail"), { hooks: ["FOMO"], extra: true })).toEqual({
      dominant_colors: [],
      hooks: ["FOMO"],
      composition: "",
      text_style: "",
      mood: "",
    });
  });

  it("coerces near-miss shapes", () => {
    expect(
      normalizeAnalysis(variant("thumbnail"), {
        dominant_colors: "teal",
        hooks: ["shock", 3, null],
        composition: ["centered", "tight crop"],
        mood: { tone: "calm" },
      }),
    ).toEqual({
      dominant_colors: ["teal"],
      hooks: ["shock", "3"],
      composition: "centered, tight crop",
      text_style: "",
      mood: "",
    });
  });
});
