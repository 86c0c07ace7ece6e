import { describe, expect, it } from "vitest";

import { bedPrompt } from "../src/prompts/bed.js";
import { createPromptCatalog, interpolate } from "../src/prompts/catalog.js";
import { customPhotoPrompt } from "../src/prompts/custom-photo.js";
import { loadPredefinedPrompts } from "../src/prompts/predefined.js";
import { assertRubric, passesRubric, rubricMaximum } from "../src/prompts/rubric.js";
import type { Rubric } from "../src/prompts/types.js";

const catalog = createPromptCatalog();

function requireRubric(rubric: Rubric | undefined): Rubric {
  if (!rubric) {
    throw new Error("expected a rubric");
  }
  return rubric;
}

describe("rubrics", () => {
  const bedRubric = requireRubric(bedPrompt.rubric);

  it("scores the bed rubric out of 100 with a 65 point cut", () => {
    expect(rubricMaximum(bedRubric)).toBe(100);
    expect(bedRubric.passThreshold).toBe(65);
  });

  it("passes a bed at the threshold and fails one point below it", () => {
    expect(passesRubric(bedRubric, 65)).toBe(true);
    expect(passesRubric(bedRubric, 64)).toBe(false);
  });

  it("scores custom photos out of 100 with a 65 point cut", () => {
    const rubric = requireRubric(customPhotoPrompt.rubric);
    expect(rubricMaximum(rubric)).toBe(100);
    expect(passesRubric(rubric, 65)).toBe(true);
    expect(passesRubric(rubric, 60)).toBe(false);
  });

  it("refuses thresholds the rubric cannot reach", () => {
    expect(() => assertRubric({ ...bedRubric, passThreshold: 101 })).toThrow("Pass threshold 101 must fall within 1-100");
  });
});

describe("prompt rendering", () => {
  it("renders the bed taxonomy, rubric and short-circuit reply", () => {
    const prompt = catalog.render("bed");

    expect(prompt).toContain("STEP 1: IDENTIFY WHAT'S IN THE PHOTO");
    expect(prompt).toContain('- "kitchen" - stove, fridge, counters, etc.');
    expect(prompt).toContain('If detected_subject is NOT "bed", respond immediately:');
    expect(prompt).toContain("STEP 2: SCORE THE PHOTO (0-100 points)");
    expect(prompt).toContain("DUVET/COMFORTER (0-35):\n  35: Pulled up and covering the bed (wrinkles are fine!)");
    expect(prompt).toContain("  0:  Not pulled up at all - mattress/sheets fully exposed");
    expect(prompt).toContain("STEP 3: RESPOND WITH SPECIFIC FEEDBACK\n═");
    expect(prompt).toContain("- is_made = true ONLY if score >= 65");
    expect(prompt).toContain("NEVER mention scores, points, or numbers in your feedback.");
    expect(prompt).toContain('{"is_made": boolean, "detected_subject": "bed", "feedback": "specific message"}');
  });

  it("renders pass/fail criteria for sunlight without a score threshold", () => {
    const prompt = catalog.render("sunlight");

    expect(prompt).toContain("STEP 2: DETERMINE PASS/FAIL");
    expect(prompt).toContain("PASS (is_outside: true) if:\n- Outdoor daylight (sunny, overcast, cloudy all count)");
    expect(prompt).toContain("FAIL (is_outside: false) if:\n- Nighttime scene");
    expect(prompt).not.toContain("ONLY if score");
  });

  it("interpolates the habit name and criteria verbatim", () => {
    const prompt = catalog.render("custom-photo", {
      habitName: 'Read "Dune"',
      criteriaText: "Show the open book\nwith a bookmark",
    });

    expect(prompt).toContain('TASK: Verify this photo for the custom habit "Read "Dune"" using the user\'s criteria.');
    expect(prompt).toContain("User's verification criteria: Show the open book\nwith a bookmark");
    expect(prompt).toContain("but I need to see proof of Read \"Dune\"!");
  });

  it("falls back to generic criteria when none are given", () => {
    expect(catalog.render("custom-photo", { habitName: "Stretch" })).toContain(
      "User's verification criteria: Verify that this habit has been completed.",
    );
    expect(catalog.render("custom-photo", { habitName: "Stretch", criteriaText: "   " })).toContain(
      "User's verification criteria: Verify that this habit has been completed.",
    );
    expect(catalog.render("custom-video", { habitName: "Stretch", frameCount: 2 })).toContain(
      "User's verification criteria: Verify that this action was performed.",
    );
  });

  it("does not expand placeholders that arrive inside user text", () => {
    const prompt = catalog.render("custom-photo", { habitName: "{{criteria}}", criteriaText: "Show it" });

    expect(prompt).toContain('custom habit "{{criteria}}"');
  });

  it("switches the screenshot policy", () => {
    expect(catalog.render("custom-photo", { habitName: "Call mom", allowScreenshots: true })).toContain(
      "SCREENSHOT POLICY: Screenshots ARE ACCEPTED for this habit.",
    );
    expect(catalog.render("custom-photo", { habitName: "Call mom" })).toContain(
      "SCREENSHOT POLICY: Screenshots are NOT ACCEPTED for this habit.",
    );
  });

  it("describes the clip for video prompts", () => {
    expect(catalog.render("custom-video", { habitName: "pushups", frameCount: 3, durationSeconds: 12.4 })).toContain(
      "You are seeing 3 frames extracted from a 12-second video, shown in chronological order.",
    );
    expect(catalog.render("custom-video", { habitName: "pushups", frameCount: 3 })).toContain(
      "You are seeing 3 frames extracted from a short video, shown in chronological order.",
    );
  });

  it("requires a habit name for custom kinds", () => {
    expect(() => catalog.render("custom-photo")).toThrow("Missing prompt parameter: habitName");
  });

  it("selects predefined habits by type", () => {
    const prompt = catalog.render("predefined", { habitType: "vitamins" });

    expect(prompt.startsWith("TASK: Verify this photo shows VITAMINS or SUPPLEMENTS being taken.")).toBe(true);
    expect(prompt).toContain("PASS (is_verified: true) if:");
    expect(() => catalog.render("predefined", { habitType: "flossing" })).toThrow("Unknown habit type: flossing");
  });

  it("uses the smaller token budget for binary kinds", () => {
    expect(catalog.get("bed").maxOutputTokens).toBe(512);
    expect(catalog.get("sunlight").maxOutputTokens).toBe(256);
    expect(catalog.get("hydration").maxOutputTokens).toBe(256);
    expect(catalog.get("custom-video").maxOutputTokens).toBe(512);
    expect(catalog.get("predefined", "mealPrep").maxOutputTokens).toBe(256);
  });
});

describe("interpolate", () => {
  it("substitutes known placeholders and rejects unknown ones", () => {
    expect(interpolate("Hello {{name}}!", { name: "$& world" })).toBe("Hello $& world!");
    expect(() => interpolate("Hello {{name}}", {})).toThrow("Missing prompt parameter: name");
  });
});

describe("predefined catalog data", () => {
  it("rejects entries missing pass criteria", () => {
    expect(() =>
      loadPredefinedPrompts({
        healthyBreakfast: { task: "TASK", labels: [], pass: [], fail: ["x"], feedback: ["y"] },
      }),
    ).toThrow();
  });
});
