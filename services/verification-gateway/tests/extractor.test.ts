import { describe, expect, it } from "vitest";

import { ExtractionError, SchemaViolationError } from "../src/errors.js";
import { extractJsonSpan, parseJsonSpan } from "../src/extractor.js";
import { parseVerdict } from "../src/parser.js";
import { createPromptCatalog } from "../src/prompts/catalog.js";
import type { VerificationKind } from "../src/types.js";

const catalog = createPromptCatalog();

const samples: Array<{ kind: VerificationKind; habitType?: string; payload: Record<string, unknown> }> = [
  { kind: "bed", payload: { is_made: true, detected_subject: "bed", feedback: "Looks great!" } },
  { kind: "sunlight", payload: { is_outside: false, detected_subject: "nighttime", feedback: "It's dark out!" } },
  { kind: "hydration", payload: { is_water: true, detected_subject: "mug", feedback: "Coffee counts!" } },
  { kind: "custom-photo", payload: { is_verified: true, detected_subject: "open book", feedback: "Nice reading!" } },
  {
    kind: "custom-video",
    payload: {
      is_verified: true,
      detected_subject: "person on a mat",
      detected_action: "three pushups",
      confidence: "high",
      feedback: "Great form on those pushups!",
    },
  },
  {
    kind: "predefined",
    habitType: "skincare",
    payload: { is_verified: false, detected_subject: "makeup_only", feedback: "I see makeup, but show me your skincare products!" },
  },
];

function parse(kind: VerificationKind, habitType: string | undefined, raw: string) {
  return parseVerdict(kind, extractJsonSpan(raw), catalog.get(kind, habitType).response);
}

describe("extractJsonSpan", () => {
  it("returns bare JSON unchanged", () => {
    expect(extractJsonSpan('{"a": 1}')).toBe('{"a": 1}');
  });

  it("strips fences with and without a language tag", () => {
    expect(extractJsonSpan('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    expect(extractJsonSpan('```\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it("slices away surrounding prose", () => {
    expect(extractJsonSpan('Sure! Here is my answer:\n```json\n{"a": {"b": 2}}\n```\nHope that helps.')).toBe(
      '{"a": {"b": 2}}',
    );
  });

  it("fails when no object boundaries exist", () => {
    expect(() => extractJsonSpan("I cannot help with that.")).toThrow(ExtractionError);
    expect(() => extractJsonSpan("} backwards {")).toThrow(ExtractionError);
  });
});

describe("parseJsonSpan", () => {
  it("reports invalid JSON as an extraction failure", () => {
    expect(() => parseJsonSpan("{is_made: true}")).toThrow(ExtractionError);
  });
});

describe("wrapping does not change the verdict", () => {
  for (const sample of samples) {
    it(`parses ${sample.kind} identically with and without wrapping`, () => {
      const json = JSON.stringify(sample.payload);
      const bare = parse(sample.kind, sample.habitType, json);
      const wrapped = parse(
        sample.kind,
        sample.habitType,
        `Here is the verification result.\n\n\`\`\`json\n${json}\n\`\`\`\n\nLet me know if you need more.`,
      );

      expect(wrapped).toEqual(bare);
      expect(bare.body).toEqual(sample.payload);
    });
  }
});

describe("missing fields are never defaulted", () => {
  for (const sample of samples) {
    for (const field of Object.keys(sample.payload)) {
      it(`rejects ${sample.kind} output without ${field}`, () => {
        const partial = { ...sample.payload };
        delete partial[field];

        let caught: unknown;
        try {
          parse(sample.kind, sample.habitType, JSON.stringify(partial));
        } catch (error) {
          caught = error;
        }
        expect(caught).toBeInstanceOf(SchemaViolationError);
        expect(caught instanceof SchemaViolationError ? caught.fields : []).toEqual([field]);
      });
    }
  }
});

describe("parseVerdict", () => {
  const bed = catalog.get("bed").response;

  it("maps the pass flag and subject into a verdict", () => {
    const outcome = parseVerdict("bed", '{"is_made": false, "detected_subject": "kitchen", "feedback": "Nope"}', bed);

    expect(outcome.verdict).toEqual({ kind: "bed", passed: false, detectedSubject: "kitchen", feedback: "Nope" });
  });

  it("does not coerce string booleans", () => {
    expect(() =>
      parseVerdict("bed", '{"is_made": "true", "detected_subject": "bed", "feedback": "ok"}', bed),
    ).toThrow(SchemaViolationError);
  });

  it("rejects confidence values outside high, medium and low", () => {
    const video = catalog.get("custom-video").response;
    const span = JSON.stringify({
      is_verified: true,
      detected_subject: "gym",
      detected_action: "squats",
      confidence: "certain",
      feedback: "ok",
    });

    expect(() => parseVerdict("custom-video", span, video)).toThrow(SchemaViolationError);
  });

  it("rejects arrays and scalars", () => {
    expect(() => parseVerdict("bed", "[1, 2]", bed)).toThrow(SchemaViolationError);
  });

  it("drops fields outside the schema", () => {
    const outcome = parseVerdict(
      "bed",
      '{"is_made": true, "detected_subject": "bed", "feedback": "Nice", "score": 80}',
      bed,
    );

    expect(outcome.body).toEqual({ is_made: true, detected_subject: "bed", feedback: "Nice" });
  });
});
