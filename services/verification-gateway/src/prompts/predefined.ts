import { z } from "zod";

import { predefinedHabitTypes, type PredefinedHabitType } from "../types.js";
import { habitContract } from "./contract.js";
import { predefinedHabits } from "./predefined-habits.js";
import type { PromptSpec } from "./types.js";

const habitEntrySchema = z.object({
  task: z.string().min(1),
  labels: z.array(z.object({ label: z.string().min(1), description: z.string().min(1) })).min(2),
  pass: z.array(z.string().min(1)).min(1),
  fail: z.array(z.string().min(1)).min(1),
  note: z.string().optional(),
  feedback: z.array(z.string().min(1)).min(1),
});

const catalogSchema = z.object({
  healthyBreakfast: habitEntrySchema,
  morningJournal: habitEntrySchema,
  vitamins: habitEntrySchema,
  skincare: habitEntrySchema,
  mealPrep: habitEntrySchema,
});

type HabitEntry = z.infer<typeof habitEntrySchema>;

function toPromptSpec(entry: HabitEntry): PromptSpec {
  return {
    kind: "predefined",
    intro: [entry.task],
    taxonomy: {
      instruction: "Set detected_subject to one of:",
      labels: entry.labels,
    },
    criteria: { pass: entry.pass, fail: entry.fail, note: entry.note },
    feedback: entry.feedback,
    responseFormat: '{"is_verified": boolean, "detected_subject": "category", "feedback": "specific message"}',
    response: habitContract,
    maxOutputTokens: 256,
  };
}

export function loadPredefinedPrompts(data: unknown = predefinedHabits): Record<PredefinedHabitType, PromptSpec> {
  const parsed = catalogSchema.parse(data);
  return {
    healthyBreakfast: toPromptSpec(parsed.healthyBreakfast),
    morningJournal: toPromptSpec(parsed.morningJournal),
    vitamins: toPromptSpec(parsed.vitamins),
    skincare: toPromptSpec(parsed.skincare),
    mealPrep: toPromptSpec(parsed.mealPrep),
  };
}

export function isPredefinedHabitType(value: unknown): value is PredefinedHabitType {
  return predefinedHabitTypes.some((type) => type === value);
}
