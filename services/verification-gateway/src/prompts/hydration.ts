import { hydrationContract } from "./contract.js";
import type { PromptSpec } from "./types.js";

export const hydrationPrompt: PromptSpec = {
  kind: "hydration",
  intro: ["TASK: Verify this photo shows HYDRATION (a beverage or drinking vessel)."],
  taxonomy: {
    instruction: "Set detected_subject to what you see:",
    labels: [
      { label: "water_bottle", description: "reusable water bottle or tumbler" },
      { label: "glass", description: "drinking glass with beverage" },
      { label: "mug", description: "coffee mug or tea cup" },
      { label: "person_drinking", description: "someone actively drinking" },
      { label: "food", description: "food items (not drinks)" },
      { label: "electronics", description: "phone, computer, etc." },
      { label: "furniture", description: "bed, desk, couch" },
      { label: "screenshot", description: "photo of a screen" },
      { label: "other", description: "anything else unrelated" },
    ],
  },
  criteria: {
    pass: [
      "Any drinking vessel visible (full, partially full, or empty)",
      "Person actively drinking",
      "Water, coffee, tea, juice, smoothie, sports drink - all count!",
    ],
    fail: ["No drinking vessel at all", "Only food, no drinks", "Random objects, electronics, furniture"],
    note: "Be lenient - the goal is encouraging hydration!",
  },
  feedback: [
    'If wrong subject: "I see [what\'s there], but where\'s your drink?"',
    'If passed: Acknowledge what you see ("Nice water bottle!" or "Coffee counts!")',
    'Empty vessel: "Already finished? That\'s the spirit!"',
  ],
  responseFormat: '{"is_water": boolean, "detected_subject": "category", "feedback": "specific message"}',
  response: hydrationContract,
  maxOutputTokens: 256,
};
