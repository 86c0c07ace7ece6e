import { sunlightContract } from "./contract.js";
import type { PromptSpec } from "./types.js";

export const sunlightPrompt: PromptSpec = {
  kind: "sunlight",
  intro: ["TASK: Verify this photo shows NATURAL LIGHT exposure."],
  taxonomy: {
    instruction: "Set detected_subject to what best describes the scene:",
    labels: [
      { label: "outdoor_daylight", description: "outside with natural sunlight/daylight" },
      { label: "window_daylight", description: "indoors but with visible natural light from windows" },
      { label: "dark_indoor", description: "indoor space with no natural light" },
      { label: "artificial_light", description: "room lit only by lamps/screens/LEDs" },
      { label: "nighttime", description: "clearly night (dark sky, stars, moon)" },
      { label: "screenshot", description: "photo of a screen or another image" },
      { label: "unrelated", description: "random object with no light context" },
    ],
  },
  criteria: {
    pass: [
      "Outdoor daylight (sunny, overcast, cloudy all count)",
      "Indoors with visible natural daylight through windows",
    ],
    fail: ["Nighttime scene", "Only artificial lighting visible", "Dark indoor space", "Screenshot or unrelated image"],
  },
  feedback: [
    'If unrelated/screenshot: "I see [what\'s there], but I need to see natural light exposure!"',
    'If artificial light only: "That\'s artificial light - step outside or near a window!"',
    'If nighttime: "It\'s dark out! Catch some rays tomorrow morning."',
    'If passed: Acknowledge the light ("Beautiful morning light!" or "Good window setup!")',
  ],
  responseFormat: '{"is_outside": boolean, "detected_subject": "category", "feedback": "specific message"}',
  response: sunlightContract,
  maxOutputTokens: 256,
};
