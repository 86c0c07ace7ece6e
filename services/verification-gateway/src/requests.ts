import { z } from "zod";

import { predefinedHabitTypes, type VerificationRequest } from "./types.js";

export const MAX_HABIT_NAME_LENGTH = 100;
export const MAX_AI_PROMPT_LENGTH = 2000;
export const MAX_IMAGE_SIZE_BYTES = 10 * 1024 * 1024;

function imageField(missing: string) {
  return z
    .string({ required_error: missing, invalid_type_error: missing })
    .min(1, missing)
    .refine((value) => Buffer.byteLength(value, "base64") <= MAX_IMAGE_SIZE_BYTES, {
      message: "Image must be 10MB or smaller",
    });
}

const habitNameField = z
  .string({ required_error: "Habit name is required", invalid_type_error: "Habit name is required" })
  .refine((value) => value.trim().length > 0, { message: "Habit name cannot be empty" })
  .refine((value) => value.length <= MAX_HABIT_NAME_LENGTH, {
    message: `Habit name must be ${MAX_HABIT_NAME_LENGTH} characters or less`,
  });

const aiPromptField = z
  .string({ invalid_type_error: "AI prompt must be a string" })
  .max(MAX_AI_PROMPT_LENGTH, `AI prompt must be ${MAX_AI_PROMPT_LENGTH} characters or less`)
  .nullish();

export const photoRequestSchema = z.object({
  imageBase64: imageField("Missing imageBase64"),
});

export const customPhotoRequestSchema = z.object({
  imageBase64: imageField("Missing required fields"),
  habitName: habitNameField,
  aiPrompt: aiPromptField,
  allowsScreenshots: z.boolean({ invalid_type_error: "allowsScreenshots must be a boolean" }).nullish(),
});

export const videoRequestSchema = z.object({
  frames: z
    .array(imageField("Missing required fields"), {
      required_error: "Missing required fields",
      invalid_type_error: "Missing required fields",
    })
    .min(1, "Missing required fields"),
  habitName: habitNameField,
  aiPrompt: aiPromptField,
  duration: z.number({ invalid_type_error: "duration must be a number" }).nonnegative().nullish(),
});

export const predefinedRequestSchema = z.object({
  imageBase64: imageField("Missing imageBase64 or habitType"),
  habitType: z.enum(predefinedHabitTypes, {
    errorMap: (issue, ctx) => ({
      message:
        issue.code === "invalid_enum_value" ? `Unknown habit type: ${String(ctx.data)}` : "Missing imageBase64 or habitType",
    }),
  }),
});

export type SimplePhotoKind = "bed" | "sunlight" | "hydration";

export function toPhotoRequest(kind: SimplePhotoKind, body: z.infer<typeof photoRequestSchema>): VerificationRequest {
  return { kind, images: [body.imageBase64] };
}

export function toCustomPhotoRequest(body: z.infer<typeof customPhotoRequestSchema>): VerificationRequest {
  return {
    kind: "custom-photo",
    images: [body.imageBase64],
    habitName: body.habitName,
    criteriaText: body.aiPrompt ?? undefined,
    allowScreenshots: body.allowsScreenshots ?? false,
  };
}

export function toVideoRequest(body: z.infer<typeof videoRequestSchema>): VerificationRequest {
  return {
    kind: "custom-video",
    images: body.frames,
    habitName: body.habitName,
    criteriaText: body.aiPrompt ?? undefined,
    durationSeconds: body.duration ?? undefined,
  };
}

export function toPredefinedRequest(body: z.infer<typeof predefinedRequestSchema>): VerificationRequest {
  return { kind: "predefined", images: [body.imageBase64], habitType: body.habitType };
}
