import { z } from "zod";

import type {
  BedResponse,
  HabitResponse,
  HydrationResponse,
  SunlightResponse,
  Verdict,
  VerificationResponse,
  VideoResponse,
} from "../types.js";

export type VerdictFields = Omit<Verdict, "kind">;

export type ContractResult =
  | { success: true; body: VerificationResponse; verdict: VerdictFields }
  | { success: false; fields: string[]; issues: string[] };

export interface ResponseContract {
  readonly passField: string;
  check(value: unknown): ContractResult;
}

function defineContract<T extends VerificationResponse>(
  passField: keyof T & string,
  schema: z.ZodType<T>,
  toVerdict: (body: T) => VerdictFields,
): ResponseContract {
  return {
    passField,
    check(value) {
      const result = schema.safeParse(value);
      if (!result.success) {
        const offending = new Set<string>();
        for (const issue of result.error.issues) {
          offending.add(issue.path.length > 0 ? issue.path.join(".") : "<root>");
        }
        return {
          success: false,
          fields: Array.from(offending),
          issues: result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
        };
      }
      return { success: true, body: result.data, verdict: toVerdict(result.data) };
    },
  };
}

const bedSchema = z.object({
  is_made: z.boolean(),
  detected_subject: z.string(),
  feedback: z.string(),
});

const sunlightSchema = z.object({
  is_outside: z.boolean(),
  detected_subject: z.string(),
  feedback: z.string(),
});

const hydrationSchema = z.object({
  is_water: z.boolean(),
  detected_subject: z.string(),
  feedback: z.string(),
});

const habitSchema = z.object({
  is_verified: z.boolean(),
  detected_subject: z.string(),
  feedback: z.string(),
});

const videoSchema = habitSchema.extend({
  detected_action: z.string(),
  confidence: z.enum(["high", "medium", "low"]),
});

export const bedContract = defineContract<BedResponse>(
  "is_made",
  bedSchema,
  (body) => ({ passed: body.is_made, detectedSubject: body.detected_subject, feedback: body.feedback }),
);

export const sunlightContract = defineContract<SunlightResponse>(
  "is_outside",
  sunlightSchema,
  (body) => ({ passed: body.is_outside, detectedSubject: body.detected_subject, feedback: body.feedback }),
);

export const hydrationContract = defineContract<HydrationResponse>(
  "is_water",
  hydrationSchema,
  (body) => ({ passed: body.is_water, detectedSubject: body.detected_subject, feedback: body.feedback }),
);

export const habitContract = defineContract<HabitResponse>(
  "is_verified",
  habitSchema,
  (body) => ({ passed: body.is_verified, detectedSubject: body.detected_subject, feedback: body.feedback }),
);

export const videoContract = defineContract<VideoResponse>(
  "is_verified",
  videoSchema,
  (body) => ({
    passed: body.is_verified,
    detectedSubject: body.detected_subject,
    detectedAction: body.detected_action,
    confidence: body.confidence,
    feedback: body.feedback,
  }),
);
