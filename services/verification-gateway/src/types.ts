export const verificationKinds = [
  "bed",
  "sunlight",
  "hydration",
  "custom-photo",
  "custom-video",
  "predefined",
] as const;

export type VerificationKind = (typeof verificationKinds)[number];

export const predefinedHabitTypes = [
  "healthyBreakfast",
  "morningJournal",
  "vitamins",
  "skincare",
  "mealPrep",
] as const;

export type PredefinedHabitType = (typeof predefinedHabitTypes)[number];

export type Confidence = "high" | "medium" | "low";

interface BaseRequest {
  /** Base64 payloads in request order; frames are chronological for video. */
  images: string[];
}

export interface BedRequest extends BaseRequest {
  kind: "bed";
}

export interface SunlightRequest extends BaseRequest {
  kind: "sunlight";
}

export interface HydrationRequest extends BaseRequest {
  kind: "hydration";
}

export interface CustomPhotoRequest extends BaseRequest {
  kind: "custom-photo";
  habitName: string;
  criteriaText?: string;
  allowScreenshots: boolean;
}

export interface CustomVideoRequest extends BaseRequest {
  kind: "custom-video";
  habitName: string;
  criteriaText?: string;
  durationSeconds?: number;
}

export interface PredefinedRequest extends BaseRequest {
  kind: "predefined";
  habitType: PredefinedHabitType;
}

export type VerificationRequest =
  | BedRequest
  | SunlightRequest
  | HydrationRequest
  | CustomPhotoRequest
  | CustomVideoRequest
  | PredefinedRequest;

export interface Verdict {
  kind: VerificationKind;
  passed: boolean;
  detectedSubject: string;
  detectedAction?: string;
  feedback: string;
  confidence?: Confidence;
}

export interface BedResponse {
  is_made: boolean;
  detected_subject: string;
  feedback: string;
}

export interface SunlightResponse {
  is_outside: boolean;
  detected_subject: string;
  feedback: string;
}

export interface HydrationResponse {
  is_water: boolean;
  detected_subject: string;
  feedback: string;
}

export interface HabitResponse {
  is_verified: boolean;
  detected_subject: string;
  feedback: string;
}

export interface VideoResponse extends HabitResponse {
  detected_action: string;
  confidence: Confidence;
}

export type VerificationResponse =
  | BedResponse
  | SunlightResponse
  | HydrationResponse
  | HabitResponse
  | VideoResponse;

export interface VerificationOutcome {
  verdict: Verdict;
  /** Wire body returned to the caller, in the upstream field names. */
  body: VerificationResponse;
}

export interface ErrorResponse {
  error: string;
}
