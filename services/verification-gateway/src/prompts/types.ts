import type { VerificationKind } from "../types.js";
import type { ResponseContract } from "./contract.js";

export interface SubjectLabel {
  label: string;
  description: string;
}

export interface SubjectTaxonomy {
  instruction: string;
  labels: SubjectLabel[];
  /** Labels that let scoring continue; anything else short-circuits to a failing reply. */
  accepted?: string[];
  /** Conditions that fail the photo outright, checked while classifying. */
  rejectIf?: string[];
  /** Reply the model must send verbatim in shape when the subject is off-taxonomy. */
  offTaxonomyReply?: string;
}

export interface RubricLevel {
  points: number;
  description: string;
}

export interface RubricDimension {
  name: string;
  levels: RubricLevel[];
}

export interface Rubric {
  dimensions: RubricDimension[];
  passThreshold: number;
  lead?: string;
}

export interface PassCriteria {
  pass: string[];
  fail: string[];
  note?: string;
}

export interface PromptSection {
  title: string;
  lines: string[];
}

export interface ScreenshotPolicy {
  accepted: PromptSection;
  rejected: PromptSection;
}

export interface PromptSpec {
  kind: VerificationKind;
  /** Opening paragraphs. May contain {{placeholders}}. */
  intro: string[];
  /** Sections rendered before the classification step. */
  context?: PromptSection[];
  screenshotPolicy?: ScreenshotPolicy;
  taxonomy?: SubjectTaxonomy;
  rubric?: Rubric;
  criteria?: PassCriteria;
  /** Substituted for {{criteria}} when the user wrote none. */
  defaultCriteria?: string;
  feedback: string[];
  responseFormat: string;
  response: ResponseContract;
  maxOutputTokens: number;
}

export interface PromptParams {
  habitType?: string;
  habitName?: string;
  criteriaText?: string;
  allowScreenshots?: boolean;
  frameCount?: number;
  durationSeconds?: number;
}
