import type { PredefinedHabitType, VerificationKind } from "../types.js";
import { bedPrompt } from "./bed.js";
import { customPhotoPrompt } from "./custom-photo.js";
import { customVideoPrompt } from "./custom-video.js";
import { hydrationPrompt } from "./hydration.js";
import { isPredefinedHabitType, loadPredefinedPrompts } from "./predefined.js";
import { assertRubric, dimensionMaximum, rubricMaximum } from "./rubric.js";
import { sunlightPrompt } from "./sunlight.js";
import type { PromptParams, PromptSection, PromptSpec, SubjectTaxonomy } from "./types.js";

export type PhotoKind = Exclude<VerificationKind, "predefined">;

const RULE = "═".repeat(63);

const placeholderPattern = /\{\{(\w+)\}\}/g;

export function interpolate(template: string, values: Record<string, string | undefined>): string {
  return template.replace(placeholderPattern, (_match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new Error(`Missing prompt parameter: ${name}`);
    }
    return value;
  });
}

function banner(title: string): string {
  return `${RULE}\n${title}\n${RULE}`;
}

function bullets(lines: string[]): string[] {
  return lines.map((line) => `- ${line}`);
}

function renderSection(section: PromptSection): string {
  return [banner(section.title), ...bullets(section.lines)].join("\n");
}

function renderTaxonomy(taxonomy: SubjectTaxonomy): string {
  const lines = [taxonomy.instruction];
  for (const subject of taxonomy.labels) {
    lines.push(`- "${subject.label}" - ${subject.description}`);
  }
  if (taxonomy.rejectIf && taxonomy.rejectIf.length > 0) {
    lines.push("", "Gaming detection - FAIL immediately if you see:", ...bullets(taxonomy.rejectIf));
  }
  if (taxonomy.offTaxonomyReply) {
    const condition = taxonomy.accepted
      ? `If detected_subject is NOT ${taxonomy.accepted.map((label) => `"${label}"`).join(" or ")}, respond immediately:`
      : "If unrelated, respond:";
    lines.push("", condition, taxonomy.offTaxonomyReply);
  }
  return lines.join("\n");
}

function renderScoring(spec: PromptSpec, step: number): string | undefined {
  const passField = spec.response.passField;
  if (spec.rubric) {
    const lines = [banner(`STEP ${step}: SCORE THE PHOTO (0-${rubricMaximum(spec.rubric)} points)`)];
    if (spec.rubric.lead) {
      lines.push(spec.rubric.lead);
    }
    for (const dimension of spec.rubric.dimensions) {
      lines.push("", `${dimension.name} (0-${dimensionMaximum(dimension)}):`);
      for (const level of dimension.levels) {
        lines.push(`  ${`${level.points}:`.padEnd(4)}${level.description}`);
      }
    }
    return lines.join("\n");
  }
  if (spec.criteria) {
    const lines = [
      banner(`STEP ${step}: DETERMINE PASS/FAIL`),
      `PASS (${passField}: true) if:`,
      ...bullets(spec.criteria.pass),
      "",
      `FAIL (${passField}: false) if:`,
      ...bullets(spec.criteria.fail),
    ];
    if (spec.criteria.note) {
      lines.push("", spec.criteria.note);
    }
    return lines.join("\n");
  }
  return undefined;
}

function renderResponse(spec: PromptSpec, step: number): string {
  const lines = [banner(`STEP ${step}: RESPOND WITH SPECIFIC FEEDBACK`)];
  if (spec.rubric) {
    lines.push(`- ${spec.response.passField} = true ONLY if score >= ${spec.rubric.passThreshold}`);
  }
  lines.push(
    "- Feedback must be SPECIFIC to what you see. Keep it to 2 sentences max.",
    "- The user only sees PASS or FAIL with your feedback message. NEVER mention scores, points, or numbers in your feedback.",
    ...bullets(spec.feedback),
    "",
    "JSON format (all fields required):",
    spec.responseFormat,
    "",
    "Reply with exactly one JSON object in this format.",
  );
  return lines.join("\n");
}

function templateValues(spec: PromptSpec, params: PromptParams): Record<string, string | undefined> {
  const criteria = params.criteriaText?.trim();
  return {
    habitName: params.habitName,
    criteria: criteria ? params.criteriaText : spec.defaultCriteria,
    frameCount: params.frameCount === undefined ? undefined : String(params.frameCount),
    clipLength: params.durationSeconds === undefined ? "short" : `${Math.round(params.durationSeconds)}-second`,
  };
}

/**
 * Assembles the full instruction text for one request. User-supplied text is
 * substituted verbatim at the {{placeholders}} in a single pass.
 */
export function renderPrompt(spec: PromptSpec, params: PromptParams = {}): string {
  const blocks = [...spec.intro];

  if (spec.screenshotPolicy) {
    const policy = params.allowScreenshots ? spec.screenshotPolicy.accepted : spec.screenshotPolicy.rejected;
    blocks.push([policy.title, ...bullets(policy.lines)].join("\n"));
  }
  for (const section of spec.context ?? []) {
    blocks.push(renderSection(section));
  }

  let step = 1;
  if (spec.taxonomy) {
    blocks.push(`${banner(`STEP ${step}: IDENTIFY WHAT'S IN THE PHOTO`)}\n${renderTaxonomy(spec.taxonomy)}`);
    step += 1;
  }
  const scoring = renderScoring(spec, step);
  if (scoring) {
    blocks.push(scoring);
    step += 1;
  }
  blocks.push(renderResponse(spec, step));

  return interpolate(blocks.join("\n\n"), templateValues(spec, params));
}

export class PromptCatalog {
  constructor(
    private readonly specs: Readonly<Record<PhotoKind, PromptSpec>>,
    private readonly predefined: Readonly<Record<PredefinedHabitType, PromptSpec>>,
  ) {
    for (const spec of [...Object.values(specs), ...Object.values(predefined)]) {
      if (spec.rubric) {
        assertRubric(spec.rubric);
      }
    }
  }

  get(kind: VerificationKind, habitType?: string): PromptSpec {
    if (kind !== "predefined") {
      return this.specs[kind];
    }
    if (!isPredefinedHabitType(habitType)) {
      throw new Error(`Unknown habit type: ${String(habitType)}`);
    }
    return this.predefined[habitType];
  }

  render(kind: VerificationKind, params: PromptParams = {}): string {
    return renderPrompt(this.get(kind, params.habitType), params);
  }
}

export function createPromptCatalog(): PromptCatalog {
  return new PromptCatalog(
    {
      bed: bedPrompt,
      sunlight: sunlightPrompt,
      hydration: hydrationPrompt,
      "custom-photo": customPhotoPrompt,
      "custom-video": customVideoPrompt,
    },
    loadPredefinedPrompts(),
  );
}
