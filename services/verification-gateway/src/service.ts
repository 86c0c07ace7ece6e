import { RequestInvalidError, VerificationError } from "./errors.js";
import { extractJsonSpan } from "./extractor.js";
import type { InferenceBackend } from "./inferenceClient.js";
import { consoleLogger, type Logger } from "./logger.js";
import { parseVerdict } from "./parser.js";
import { renderPrompt, type PromptCatalog } from "./prompts/catalog.js";
import type { PromptParams } from "./prompts/types.js";
import type { VerificationOutcome, VerificationRequest } from "./types.js";

export type VerificationStage = "received" | "validated" | "upstream-called" | "extracted";

function promptParams(request: VerificationRequest): PromptParams {
  switch (request.kind) {
    case "custom-photo":
      return {
        habitName: request.habitName,
        criteriaText: request.criteriaText,
        allowScreenshots: request.allowScreenshots,
      };
    case "custom-video":
      return {
        habitName: request.habitName,
        criteriaText: request.criteriaText,
        frameCount: request.images.length,
        durationSeconds: request.durationSeconds,
      };
    case "predefined":
      return { habitType: request.habitType };
    default:
      return {};
  }
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause === undefined) {
    return error.message;
  }
  return `${error.message} (cause: ${describeError(error.cause)})`;
}

export class VerificationService {
  constructor(
    private readonly catalog: PromptCatalog,
    private readonly backend: InferenceBackend,
    private readonly logger: Logger = consoleLogger,
  ) {}

  async verify(request: VerificationRequest): Promise<VerificationOutcome> {
    let stage: VerificationStage = "received";
    try {
      if (request.images.length === 0 || request.images.some((image) => image.length === 0)) {
        throw new RequestInvalidError("At least one non-empty image is required");
      }
      const params = promptParams(request);
      const spec = this.catalog.get(request.kind, params.habitType);
      const prompt = renderPrompt(spec, params);
      stage = "validated";

      const raw = await this.backend.invoke(request.images, prompt, spec.maxOutputTokens, {
        labelFrames: request.kind === "custom-video",
      });
      stage = "upstream-called";

      const span = extractJsonSpan(raw);
      stage = "extracted";

      return parseVerdict(request.kind, span, spec.response);
    } catch (error) {
      const code = error instanceof VerificationError ? error.code : "INTERNAL";
      const line = `${request.kind} verification failed after ${stage} [${code}]: ${describeError(error)}`;
      if (error instanceof RequestInvalidError) {
        this.logger.warn(line);
      } else {
        this.logger.error(line);
      }
      throw error;
    }
  }
}
