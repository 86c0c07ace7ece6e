import { SchemaViolationError } from "./errors.js";
import { parseJsonSpan } from "./extractor.js";
import type { ResponseContract } from "./prompts/contract.js";
import type { VerificationKind, VerificationOutcome } from "./types.js";

/**
 * Validates an extracted span against the contract for its kind. Types are
 * never coerced and missing fields are never defaulted.
 */
export function parseVerdict(kind: VerificationKind, span: string, contract: ResponseContract): VerificationOutcome {
  const value = parseJsonSpan(span);
  const result = contract.check(value);
  if (!result.success) {
    throw new SchemaViolationError(
      `Model output does not match the ${kind} response schema (${result.issues.join("; ")})`,
      result.fields,
    );
  }
  return {
    verdict: { kind, ...result.verdict },
    body: result.body,
  };
}
