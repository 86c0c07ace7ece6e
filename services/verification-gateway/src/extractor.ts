import { ExtractionError } from "./errors.js";

const openingFence = /^```[\w-]*/;
const closingFence = /```$/;

/**
 * Recovers the JSON object span from model text that may be wrapped in a
 * Markdown fence or surrounded by prose. Assumes a single object and no
 * braces in the surrounding prose.
 */
export function extractJsonSpan(raw: string): string {
  let text = raw.trim();
  text = text.replace(openingFence, "");
  text = text.replace(closingFence, "");
  text = text.trim();

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end === -1 || end < start) {
    throw new ExtractionError("No JSON object found in model output");
  }
  return text.slice(start, end + 1);
}

export function parseJsonSpan(span: string): unknown {
  try {
    return JSON.parse(span);
  } catch (error) {
    throw new ExtractionError(`Model output is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }
}
