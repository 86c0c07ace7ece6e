import fetch from "node-fetch";
import type { Response } from "node-fetch";
import { z } from "zod";

import type { Settings } from "./config.js";
import { UpstreamError } from "./errors.js";
import { consoleLogger, type Logger } from "./logger.js";

export type ImageMediaType = "image/jpeg" | "image/png" | "image/gif" | "image/webp";

export type ContentBlock =
  | { type: "image"; source: { type: "base64"; media_type: ImageMediaType; data: string } }
  | { type: "text"; text: string };

export interface InvokeOptions {
  /** Follow each image with a "Frame i of n" label, for chronological video frames. */
  labelFrames?: boolean;
}

export interface InferenceBackend {
  invoke(images: string[], prompt: string, maxOutputTokens: number, options?: InvokeOptions): Promise<string>;
}

export type InferenceSettings = Pick<Settings, "apiKey" | "apiUrl" | "model" | "apiVersion">;

const envelopeSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
});

const signatures: Array<[prefix: string, mediaType: ImageMediaType]> = [
  ["/9j/", "image/jpeg"],
  ["iVBORw0KGgo", "image/png"],
  ["R0lGOD", "image/gif"],
  ["UklGR", "image/webp"],
];

const dataUrlPattern = /^data:(image\/[a-z0-9.+-]+);base64,/i;

function isImageMediaType(value: string): value is ImageMediaType {
  return signatures.some(([, mediaType]) => mediaType === value);
}

export function sniffMediaType(data: string): ImageMediaType {
  const match = signatures.find(([prefix]) => data.startsWith(prefix));
  return match ? match[1] : "image/jpeg";
}

export function normalizeImage(payload: string): { mediaType: ImageMediaType; data: string } {
  const match = dataUrlPattern.exec(payload);
  if (!match) {
    return { mediaType: sniffMediaType(payload), data: payload };
  }
  const data = payload.slice(match[0].length);
  const declared = match[1].toLowerCase();
  return { mediaType: isImageMediaType(declared) ? declared : sniffMediaType(data), data };
}

export function buildContent(images: string[], prompt: string, options: InvokeOptions = {}): ContentBlock[] {
  const content: ContentBlock[] = [];
  images.forEach((image, index) => {
    const { mediaType, data } = normalizeImage(image);
    content.push({ type: "image", source: { type: "base64", media_type: mediaType, data } });
    if (options.labelFrames) {
      content.push({ type: "text", text: `Frame ${index + 1} of ${images.length}` });
    }
  });
  content.push({ type: "text", text: prompt });
  return content;
}

export class InferenceClient implements InferenceBackend {
  constructor(
    private readonly settings: InferenceSettings,
    private readonly logger: Logger = consoleLogger,
  ) {
    if (!settings.apiKey) {
      throw new Error("InferenceClient requires an apiKey");
    }
  }

  async invoke(images: string[], prompt: string, maxOutputTokens: number, options: InvokeOptions = {}): Promise<string> {
    const body = {
      model: this.settings.model,
      max_tokens: maxOutputTokens,
      messages: [{ role: "user", content: buildContent(images, prompt, options) }],
    };

    let response: Response;
    try {
      response = await fetch(this.settings.apiUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "anthropic-version": this.settings.apiVersion,
          "x-api-key": this.settings.apiKey,
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new UpstreamError("Inference request could not be sent", undefined, { cause: error });
    }

    if (!response.ok) {
      const text = await this.readErrorBody(response);
      this.logger.error(`Inference API error: ${response.status} ${text}`);
      throw new UpstreamError(`Inference API error: ${response.status}`, response.status);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new UpstreamError("Inference response is not JSON", response.status, { cause: error });
    }

    const envelope = envelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new UpstreamError("Inference response has an unexpected shape", response.status);
    }
    const text = envelope.data.content.find((block) => block.type === "text" && block.text)?.text;
    if (!text) {
      throw new UpstreamError("No text content in inference response", response.status);
    }
    return text;
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || "<empty>";
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}
