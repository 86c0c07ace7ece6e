import { z } from "zod";

export const settingsSchema = z.object({
  apiKey: z.string().min(1, "VISION_API_KEY environment variable is required"),
  apiUrl: z.string().url(),
  model: z.string().min(1),
  apiVersion: z.string().min(1),
  port: z.number().int().nonnegative(),
  bodyLimit: z.string().min(1),
});

export type Settings = z.infer<typeof settingsSchema>;

export const defaults = {
  apiUrl: "https://api.anthropic.com/v1/messages",
  model: "claude-haiku-4-5",
  apiVersion: "2023-06-01",
  port: 8080,
  bodyLimit: "25mb",
} as const;

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return settingsSchema.parse({
    apiKey: env.VISION_API_KEY ?? "",
    apiUrl: env.VISION_API_URL ?? defaults.apiUrl,
    model: env.VISION_MODEL ?? defaults.model,
    apiVersion: env.VISION_API_VERSION ?? defaults.apiVersion,
    port: Number(env.PORT ?? defaults.port),
    bodyLimit: env.BODY_LIMIT ?? defaults.bodyLimit,
  });
}
