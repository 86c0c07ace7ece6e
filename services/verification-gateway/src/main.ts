import express from "express";
import type { NextFunction, Request, Response } from "express";
import morgan from "morgan";
import type { z } from "zod";

import { loadSettings, type Settings } from "./config.js";
import { RequestInvalidError } from "./errors.js";
import { InferenceClient } from "./inferenceClient.js";
import { consoleLogger, type Logger } from "./logger.js";
import { createPromptCatalog } from "./prompts/catalog.js";
import {
  customPhotoRequestSchema,
  photoRequestSchema,
  predefinedRequestSchema,
  toCustomPhotoRequest,
  toPhotoRequest,
  toPredefinedRequest,
  toVideoRequest,
  videoRequestSchema,
} from "./requests.js";
import { VerificationService } from "./service.js";
import type { ErrorResponse, VerificationRequest, VerificationResponse } from "./types.js";

export interface AppOptions {
  bodyLimit?: string;
  /** morgan format, or false to disable access logs. */
  logFormat?: string | false;
  logger?: Logger;
}

export function createService(settings: Settings, logger: Logger = consoleLogger): VerificationService {
  return new VerificationService(createPromptCatalog(), new InferenceClient(settings, logger), logger);
}

function setCorsHeaders(_req: Request, res: Response, next: NextFunction): void {
  res.set("Access-Control-Allow-Origin", "*");
  res.set("Access-Control-Allow-Methods", "POST, OPTIONS");
  res.set("Access-Control-Allow-Headers", "Content-Type");
  next();
}

function statusOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return 500;
}

export function createApp(service: VerificationService, options: AppOptions = {}) {
  const app = express();
  const logFormat = options.logFormat ?? "tiny";
  const logger = options.logger ?? consoleLogger;

  if (logFormat !== false) {
    app.use(morgan(logFormat));
  }
  app.use(setCorsHeaders);
  app.use(express.json({ limit: options.bodyLimit ?? "25mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  function mount<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    toRequest: (body: z.infer<S>) => VerificationRequest,
  ): void {
    app.options(path, (_req, res) => {
      res.status(204).send("");
    });

    app.post(path, async (req: Request, res: Response<VerificationResponse | ErrorResponse>) => {
      const parsed = schema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: parsed.error.issues[0]?.message ?? "Invalid request" });
        return;
      }

      try {
        const outcome = await service.verify(toRequest(parsed.data));
        res.json(outcome.body);
      } catch (error) {
        if (error instanceof RequestInvalidError) {
          res.status(400).json({ error: error.message });
          return;
        }
        res.status(500).json({ error: "Verification failed" });
      }
    });

    app.all(path, (_req, res) => {
      res.status(405).json({ error: "Method not allowed" });
    });
  }

  mount("/verifyBed", photoRequestSchema, (body) => toPhotoRequest("bed", body));
  mount("/verifySunlight", photoRequestSchema, (body) => toPhotoRequest("sunlight", body));
  mount("/verifyHydration", photoRequestSchema, (body) => toPhotoRequest("hydration", body));
  mount("/verifyCustomHabit", customPhotoRequestSchema, toCustomPhotoRequest);
  mount("/verifyVideo", videoRequestSchema, toVideoRequest);
  mount("/verifyPredefinedHabit", predefinedRequestSchema, toPredefinedRequest);

  app.use((error: unknown, _req: Request, res: Response<ErrorResponse>, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = statusOf(error);
    if (status === 413) {
      res.status(413).json({ error: "Request body too large" });
      return;
    }
    if (status === 400) {
      res.status(400).json({ error: "Invalid JSON body" });
      return;
    }
    if (status >= 400 && status < 500) {
      res.status(status).json({ error: "Invalid request body" });
      return;
    }
    logger.error(`Unhandled request error: ${error instanceof Error ? error.message : String(error)}`);
    res.status(500).json({ error: "Verification failed" });
  });

  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  const settings = loadSettings();
  const app = createApp(createService(settings), { bodyLimit: settings.bodyLimit });
  app.listen(settings.port, () => {
    consoleLogger.info(`Verification gateway listening on port ${settings.port}`);
  });
}
