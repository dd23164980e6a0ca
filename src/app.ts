/**
 * HTTP surface: health check and single-document extraction.
 */

import express, { type Request, type Response } from "express";
import { PipelineError, errorMessage, type PipelineStage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { PipelineResult } from "./types.js";

export interface Extractor {
  extract(document: Uint8Array): Promise<PipelineResult>;
}

const STATUS_BY_STAGE: Record<PipelineStage, number> = {
  config: 500,
  ocr: 502,
  llm: 502,
  validation: 422,
};

export function statusForError(err: unknown): number {
  return err instanceof PipelineError ? STATUS_BY_STAGE[err.stage] : 500;
}

/**
 * @param createExtractor called per request, so that missing credentials surface as a
 * `config` failure of that request rather than preventing startup
 */
export function createApp(
  createExtractor: () => Extractor,
  logger: Logger = silentLogger,
  version = "local-dev",
): express.Express {
  const app = express();

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      version,
      status: "healthy",
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * Extract a claim form
   *
   * Body: the raw PDF or JPEG bytes. Responds with `{ form, report, metadata }`, or
   * `{ error, stage }` naming the failed stage.
   */
  app.post(
    "/extract",
    express.raw({ type: () => true, limit: "25mb" }),
    async (req: Request, res: Response) => {
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        res.status(400).json({ error: "Request body must contain the document bytes" });
        return;
      }

      try {
        const result = await createExtractor().extract(new Uint8Array(body));
        res.json(result);
      } catch (error) {
        const stage = error instanceof PipelineError ? error.stage : undefined;
        logger.error(`Extraction failed${stage ? ` at ${stage}` : ""}:`, errorMessage(error));
        res.status(statusForError(error)).json({
          error: errorMessage(error),
          stage: stage ?? "unknown",
        });
      }
    },
  );

  return app;
}
