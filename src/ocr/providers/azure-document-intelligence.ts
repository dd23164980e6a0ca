/**
 * Azure Document Intelligence (v4 REST) provider.
 *
 * Submits the document to `prebuilt-layout` or `prebuilt-read`, then polls the
 * `Operation-Location` returned with the 202 until the analysis settles.
 */

import { z } from "zod";
import { OcrError } from "../../errors.js";
import type {
  AnalyzeRequest,
  OcrOperation,
  OcrProvider,
  OcrResult,
} from "../types.js";

const polygonSchema = z.array(z.number()).default([]);

const analyzeResultSchema = z.object({
  apiVersion: z.string().optional(),
  modelId: z.string().optional(),
  content: z.string().default(""),
  pages: z
    .array(
      z.object({
        pageNumber: z.number(),
        lines: z
          .array(z.object({ content: z.string(), polygon: polygonSchema }))
          .default([]),
        words: z
          .array(
            z.object({
              content: z.string(),
              polygon: polygonSchema,
              confidence: z.number().optional(),
            }),
          )
          .default([]),
      }),
    )
    .default([]),
});

const analyzeOperationSchema = z.object({
  status: z.enum(["notStarted", "running", "succeeded", "failed", "canceled"]),
  analyzeResult: analyzeResultSchema.optional(),
  error: z.unknown().optional(),
});

export type AnalyzeResult = z.infer<typeof analyzeResultSchema>;

const MODEL_IDS = {
  layout: "prebuilt-layout",
  read: "prebuilt-read",
} as const;

export class AzureDocumentIntelligenceProvider implements OcrProvider {
  name = "azure-document-intelligence";

  constructor(
    protected endpoint: string,
    protected apiKey: string,
    protected apiVersion: string,
    protected pollIntervalMs: number = 1000,
  ) {}

  async submit(
    document: Uint8Array,
    request: AnalyzeRequest,
    signal: AbortSignal,
  ): Promise<OcrOperation> {
    const modelId = MODEL_IDS[request.mode];

    const response = await fetch(this._analyzeUrl(modelId, request), {
      method: "POST",
      headers: {
        ...this._getRequestHeaders(),
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        base64Source: Buffer.from(document).toString("base64"),
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new OcrError(
        `${this.name} API error (${response.status}): ${error}`,
        "provider",
      );
    }

    const operationLocation = response.headers.get("operation-location");
    if (!operationLocation) {
      throw new OcrError(
        `${this.name} accepted ${modelId} but returned no Operation-Location`,
        "provider",
      );
    }

    return {
      waitForResult: (options) =>
        this._poll(operationLocation, modelId, options),
    };
  }

  protected _analyzeUrl(modelId: string, request: AnalyzeRequest): string {
    const params = new URLSearchParams({ "api-version": this.apiVersion });
    if (request.pages) params.set("pages", request.pages);
    if (request.contentFormat === "markdown") {
      params.set("outputContentFormat", "markdown");
    }
    params.set("stringIndexType", "unicodeCodePoint");

    const base = this.endpoint.replace(/\/+$/, "");
    return `${base}/documentintelligence/documentModels/${modelId}:analyze?${params.toString()}`;
  }

  protected _getRequestHeaders(): Record<string, string> {
    return { "Ocp-Apim-Subscription-Key": this.apiKey };
  }

  private async _poll(
    operationLocation: string,
    modelId: string,
    options: { timeoutMs: number; signal?: AbortSignal },
  ): Promise<OcrResult> {
    const deadline = Date.now() + options.timeoutMs;

    for (;;) {
      const response = await fetch(operationLocation, {
        method: "GET",
        headers: this._getRequestHeaders(),
        signal: options.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new OcrError(
          `${this.name} poll error (${response.status}): ${error}`,
          "provider",
        );
      }

      const parsed = analyzeOperationSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new OcrError(
          `${this.name} returned an unexpected analyze payload: ${parsed.error.message}`,
          "provider",
        );
      }

      const operation = parsed.data;
      if (operation.status === "succeeded") {
        return toOcrResult(
          operation.analyzeResult ?? analyzeResultSchema.parse({}),
          modelId,
        );
      }
      if (operation.status === "failed" || operation.status === "canceled") {
        throw new OcrError(
          `${this.name} analysis ${operation.status}: ${JSON.stringify(operation.error ?? null)}`,
          "provider",
        );
      }

      if (Date.now() >= deadline) {
        throw new OcrError(
          `${this.name} ${modelId} result not ready after ${options.timeoutMs}ms`,
          "result-timeout",
        );
      }
      await this._sleep(this.pollIntervalMs);
    }
  }

  private _sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export function toOcrResult(result: AnalyzeResult, modelId: string): OcrResult {
  const pages = result.pages.map((page) => ({
    pageNumber: page.pageNumber,
    lines: page.lines,
    words: page.words,
  }));

  return {
    text: result.content,
    layout: pages.length > 0 ? { pages } : null,
    modelId: result.modelId ?? modelId,
    modelVersion: result.apiVersion,
    pageCount: pages.length,
  };
}
