/**
 * OCR client used by the pipeline.
 *
 * Chooses the analysis mode per input kind and bounds every provider call: submission
 * must be accepted within `submitTimeoutMs` (a stalled layout submission is retried once
 * in read mode), and the result must arrive within the mode's result timeout.
 */

import type { OcrConfig } from "../config.js";
import { ConfigurationError, OcrError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { FileKind } from "../types.js";
import { AzureDocumentIntelligenceProvider } from "./providers/azure-document-intelligence.js";
import type {
  AnalyzeRequest,
  OcrMode,
  OcrOperation,
  OcrProvider,
  OcrResult,
} from "./types.js";

export interface RecognizeOutcome {
  result: OcrResult;
  mode: OcrMode;
  downgraded: boolean;
}

export function createOcrProvider(config: OcrConfig): OcrProvider {
  if (!config.endpoint || !config.apiKey) {
    throw new ConfigurationError(
      "Missing AZURE_DOC_INTEL_ENDPOINT or AZURE_DOC_INTEL_KEY",
    );
  }
  return new AzureDocumentIntelligenceProvider(
    config.endpoint,
    config.apiKey,
    config.apiVersion,
    config.pollIntervalMs,
  );
}

export class OcrClient {
  private readonly logger: Logger;

  constructor(
    private readonly provider: OcrProvider,
    private readonly config: OcrConfig,
    logger: Logger = silentLogger,
  ) {
    this.logger = logger.child("OcrClient");
  }

  static fromConfig(config: OcrConfig, logger?: Logger): OcrClient {
    return new OcrClient(createOcrProvider(config), config, logger);
  }

  /**
   * Primary recognition: read mode for photographed images, first-pages layout for PDFs.
   */
  async recognize(
    document: Uint8Array,
    fileKind: FileKind,
  ): Promise<RecognizeOutcome> {
    if (fileKind === "jpg") {
      this.logger.info(`Image input, using read mode (${document.length} bytes)`);
      const operation = await this.submit(document, { mode: "read" });
      const result = await this.waitFor(
        operation,
        "read",
        this.config.imageResultTimeoutMs,
      );
      return { result, mode: "read", downgraded: false };
    }

    let operation: OcrOperation;
    let mode: OcrMode = "layout";
    try {
      operation = await this.submit(document, {
        mode: "layout",
        pages: this.config.layoutPages,
        contentFormat: "markdown",
      });
    } catch (err) {
      if (!(err instanceof OcrError && err.kind === "submit-timeout")) {
        throw err;
      }
      this.logger.warn(`${err.message}; falling back to read mode`);
      mode = "read";
      operation = await this.submit(document, { mode: "read" });
    }

    const result = await this.waitFor(
      operation,
      mode,
      this.config.resultTimeoutMs,
    );
    this.logger.info(
      `OCR (${mode}) returned ${result.text.length} characters over ${result.pageCount} page(s)`,
    );
    return { result, mode, downgraded: mode !== "layout" };
  }

  /**
   * Secondary plain pass over the whole document, used by the fallback cascade.
   */
  async readPlain(document: Uint8Array): Promise<OcrResult> {
    const operation = await this.submit(document, { mode: "read" });
    return this.waitFor(
      operation,
      "read",
      this.config.secondaryResultTimeoutMs,
    );
  }

  private async submit(
    document: Uint8Array,
    request: AnalyzeRequest,
  ): Promise<OcrOperation> {
    const timeoutMs = this.config.submitTimeoutMs;
    return withDeadline(
      (signal) => this.provider.submit(document, request, signal),
      timeoutMs,
      () =>
        new OcrError(
          `${this.provider.name} ${request.mode} submission did not start within ${timeoutMs}ms`,
          "submit-timeout",
        ),
      `${this.provider.name} ${request.mode} submission failed`,
    );
  }

  private async waitFor(
    operation: OcrOperation,
    mode: OcrMode,
    timeoutMs: number,
  ): Promise<OcrResult> {
    return withDeadline(
      (signal) => operation.waitForResult({ timeoutMs, signal }),
      timeoutMs,
      () =>
        new OcrError(
          `${this.provider.name} ${mode} result not ready after ${timeoutMs}ms`,
          "result-timeout",
        ),
      `${this.provider.name} ${mode} analysis failed`,
    );
  }
}

/**
 * Races `run` against a timer. On expiry the call is aborted and `onTimeout()` is thrown;
 * any other failure is reported as a provider OcrError.
 */
async function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => OcrError,
  failurePrefix: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout());
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } catch (err) {
    if (err instanceof OcrError) throw err;
    throw new OcrError(`${failurePrefix}: ${errorMessage(err)}`, "provider", {
      cause: err,
    });
  } finally {
    clearTimeout(timer);
  }
}

export type { OcrResult, OcrLayout, OcrMode } from "./types.js";
