/**
 * Stage-tagged failures surfaced by the extraction pipeline.
 *
 * Callers route on `stage` (and `OcrError.kind`) instead of matching on message text.
 */

export type PipelineStage = "config" | "ocr" | "llm" | "validation";

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: PipelineStage,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super(message, "config");
    this.name = "ConfigurationError";
  }
}

export type OcrFailureKind = "submit-timeout" | "result-timeout" | "provider";

export class OcrError extends PipelineError {
  constructor(
    message: string,
    public readonly kind: OcrFailureKind,
    options?: { cause?: unknown },
  ) {
    super(message, "ocr", options);
    this.name = "OcrError";
  }
}

export class LlmError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "llm", options);
    this.name = "LlmError";
  }
}

export class SchemaError extends PipelineError {
  constructor(
    message: string,
    public readonly issues: string[],
    options?: { cause?: unknown },
  ) {
    super(message, "validation", options);
    this.name = "SchemaError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
