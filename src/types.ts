/**
 * Contracts between the pipeline stages and its callers.
 */

import type { ExtractedForm } from "./llm/schemas/form.js";
import type { OcrMode } from "./ocr/types.js";

export type { ExtractedForm } from "./llm/schemas/form.js";

// ============================================================================
// Input classification
// ============================================================================

/** Photographed submissions are "jpg"; everything else is handled as a scanned PDF */
export type FileKind = "jpg" | "pdf";

export type NormalizationMode = "standard" | "lenient";

export function normalizationModeFor(fileKind: FileKind): NormalizationMode {
  return fileKind === "jpg" ? "lenient" : "standard";
}

// ============================================================================
// Validation report
// ============================================================================

export interface IntelligentCorrection {
  llm_value: string;
  ocr_pattern: string;
  corrected_value: string;
  reason: string;
}

export interface ValidationReport {
  /** 0-100, one decimal */
  completeness_percent: number;
  /** Dotted paths of empty leaves, in field declaration order */
  missing_fields: string[];
  id_warning?: string;
  /** Present whenever the final model carries an ID */
  id_checksum_valid?: boolean;
  phone_corrections?: string[];
  validation_type?: "IMAGE_LENIENT";
  intelligent_corrections?: Record<string, IntelligentCorrection>;
}

// ============================================================================
// Pipeline output
// ============================================================================

export interface OcrSummary {
  model_id: string;
  model_version?: string;
  page_count: number;
  mode: OcrMode;
  /** True when layout analysis could not be submitted in time and read mode was used */
  downgraded: boolean;
}

export interface PipelineMetadata {
  ocr_characters: number;
  file_type: FileKind;
  ocr_summary: OcrSummary;
  language_ratio: { hebrew: number; latin: number };
  /** Number of field changes applied by the correction cascade */
  draft_revisions: number;
}

export interface PipelineResult {
  form: ExtractedForm;
  report: ValidationReport;
  metadata: PipelineMetadata;
}
