/**
 * Final stage: normalizes the draft, coerces it into the form schema and builds the
 * validation report. Standard and lenient reports differ only where noted.
 */

import { extractedFormSchema, type ExtractedForm } from "../llm/schemas/form.js";
import { SchemaError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import {
  applyFieldChange,
  getField,
  isRecord,
  type ExtractionDraft,
} from "../normalize/draft.js";
import { findIdCorrection } from "../normalize/cross-check.js";
import { asText, normalizeDraft } from "../normalize/fields.js";
import type {
  IntelligentCorrection,
  NormalizationMode,
  ValidationReport,
} from "../types.js";
import { digitsOnly, isValidIsraeliId } from "../utils/digits.js";

export interface Completeness {
  completeness_percent: number;
  missing_fields: string[];
}

/**
 * Share of non-empty leaves, rounded to one decimal, and the dotted paths of the empty
 * ones in depth-first declaration order.
 */
export function computeCompleteness(value: Record<string, unknown>): Completeness {
  let total = 0;
  let filled = 0;
  const missing: string[] = [];

  const visit = (node: unknown, path: string) => {
    if (isRecord(node)) {
      for (const [key, child] of Object.entries(node)) {
        visit(child, path ? `${path}.${key}` : key);
      }
      return;
    }
    total++;
    if (String(node ?? "").trim()) filled++;
    else missing.push(path);
  };
  visit(value, "");

  return {
    completeness_percent: total ? Math.round((filled / total) * 1000) / 10 : 0,
    missing_fields: missing,
  };
}

/** Absent means "": nulls are dropped so that schema defaults apply */
function dropNulls(value: unknown): unknown {
  if (value === null) return undefined;
  if (!isRecord(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const cleaned = dropNulls(child);
    if (cleaned !== undefined) out[key] = cleaned;
  }
  return out;
}

export function parseForm(fields: Readonly<Record<string, unknown>>): ExtractedForm {
  const parsed = extractedFormSchema.safeParse(dropNulls(fields));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new SchemaError(
      `Extracted fields do not match the form schema: ${issues.join("; ")}`,
      issues,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

function idWarning(problem: string, mode: NormalizationMode): string {
  return mode === "lenient"
    ? `${problem}; Please verify from the image`
    : `${problem}; Please check your form`;
}

/**
 * `extractedDigits` are the ID digits before normalization, which blanks anything shorter
 * than nine digits.
 */
function checkId(
  idNumber: string,
  extractedDigits: string,
  mode: NormalizationMode,
): Pick<ValidationReport, "id_warning" | "id_checksum_valid"> {
  if (!idNumber) {
    return extractedDigits.length > 0 && extractedDigits.length < 9
      ? { id_warning: idWarning(`ID has ${extractedDigits.length} digits`, mode) }
      : {};
  }
  if (idNumber.length === 10 && !idNumber.startsWith("0")) {
    return {
      id_checksum_valid: false,
      id_warning: idWarning("10-digit ID starting with non-0", mode),
    };
  }
  return { id_checksum_valid: isValidIsraeliId(idNumber) };
}

export interface ValidationOutcome {
  form: ExtractedForm;
  report: ValidationReport;
  draft: ExtractionDraft;
}

export function validateExtraction(
  input: ExtractionDraft,
  mode: NormalizationMode,
  ocrText: string,
  logger: Logger = silentLogger,
): ValidationOutcome {
  let draft = input;
  let intelligentCorrections: Record<string, IntelligentCorrection> | undefined;

  if (mode === "lenient") {
    const correction = findIdCorrection(
      asText(getField(draft, "idNumber")),
      ocrText,
    );
    if (correction) {
      logger.info(
        `ID ${correction.llm_value} replaced by OCR pattern ${correction.ocr_pattern}`,
      );
      draft = applyFieldChange(
        draft,
        "idNumber",
        correction.corrected_value,
        "intelligent-correction",
      );
      intelligentCorrections = { idNumber: correction };
    }
  }

  const extractedIdDigits = digitsOnly(asText(getField(draft, "idNumber")));
  const normalized = normalizeDraft(draft, mode, logger);
  draft = normalized.draft;

  const form = parseForm(draft.fields);

  const report: ValidationReport = {
    ...computeCompleteness(form),
    ...checkId(form.idNumber, extractedIdDigits, mode),
  };
  if (normalized.phoneCorrections.length > 0) {
    report.phone_corrections = normalized.phoneCorrections;
  }
  if (mode === "lenient") {
    report.validation_type = "IMAGE_LENIENT";
  }
  if (intelligentCorrections) {
    report.intelligent_corrections = intelligentCorrections;
  }

  logger.info(
    `Validated (${mode}): ${report.completeness_percent}% complete, ${report.missing_fields.length} missing`,
  );
  return { form, report, draft };
}
