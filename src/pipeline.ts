/**
 * Claim form extraction pipeline.
 *
 * DetectType → OCR → LLMExtract → IDRepair → DateOverride → NameRepair → Validate →
 * SecondaryNameRepair. Stages run strictly in sequence; each repair stage only fills or
 * overrides what the previous ones left wrong, and records its changes on the draft.
 */

import { getDefaultConfig, type AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger, silentLogger, type Logger } from "./logger.js";
import { LLMClient } from "./llm/index.js";
import type { ExtractedForm } from "./llm/schemas/form.js";
import { OcrClient, type OcrResult } from "./ocr/index.js";
import {
  findIdByHeuristics,
  findIdInLayout,
  findIdNearLabels,
} from "./analysis/id-search.js";
import {
  extractLastNameFromLayoutText,
  extractLastNameFromPlainText,
  findNameNearLabel,
} from "./analysis/name-search.js";
import { findReceiptDate } from "./analysis/receipt-date.js";
import {
  applyFieldChange,
  createDraft,
  getField,
  type ExtractionDraft,
} from "./normalize/draft.js";
import { asText } from "./normalize/fields.js";
import { extractFieldsWithLlm } from "./steps/llm-extract.js";
import {
  normalizationModeFor,
  type FileKind,
  type PipelineResult,
  type ValidationReport,
} from "./types.js";
import { detectFileKind } from "./utils/file-type.js";
import {
  detectLanguageRatio,
  digitsOnly,
  isValidIsraeliId,
} from "./utils/digits.js";
import { computeCompleteness, validateExtraction } from "./validation/report.js";

export interface PipelineDependencies {
  ocr: OcrClient;
  llm: LLMClient;
  logger?: Logger;
}

/**
 * Per-document state shared by the repair stages: the input and a lazily started
 * secondary read-mode pass, run at most once.
 */
interface ExtractionContext {
  document: Uint8Array;
  fileKind: FileKind;
  ocrText: string;
  secondaryRead(): Promise<OcrResult | null>;
}

export class FormExtractionPipeline {
  private readonly ocr: OcrClient;
  private readonly llm: LLMClient;
  private readonly logger: Logger;

  constructor(deps: PipelineDependencies) {
    this.ocr = deps.ocr;
    this.llm = deps.llm;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Builds the OCR and LLM clients from configuration; throws ConfigurationError when
   * either set of credentials is missing.
   */
  static fromConfig(
    config: AppConfig = getDefaultConfig(),
    logger: Logger = createLogger("Pipeline", config.logLevel),
  ): FormExtractionPipeline {
    return new FormExtractionPipeline({
      ocr: OcrClient.fromConfig(config.ocr, logger),
      llm: new LLMClient(config.llm),
      logger,
    });
  }

  async extract(document: Uint8Array): Promise<PipelineResult> {
    const detection = await detectFileKind(document);
    const fileKind = detection.kind;
    this.logger.info(
      `Detected ${fileKind} (${detection.mimeType ?? "unknown signature"}), ${document.length} bytes`,
    );

    const recognized = await this.ocr.recognize(document, fileKind);
    const ocrText = recognized.result.text;

    const context = this.createContext(document, fileKind, ocrText);

    let draft = createDraft(
      await extractFieldsWithLlm(this.llm, ocrText, this.logger.child("LlmExtract")),
    );
    draft = await this.repairId(draft, context);
    draft = this.overrideReceiptDate(draft, ocrText);
    draft = this.repairNames(draft, ocrText);

    const validated = validateExtraction(
      draft,
      normalizationModeFor(fileKind),
      ocrText,
      this.logger.child("Validate"),
    );
    const repaired = await this.repairLastNameAfterValidation(
      validated.form,
      validated.report,
      validated.draft,
      context,
    );

    return {
      form: repaired.form,
      report: repaired.report,
      metadata: {
        ocr_characters: ocrText.length,
        file_type: fileKind,
        ocr_summary: {
          model_id: recognized.result.modelId,
          model_version: recognized.result.modelVersion,
          page_count: recognized.result.pageCount,
          mode: recognized.mode,
          downgraded: recognized.downgraded,
        },
        language_ratio: detectLanguageRatio(ocrText),
        draft_revisions: repaired.draft.revision,
      },
    };
  }

  private createContext(
    document: Uint8Array,
    fileKind: FileKind,
    ocrText: string,
  ): ExtractionContext {
    let pending: Promise<OcrResult | null> | undefined;
    const log = this.logger.child("SecondaryOcr");

    return {
      document,
      fileKind,
      ocrText,
      secondaryRead: () => {
        pending ??= this.ocr.readPlain(document).catch((err: unknown) => {
          log.warn(`Secondary read pass failed: ${errorMessage(err)}`);
          return null;
        });
        return pending;
      },
    };
  }

  private async repairId(
    draft: ExtractionDraft,
    context: ExtractionContext,
  ): Promise<ExtractionDraft> {
    const log = this.logger.child("IdRepair");
    const id = digitsOnly(asText(getField(draft, "idNumber")));

    const acceptable =
      id.length === 10 || (id.length === 9 && isValidIsraeliId(id));
    if (acceptable) {
      log.debug(`Keeping LLM ID ${id}`);
      return draft;
    }

    let found =
      findIdNearLabels(context.ocrText) ?? findIdByHeuristics(context.ocrText);

    // Images skip the extra OCR round trip
    if (!found && context.fileKind === "pdf") {
      const read = await context.secondaryRead();
      found = findIdInLayout(read?.layout ?? null);
    }

    if (!found) {
      log.info(`No ID found in OCR output (LLM value "${id}")`);
      return draft;
    }
    log.info(`Replacing LLM ID "${id}" with ${found}`);
    return applyFieldChange(draft, "idNumber", found, "id-repair");
  }

  private overrideReceiptDate(
    draft: ExtractionDraft,
    ocrText: string,
  ): ExtractionDraft {
    const receipt = findReceiptDate(ocrText);
    if (!receipt) return draft;

    this.logger.info(
      `Receipt date from OCR: ${receipt.day}/${receipt.month}/${receipt.year}`,
    );
    let next = draft;
    for (const part of ["day", "month", "year"] as const) {
      const path = `formReceiptDateAtClinic.${part}`;
      if (getField(next, path) !== receipt[part]) {
        next = applyFieldChange(next, path, receipt[part], "date-override");
      }
    }
    return next;
  }

  private repairNames(draft: ExtractionDraft, ocrText: string): ExtractionDraft {
    const log = this.logger.child("NameRepair");
    let next = draft;

    for (const field of ["firstName", "lastName"] as const) {
      if (asText(getField(next, field)).trim()) continue;
      const found = findNameNearLabel(ocrText, field);
      log.debug(`${field} missing, label search found "${found ?? ""}"`);
      if (found) next = applyFieldChange(next, field, found, "name-repair");
    }
    return next;
  }

  /**
   * Runs when validation left `lastName` empty. A recovered name is written into the form
   * and completeness is recomputed from it.
   */
  private async repairLastNameAfterValidation(
    form: ExtractedForm,
    report: ValidationReport,
    draft: ExtractionDraft,
    context: ExtractionContext,
  ): Promise<{ form: ExtractedForm; report: ValidationReport; draft: ExtractionDraft }> {
    if (form.lastName) return { form, report, draft };

    const log = this.logger.child("SecondaryNameRepair");
    let found = extractLastNameFromLayoutText(context.ocrText, form.firstName);
    log.debug(`Layout text search found "${found}"`);

    if (!found && context.fileKind === "pdf") {
      const read = await context.secondaryRead();
      found = read ? extractLastNameFromPlainText(read.text) : "";
      log.debug(`Plain read search found "${found}"`);
    }
    if (!found) return { form, report, draft };

    const repairedForm = { ...form, lastName: found };
    const repairedReport = { ...report, ...computeCompleteness(repairedForm) };
    log.info(
      `lastName recovered as "${found}", completeness now ${repairedReport.completeness_percent}%`,
    );
    return {
      form: repairedForm,
      report: repairedReport,
      draft: applyFieldChange(draft, "lastName", found, "secondary-name-repair"),
    };
  }
}

/**
 * One-shot extraction with clients built from the environment.
 */
export async function extractForm(
  document: Uint8Array,
  config?: AppConfig,
): Promise<PipelineResult> {
  return FormExtractionPipeline.fromConfig(config).extract(document);
}
