import type { IntelligentCorrection } from "../types.js";
import { digitsOnly } from "../utils/digits.js";

/** 9-10 digits, each optionally separated by one space or hyphen */
const SEPARATED_ID = /(?<!\d)\d(?:[\s\-]?\d){8,9}(?!\d)/g;

/**
 * Cross-checks the LLM's ID against the OCR text for photographed forms.
 *
 * A separated 10-digit run starting with 0 that differs from the LLM value wins, minus its
 * leading zero, even over an LLM value with a valid checksum. This ordering is tuned to
 * observed camera misreads and is pending product review.
 */
export function findIdCorrection(
  llmValue: string,
  ocrText: string,
): IntelligentCorrection | null {
  if (!llmValue || !ocrText) return null;
  const llmDigits = digitsOnly(llmValue);

  for (const match of ocrText.matchAll(SEPARATED_ID)) {
    const pattern = match[0];
    const digits = digitsOnly(pattern);
    if (digits === llmDigits) continue;
    if (digits.length === 10 && digits.startsWith("0")) {
      return {
        llm_value: llmValue,
        ocr_pattern: pattern,
        corrected_value: digits.slice(1),
        reason: `OCR shows the 10-digit pattern '${pattern}' with a leading 0; preferred over the LLM value '${llmValue}'`,
      };
    }
  }
  return null;
}
