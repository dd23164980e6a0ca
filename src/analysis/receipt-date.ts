import type { DateTriple } from "../llm/schemas/form.js";
import { RECEIPT_DATE_LABELS, findLabelPositions } from "./labels.js";

const RECEIPT_WINDOW = 250;
const EIGHT_DIGITS = /(?<!\d)(\d{8})(?!\d)/g;

function toDate(ddmmyyyy: string): DateTriple | null {
  const day = Number(ddmmyyyy.slice(0, 2));
  const month = Number(ddmmyyyy.slice(2, 4));
  const year = Number(ddmmyyyy.slice(4, 8));
  if (day < 1 || day > 31 || month < 1 || month > 12) return null;
  if (year < 1900 || year > 2100) return null;
  return {
    day: ddmmyyyy.slice(0, 2),
    month: ddmmyyyy.slice(2, 4),
    year: ddmmyyyy.slice(4, 8),
  };
}

function firstValidDate(text: string): DateTriple | null {
  for (const match of text.matchAll(EIGHT_DIGITS)) {
    const date = toDate(match[1]);
    if (date) return date;
  }
  return null;
}

/**
 * Date the clinic received the form, printed as `ddmmyyyy` in the 250 characters after one
 * of its labels. Falls back to the first plausible eight-digit date anywhere in the text.
 */
export function findReceiptDate(text: string): DateTriple | null {
  if (!text) return null;

  for (const position of findLabelPositions(text, RECEIPT_DATE_LABELS)) {
    const date = firstValidDate(
      text.slice(position.end, position.end + RECEIPT_WINDOW),
    );
    if (date) return date;
  }
  return firstValidDate(text);
}
