/**
 * Field normalizers applied to the extraction draft before it is coerced into the form.
 *
 * One implementation serves both modes. `lenient` is used for photographed JPEG input and
 * additionally undoes the digit misreads typical of camera captures (a leading 0 read as 8
 * or 9, 08 read as 09, a stray digit in front of a valid ID).
 */

import { DATE_FIELDS, type DateTriple } from "../llm/schemas/form.js";
import { silentLogger, type Logger } from "../logger.js";
import type { NormalizationMode } from "../types.js";
import { digitsOnly, isValidIsraeliId, parsePossibleDate } from "../utils/digits.js";
import { HEBREW_ID_LABELS, NAME_REJECT_TOKENS } from "../analysis/labels.js";
import {
  applyFieldChange,
  getField,
  isRecord,
  type ExtractionDraft,
} from "./draft.js";

export type PhoneKind = "mobile" | "landline";

export interface PhoneNormalization {
  value: string;
  corrected: boolean;
}

/** Text of a scalar slot; numbers are accepted since models often emit phones as numbers */
export function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

export function normalizeId(value: string, mode: NormalizationMode): string {
  let digits = digitsOnly(value);
  // a fragment is not an ID; the report carries the warning instead
  if (digits.length < 9) return "";

  if (digits.length === 10) {
    if (digits.startsWith("0")) {
      digits = digits.slice(1);
    } else if (mode === "standard") {
      // kept for review, flagged by the report
      return digits;
    } else if (isValidIsraeliId(digits.slice(-9))) {
      digits = digits.slice(-9);
    }
  }

  const keepUpTo = mode === "standard" ? 9 : 10;
  if (digits.length > keepUpTo) digits = digits.slice(-9);
  return digits;
}

/**
 * Mobile numbers end up as 05XXXXXXXX (10 digits), landlines as 0XXXXXXXX (9 digits).
 * Any change of digit count counts as a correction.
 */
export function normalizePhone(
  value: string,
  kind: PhoneKind,
  mode: NormalizationMode,
): PhoneNormalization {
  const original = digitsOnly(value);
  if (!original) return { value: "", corrected: false };

  const lenient = mode === "lenient";
  const misreadZero = /^[89]/.test(original);
  let digits = original;
  let corrected = true;

  if (kind === "mobile") {
    if (digits.startsWith("5")) digits = "0" + digits;
    else if (lenient && misreadZero) digits = "05" + digits.slice(1);
    else if (!digits.startsWith("05")) digits = "05" + digits.slice(-8);
    else corrected = false;
    digits = digits.slice(0, 10);
  } else {
    if (lenient && misreadZero) digits = "0" + digits.slice(1);
    else if (lenient && digits.length === 9 && digits.startsWith("09")) {
      digits = "08" + digits.slice(2);
    } else if (!digits.startsWith("0")) digits = "0" + digits;
    else corrected = false;
    digits = digits.slice(0, 9);
  }

  return {
    value: digits,
    corrected: corrected || digits.length !== original.length,
  };
}

export function normalizeGender(value: string): string {
  const v = value.trim().toLowerCase();
  if (["זכר", "male", "m"].includes(v)) return "male";
  if (["נקבה", "female", "f"].includes(v)) return "female";
  return v;
}

const CHECK_MARKS = new Set(["x", "X", "✗", "✔", "✓"]);

export function normalizeSignature(value: string): string {
  const v = value.trim();
  return CHECK_MARKS.has(v) ? "X" : v;
}

/**
 * True when a name slot holds something other than a name: a form label, digits, a single
 * character, or text containing an ID label.
 */
export function isImplausibleName(value: string): boolean {
  const v = value.trim();
  if (v.length < 2) return true;
  if (NAME_REJECT_TOKENS.has(v)) return true;
  if (/^\d+$/.test(v)) return true;
  if (HEBREW_ID_LABELS.some((label) => v.includes(label))) return true;
  // Latin "ID" only as a word, so that names like "David" survive
  return /\bid\b/i.test(v);
}

export function normalizeDateTriple(value: unknown): DateTriple {
  if (!isRecord(value)) {
    const [day, month, year] = parsePossibleDate(asText(value));
    return { day, month, year };
  }

  const day = asText(value.day);
  const month = asText(value.month);
  const year = asText(value.year);
  if (day && month && year && !/^\d{1,2}$/.test(day)) {
    // a whole date written into one part
    const [d, m, y] = parsePossibleDate([day, month, year].join(" "));
    return { day: d, month: m, year: y };
  }
  return {
    day: digitsOnly(day),
    month: digitsOnly(month),
    year: digitsOnly(year),
  };
}

export interface NormalizeOutcome {
  draft: ExtractionDraft;
  phoneCorrections: string[];
}

const PHONE_FIELDS = [
  { field: "mobilePhone", kind: "mobile", label: "Mobile phone" },
  { field: "landlinePhone", kind: "landline", label: "Landline phone" },
] as const;

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Applies every field rule to the draft. Only fields whose value actually changes produce
 * a new revision.
 */
export function normalizeDraft(
  input: ExtractionDraft,
  mode: NormalizationMode,
  logger: Logger = silentLogger,
): NormalizeOutcome {
  let draft = input;
  const set = (field: string, next: unknown) => {
    const previous = getField(draft, field);
    if (sameValue(previous, next)) return;
    logger.debug(
      `${field}: ${JSON.stringify(previous ?? null)} -> ${JSON.stringify(next)}`,
    );
    draft = applyFieldChange(draft, field, next, "normalize");
  };

  if (getField(draft, "gender") !== undefined) {
    set("gender", normalizeGender(asText(getField(draft, "gender"))));
  }

  for (const field of DATE_FIELDS) {
    set(field, normalizeDateTriple(getField(draft, field)));
  }

  set("idNumber", normalizeId(asText(getField(draft, "idNumber")), mode));

  const phoneCorrections: string[] = [];
  const suffix = mode === "lenient" ? " (image processing)" : "";
  for (const { field, kind, label } of PHONE_FIELDS) {
    const phone = normalizePhone(asText(getField(draft, field)), kind, mode);
    set(field, phone.value);
    if (phone.corrected && phone.value) {
      phoneCorrections.push(
        `${label} auto-corrected with the standard '0' prefix${suffix}`,
      );
    }
  }

  if (getField(draft, "signature") !== undefined) {
    set("signature", normalizeSignature(asText(getField(draft, "signature"))));
  }

  for (const field of ["lastName", "firstName"]) {
    const raw = getField(draft, field);
    const name = asText(raw).trim();
    if (name && isImplausibleName(name)) {
      logger.info(`Blanking ${field} "${name}": not a plausible name`);
      set(field, "");
    }
  }

  return { draft, phoneCorrections };
}
