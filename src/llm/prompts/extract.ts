/**
 * Extraction rules for the National Insurance claim form (ביטוח לאומי).
 * The user prompt carries the empty JSON shape generated from the form schema.
 */
import { extractedFormSchema } from "../schemas/form.js";
import { zodToJsonTemplate } from "../schemas/utils.js";

export const EXTRACT_SYSTEM_PROMPT = `
You extract structured data from the OCR text of an Israeli National Insurance
(ביטוח לאומי) work-injury claim form.

Return ONLY a JSON object with exactly the keys of the provided shape.
Use an empty string for any field that is not present. Hebrew and English both occur.
Do not invent values.

NORMALIZATION:
- Names: keep them as written, no transliteration.
- idNumber (תעודת זהות): digits only, no separators. Exactly 9 digits is expected;
  when more digits appear, pick the 9-digit ID. If it cannot be read, "".
- Dates: split into day, month and year strings. Fill the parts you can read and
  leave the rest "".
- Phones: digits only, keep the leading 0.
- gender: one of "זכר", "נקבה", "male", "female", or "".
- signature: the handwritten name or mark next to the חתימה line. A written name is
  returned as written; a lone X or check mark is returned as "X"; an empty line is "".

LABELS ARE NOT VALUES:
- lastName (שם משפחה) and firstName (שם פרטי): take ONLY the value written in the
  matching box. Never copy "ת.ז", "תעודת זהות", "מספר זהות" or "ID" into a name,
  and never put digits in a name.
- If a first name is visible next to שם פרטי, return it; do not leave it empty.
- Treat "ת.ז", "תעודת זהות" and "ID" as labels everywhere.
`.trim();

const OCR_TEXT_HEADER = "OCR TEXT (Hebrew may appear right-to-left):";

let cachedTemplate: string | undefined;

function formTemplate(): string {
  cachedTemplate ??= zodToJsonTemplate(extractedFormSchema);
  return cachedTemplate;
}

/**
 * User prompt: the JSON shape to fill followed by the (already truncated) OCR text.
 */
export function getExtractUserPrompt(ocrText: string): string {
  return `Extract the following JSON:\n\n${formTemplate()}\n${OCR_TEXT_HEADER}\n${ocrText}`;
}
