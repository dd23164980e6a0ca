/**
 * Label vocabulary of the National Insurance claim form.
 */

/** Printed next to the Teudat Zehut box */
export const ID_LABELS = [
  "ת.ז",
  'ת"ז',
  "ת.ז.",
  "תעודת זהות",
  "מספר זהות",
  "ID",
  "id",
] as const;

/** Wider set for the heuristic scan; ס"ב is the check-digit box next to the ID */
export const ID_CONTEXT_LABELS = [...ID_LABELS, 'ס"ב', "ס״ב"] as const;

export const PHONE_LABELS = [
  "טלפון",
  "נייד",
  "קווי",
  "פלאפון",
  "סלולרי",
  "mobile",
  "phone",
] as const;

export const NAME_LABELS = [
  "שם פרטי",
  "שם משפחה",
  "first name",
  "last name",
] as const;

export const LAST_NAME_LABEL = "שם משפחה";
export const FIRST_NAME_LABEL = "שם פרטי";

export const FIELD_NAME_LABELS = {
  firstName: [FIRST_NAME_LABEL, "first name"],
  lastName: [LAST_NAME_LABEL, "last name", "family name"],
} as const;

export type NameField = keyof typeof FIELD_NAME_LABELS;

/** Hebrew words printed on the form that look like a name token */
export const FORM_WORDS = new Set([
  "שם",
  "פרטי",
  "משפחה",
  "תעודת",
  "זהות",
  "ת.ז",
  "ס״ב",
  "מין",
  "זכר",
  "נקבה",
  "התובע",
  "המבקש",
  "המוסד",
  "לביטוח",
  "לאומי",
  "מינהל",
  "הגמלאות",
  "בקשה",
  "טיפול",
  "רפואי",
  "עבודה",
  "עצמאי",
  "אני",
  "מבקש",
  "לקבל",
  "עזרה",
]);

/** Values that are a label rather than a name when they make up the whole field */
export const NAME_REJECT_TOKENS = new Set(["ת.ז", 'ס"ב', "ס״ב", "מס", "ID", "id"]);

/** A name containing one of these is a copied ID label */
export const HEBREW_ID_LABELS = ["ת.ז", 'ת"ז', "תעודת זהות", "מספר זהות"] as const;

export const RECEIPT_DATE_LABELS = [
  "תאריך קבלת הטופס בקופה",
  "ת. קבלת הטופס בקופה",
  "תאריך קבלת הטופס",
] as const;

/** Positions of every occurrence of any of `tokens` in `text` */
export function findLabelPositions(
  text: string,
  tokens: readonly string[],
  options: { ignoreCase?: boolean } = {},
): Array<{ start: number; end: number }> {
  const haystack = options.ignoreCase ? text.toLowerCase() : text;
  const positions: Array<{ start: number; end: number }> = [];

  for (const token of tokens) {
    const needle = options.ignoreCase ? token.toLowerCase() : token;
    let from = haystack.indexOf(needle);
    while (from !== -1) {
      positions.push({ start: from, end: from + needle.length });
      from = haystack.indexOf(needle, from + 1);
    }
  }
  return positions;
}
