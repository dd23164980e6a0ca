/**
 * Recovering first and last names from OCR text by their position relative to the
 * שם פרטי / שם משפחה labels.
 */

import {
  FIELD_NAME_LABELS,
  FIRST_NAME_LABEL,
  FORM_WORDS,
  LAST_NAME_LABEL,
  findLabelPositions,
  type NameField,
} from "./labels.js";

const HEBREW_NAME = /^[א-ת]{2,15}$/;
const HEBREW_TOKEN = /[א-ת]{2,15}/g;
const LEADING_NAME = /^[\s:]*([א-ת]{2,15})/;
/** Two Hebrew words on one line, e.g. "שלמה הלוי" */
const COMPOUND_NAME = /([א-ת]{2,15})[ \t]+([א-ת]{2,15})/g;

const NEXT_LINES = 10;
const NAME_WINDOW_LINES = 25;
const INLINE_DISTANCE = 60;

function isNameShaped(value: string): boolean {
  return HEBREW_NAME.test(value) && !FORM_WORDS.has(value);
}

function containsAnyLabel(line: string): boolean {
  return [FIRST_NAME_LABEL, LAST_NAME_LABEL].some((label) => line.includes(label));
}

/**
 * Name for `field` taken from next to its label: a value on the label line itself, else the
 * first name-shaped line within ten lines below, else the closest Hebrew word starting
 * within 60 characters after a label.
 */
export function findNameNearLabel(text: string, field: NameField): string | null {
  if (!text) return null;

  const labels = FIELD_NAME_LABELS[field];
  const lines = text.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lower = line.toLowerCase();
    const label = labels.find((l) => lower.includes(l.toLowerCase()));
    if (!label) continue;

    const rest = line.slice(lower.indexOf(label.toLowerCase()) + label.length);
    const inline = LEADING_NAME.exec(rest)?.[1];
    if (inline && !FORM_WORDS.has(inline)) return inline;

    const end = Math.min(lines.length, i + 1 + NEXT_LINES);
    for (let j = i + 1; j < end; j++) {
      const candidate = lines[j].trim();
      if (isNameShaped(candidate) && !containsAnyLabel(candidate)) {
        return candidate;
      }
    }
  }

  const labelEnds = findLabelPositions(text, labels, { ignoreCase: true }).map(
    (p) => p.end,
  );
  let best: { name: string; distance: number } | null = null;
  for (const match of text.matchAll(HEBREW_TOKEN)) {
    if (FORM_WORDS.has(match[0])) continue;
    const index = match.index ?? 0;
    for (const end of labelEnds) {
      const distance = index - end;
      if (distance < 0 || distance > INLINE_DISTANCE) continue;
      if (!best || distance < best.distance) {
        best = { name: match[0], distance };
      }
    }
  }
  return best?.name ?? null;
}

function nameLines(
  lines: string[],
  from: number,
  to: number,
): Array<{ line: number; name: string }> {
  const found: Array<{ line: number; name: string }> = [];
  for (let i = from; i < Math.min(to, lines.length); i++) {
    const value = lines[i].trim();
    if (isNameShaped(value)) found.push({ line: i, name: value });
  }
  return found;
}

/**
 * Last name from layout-mode text, used once validation has left `lastName` empty.
 *
 * When both label lines are present the candidates are, in order: the second word of a
 * two-word name whose first word is a known first name; the second word of any short
 * two-word name; of the first two name-shaped lines below the labels, the one whose
 * assignment puts both names closest to their labels (the second on a tie); a name distinct
 * from the only one found. Without both labels, the first name-shaped line under
 * שם משפחה, then "שם משפחה <name>" on one line.
 */
export function extractLastNameFromLayoutText(
  text: string,
  knownFirstName = "",
): string {
  if (!text) return "";

  const lines = text.split("\n");
  let lastLabel: number | undefined = undefined;
  let firstLabel: number | undefined = undefined;
  for (let i = 0; i < lines.length; i++) {
    const value = lines[i].trim();
    if (value === LAST_NAME_LABEL) lastLabel = i;
    else if (value === FIRST_NAME_LABEL) firstLabel = i;
  }

  if (lastLabel !== undefined && firstLabel !== undefined) {
    return resolveBetweenLabels(text, lines, lastLabel, firstLabel, knownFirstName);
  }

  for (let i = 0; i < lines.length; i++) {
    if (lines[i].trim() !== LAST_NAME_LABEL) continue;
    const below = nameLines(lines, i + 1, i + NEXT_LINES);
    if (below.length > 0) return below[0].name;
  }

  return extractLastNameFromPlainText(text);
}

function resolveBetweenLabels(
  text: string,
  lines: string[],
  lastLabel: number,
  firstLabel: number,
  knownFirstName: string,
): string {
  const top = Math.min(lastLabel, firstLabel);

  const knownFirstNames = new Set(
    nameLines(lines, top + 1, top + NEXT_LINES).map((n) => n.name),
  );
  if (knownFirstName) knownFirstNames.add(knownFirstName);

  const compounds = [...text.matchAll(COMPOUND_NAME)]
    .map((m) => ({ first: m[1], second: m[2] }))
    .filter((c) => !FORM_WORDS.has(c.first) && !FORM_WORDS.has(c.second));

  const withKnownFirst = compounds.find((c) => knownFirstNames.has(c.first));
  if (withKnownFirst) return withKnownFirst.second;

  const typical = compounds.find(
    (c) => c.first.length <= 6 && c.second.length <= 8,
  );
  if (typical) return typical.second;

  const names = nameLines(lines, top + 1, top + NAME_WINDOW_LINES);
  if (names.length >= 2) {
    const [a, b] = names;
    const aIsLast =
      Math.abs(a.line - lastLabel) + Math.abs(b.line - firstLabel);
    const bIsLast =
      Math.abs(b.line - lastLabel) + Math.abs(a.line - firstLabel);
    return aIsLast < bIsLast ? a.name : b.name;
  }

  if (names.length === 1) {
    const single = names[0].name;
    const other = nameLines(lines, top + 1, lines.length).find(
      (n) => n.name !== single,
    );
    return other?.name ?? "";
  }

  return "";
}

const PLAIN_TEXT_PATTERNS = [
  /שם משפחה\s+([א-ת]{2,15})/,
  /משפחה\s+([א-ת]{2,15})/,
  /שם משפחה\s*:\s*([א-ת]{2,15})/,
];

/**
 * Last name written after its label in plain read-mode text.
 */
export function extractLastNameFromPlainText(text: string): string {
  if (!text) return "";

  for (const pattern of PLAIN_TEXT_PATTERNS) {
    const candidate = pattern.exec(text)?.[1];
    if (candidate && !FORM_WORDS.has(candidate)) return candidate;
  }
  return "";
}
