/**
 * Digit, checksum and date helpers shared by every correction pass.
 */

export type DateParts = [day: string, month: string, year: string];

const EMPTY_DATE: DateParts = ["", "", ""];

// Arabic-indic (U+0660..U+0669) and Extended Arabic-indic (U+06F0..U+06F9)
const NON_ASCII_DIGITS = /[٠-٩۰-۹]/g;

export function normalizeDigits(value: string): string {
  return value.replace(NON_ASCII_DIGITS, (ch) => {
    const code = ch.charCodeAt(0);
    const base = code >= 0x06f0 ? 0x06f0 : 0x0660;
    return String(code - base);
  });
}

export function digitsOnly(value: string): string {
  return normalizeDigits(value).replace(/\D/g, "");
}

/**
 * Israeli Teudat Zehut check: weights 1,2,1,2..., two-digit products folded to their
 * digit sum, total divisible by 10. Only exactly nine ASCII digits can be valid.
 */
export function isValidIsraeliId(value: string): boolean {
  if (!/^\d{9}$/.test(value)) return false;

  let total = 0;
  for (let i = 0; i < value.length; i++) {
    let product = Number(value[i]) * (i % 2 === 0 ? 1 : 2);
    if (product > 9) product = Math.floor(product / 10) + (product % 10);
    total += product;
  }
  return total % 10 === 0;
}

/**
 * Accepts "dd/mm/yyyy", "dd.mm.yy", "yyyy-mm-dd", "dd mm yyyy" or a bare "yyyymmdd".
 * Returns empty parts for anything else.
 */
export function parsePossibleDate(value: string): DateParts {
  const s = normalizeDigits(value).trim();
  if (!s) return [...EMPTY_DATE];

  if (/[\/.\-\s]/.test(s)) {
    const parts = s.split(/[\/.\-\s]+/).filter(Boolean);
    if (parts.length !== 3 || !parts.every((p) => /^\d+$/.test(p))) {
      return [...EMPTY_DATE];
    }
    const [a, b, c] = parts;
    if (a.length === 4) return [c, b, a];
    if (c.length === 4) return [a, b, c];
    const year = c.length === 2 ? (Number(c) < 50 ? `20${c}` : `19${c}`) : c;
    return [a, b, year];
  }

  if (/^\d{8}$/.test(s)) {
    return [s.slice(6, 8), s.slice(4, 6), s.slice(0, 4)];
  }
  return [...EMPTY_DATE];
}

const HEBREW_LETTER = /[֐-׿]/;
const LATIN_LETTER = /[A-Za-zÀ-ɏ]/;

/**
 * Share of Hebrew vs Latin letters, rounded to two decimals.
 */
export function detectLanguageRatio(text: string): {
  hebrew: number;
  latin: number;
} {
  let hebrew = 0;
  let latin = 0;
  for (const ch of text) {
    if (HEBREW_LETTER.test(ch)) hebrew++;
    else if (LATIN_LETTER.test(ch)) latin++;
  }
  const total = Math.max(1, hebrew + latin);
  const round = (n: number) => Math.round((n / total) * 100) / 100;
  return { hebrew: round(hebrew), latin: round(latin) };
}
