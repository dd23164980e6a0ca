/**
 * Locating the Teudat Zehut number in OCR output when the LLM missed it.
 *
 * Hebrew is right-to-left, so in flat OCR text the value is as likely to precede its
 * label as to follow it; every window is searched on both sides.
 */

import { digitsOnly, isValidIsraeliId } from "../utils/digits.js";
import type { OcrLayout, Polygon } from "../ocr/types.js";
import {
  ID_CONTEXT_LABELS,
  ID_LABELS,
  NAME_LABELS,
  PHONE_LABELS,
  findLabelPositions,
} from "./labels.js";

const ANCHORED_WINDOW = 120;
const HEURISTIC_WINDOW = 220;
const PHONE_CONTEXT = 60;
const ROW_TOLERANCE = 0.12;
const NO_LABEL_DISTANCE = 1e9;

/** Nine digits, each optionally separated by one space or hyphen */
const SEPARATED_NINE = /(?<!\d)(\d(?:[\s\-]?\d){8})(?!\d)/g;

/** Loose digit run that may hold 9 or 10 digits */
const DIGIT_RUN = /\d[\d\-\s]{7,13}\d/g;

function surroundingWindows(
  text: string,
  position: { start: number; end: number },
  size: number,
): [after: string, before: string] {
  return [
    text.slice(position.end, position.end + size),
    text.slice(Math.max(0, position.start - size), position.start),
  ];
}

function firstValidSeparatedId(text: string): string | null {
  for (const match of text.matchAll(SEPARATED_NINE)) {
    const digits = digitsOnly(match[1]);
    if (isValidIsraeliId(digits)) return digits;
  }
  return null;
}

/**
 * Checksum-valid nine-digit ID within 120 characters of an ID label, else anywhere in the text.
 */
export function findIdNearLabels(text: string): string | null {
  if (!text) return null;

  for (const position of findLabelPositions(text, ID_LABELS)) {
    for (const window of surroundingWindows(text, position, ANCHORED_WINDOW)) {
      const found = firstValidSeparatedId(window);
      if (found) return found;
    }
  }
  return firstValidSeparatedId(text);
}

interface IdCandidate {
  digits: string;
  index: number;
}

type CandidateScore = [
  lengthPenalty: number,
  checksumPenalty: number,
  phonePenalty: number,
  idLabelDistance: number,
  nameLabelCloseness: number,
];

function compareScores(a: CandidateScore, b: CandidateScore): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

function nearestDistance(index: number, positions: number[]): number {
  if (positions.length === 0) return NO_LABEL_DISTANCE;
  return Math.min(...positions.map((p) => Math.abs(index - p)));
}

/**
 * Wider search for when no anchored match exists.
 *
 * First a checksum-valid nine-digit run within 220 characters of an ID label (including the
 * ס"ב box). Otherwise every 9-10 digit run in the text is ranked, lowest score first:
 * nine digits, valid checksum, no phone label within 60 characters, close to an ID label,
 * far from a name label. Ties keep the earliest run.
 */
export function findIdByHeuristics(text: string): string | null {
  if (!text) return null;

  const idLabels = findLabelPositions(text, ID_CONTEXT_LABELS);

  for (const position of idLabels) {
    for (const window of surroundingWindows(text, position, HEURISTIC_WINDOW)) {
      for (const match of window.matchAll(DIGIT_RUN)) {
        const digits = digitsOnly(match[0]);
        if (isValidIsraeliId(digits)) return digits;
      }
    }
  }

  const candidates: IdCandidate[] = [];
  for (const match of text.matchAll(DIGIT_RUN)) {
    const digits = digitsOnly(match[0]);
    if (digits.length === 9 || digits.length === 10) {
      candidates.push({ digits, index: match.index ?? 0 });
    }
  }
  if (candidates.length === 0) return null;

  const idLabelStarts = idLabels.map((p) => p.start);
  const nameLabelStarts = findLabelPositions(text, NAME_LABELS, {
    ignoreCase: true,
  }).map((p) => p.start);

  const score = (candidate: IdCandidate): CandidateScore => {
    const context = text.slice(
      Math.max(0, candidate.index - PHONE_CONTEXT),
      candidate.index + PHONE_CONTEXT,
    );
    return [
      candidate.digits.length === 9 ? 0 : 1,
      isValidIsraeliId(candidate.digits) ? 0 : 1,
      PHONE_LABELS.some((label) => context.includes(label)) ? 1 : 0,
      nearestDistance(candidate.index, idLabelStarts),
      -nearestDistance(candidate.index, nameLabelStarts),
    ];
  };

  let best = candidates[0];
  let bestScore = score(best);
  for (const candidate of candidates.slice(1)) {
    const candidateScore = score(candidate);
    if (compareScores(candidateScore, bestScore) < 0) {
      best = candidate;
      bestScore = candidateScore;
    }
  }
  return best.digits;
}

function center(polygon: Polygon): { x: number; y: number } | null {
  if (polygon.length < 2) return null;
  let sumX = 0;
  let sumY = 0;
  let points = 0;
  for (let i = 0; i + 1 < polygon.length; i += 2) {
    sumX += polygon[i];
    sumY += polygon[i + 1];
    points++;
  }
  return { x: sumX / points, y: sumY / points };
}

function isNumericToken(token: string): boolean {
  return /\d/.test(token) || token === "-" || token === "–";
}

/**
 * Row search over read-mode geometry.
 *
 * For each line carrying an ID label, the words on the same visual row are ordered left to
 * right and adjacent numeric or dash tokens are merged. The checksum-valid nine-digit run
 * horizontally closest to the label line wins.
 */
export function findIdInLayout(layout: OcrLayout | null): string | null {
  if (!layout) return null;

  for (const page of layout.pages) {
    const words = page.words.flatMap((word) => {
      const c = center(word.polygon);
      return c ? [{ x: c.x, y: c.y, content: word.content }] : [];
    });

    for (const line of page.lines) {
      if (!ID_LABELS.some((label) => line.content.includes(label))) continue;
      const labelCenter = center(line.polygon);
      if (!labelCenter) continue;

      const row = words
        .filter((w) => Math.abs(w.y - labelCenter.y) < ROW_TOLERANCE)
        .sort((a, b) => a.x - b.x);

      const groups: Array<{ x: number; text: string }> = [];
      let current: typeof row = [];
      const flush = () => {
        if (current.length === 0) return;
        groups.push({
          x: current.reduce((sum, w) => sum + w.x, 0) / current.length,
          text: current.map((w) => w.content).join(""),
        });
        current = [];
      };
      for (const word of row) {
        if (isNumericToken(word.content)) current.push(word);
        else flush();
      }
      flush();

      let best: { digits: string; distance: number } | null = null;
      for (const group of groups) {
        const digits = digitsOnly(group.text);
        if (!isValidIsraeliId(digits)) continue;
        const distance = Math.abs(group.x - labelCenter.x);
        if (!best || distance < best.distance) best = { digits, distance };
      }
      if (best) return best.digits;
    }
  }
  return null;
}
