/**
 * Versioned intermediate record between the LLM answer and the typed form.
 *
 * `fields` holds the untrusted LLM JSON. Correction stages never mutate it: each change
 * produces a new draft with the next revision and an entry in `changes`.
 */

export type DraftStage =
  | "id-repair"
  | "date-override"
  | "name-repair"
  | "intelligent-correction"
  | "normalize"
  | "secondary-name-repair";

export interface FieldChange {
  /** Dotted path, e.g. "idNumber" or "formReceiptDateAtClinic.day" */
  field: string;
  previous: unknown;
  next: unknown;
  stage: DraftStage;
}

export interface ExtractionDraft {
  readonly revision: number;
  readonly fields: Readonly<Record<string, unknown>>;
  readonly changes: readonly FieldChange[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createDraft(fields: Record<string, unknown>): ExtractionDraft {
  return { revision: 0, fields: { ...fields }, changes: [] };
}

export function getField(draft: ExtractionDraft, path: string): unknown {
  let current: unknown = draft.fields;
  for (const key of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function setPath(
  target: Record<string, unknown>,
  keys: string[],
  value: unknown,
): Record<string, unknown> {
  const [head, ...rest] = keys;
  if (rest.length === 0) return { ...target, [head]: value };

  const child = target[head];
  return {
    ...target,
    [head]: setPath(isRecord(child) ? child : {}, rest, value),
  };
}

/**
 * Returns a new draft with `path` set to `value`. Intermediate objects that are missing or
 * not objects are replaced by fresh ones.
 */
export function applyFieldChange(
  draft: ExtractionDraft,
  path: string,
  value: unknown,
  stage: DraftStage,
): ExtractionDraft {
  return {
    revision: draft.revision + 1,
    fields: setPath(draft.fields, path.split("."), value),
    changes: [
      ...draft.changes,
      { field: path, previous: getField(draft, path), next: value, stage },
    ],
  };
}
