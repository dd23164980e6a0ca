/**
 * OCR Provider Types
 *
 * Abstractions over document-analysis services that return recognized text and,
 * optionally, word/line geometry.
 */

/**
 * "layout": richer structure, markdown content, slower.
 * "read": plain text with line/word geometry, faster.
 */
export type OcrMode = "layout" | "read";

/** Flat [x1, y1, x2, y2, ...] polygon, in page units */
export type Polygon = number[];

export interface OcrWord {
  content: string;
  polygon: Polygon;
  confidence?: number;
}

export interface OcrLine {
  content: string;
  polygon: Polygon;
}

export interface OcrPage {
  pageNumber: number;
  lines: OcrLine[];
  words: OcrWord[];
}

export interface OcrLayout {
  pages: OcrPage[];
}

export interface OcrResult {
  text: string;
  layout: OcrLayout | null;
  modelId: string;
  modelVersion?: string;
  pageCount: number;
}

export interface AnalyzeRequest {
  mode: OcrMode;
  /** Page range such as "1-2"; omitted means all pages */
  pages?: string;
  contentFormat?: "text" | "markdown";
}

/**
 * Handle to a submitted analysis; the result is fetched separately so that submission
 * and processing can be bounded by different deadlines.
 */
export interface OcrOperation {
  waitForResult(options: {
    timeoutMs: number;
    signal?: AbortSignal;
  }): Promise<OcrResult>;
}

/**
 * OCR Provider interface
 */
export interface OcrProvider {
  name: string;

  submit(
    document: Uint8Array,
    request: AnalyzeRequest,
    signal: AbortSignal,
  ): Promise<OcrOperation>;
}
