/**
 * Schema-guided extraction of the claim form fields from OCR text.
 *
 * The response is untrusted: it becomes the first revision of the extraction draft and
 * every field is re-checked by the correction cascade and the final validation.
 */

import { LlmError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { isRecord } from "../normalize/draft.js";
import type { LLMClient, ChatResponse } from "../llm/index.js";
import {
  EXTRACT_SYSTEM_PROMPT,
  getExtractUserPrompt,
} from "../llm/prompts/extract.js";

export type RawExtraction = Record<string, unknown>;

/**
 * Parse extraction response: strict JSON first, then the widest `{...}` span.
 * Returns null when neither yields an object.
 */
export function parseResponse(content: string): RawExtraction | null {
  try {
    const parsed: unknown = JSON.parse(content);
    if (isRecord(parsed)) return parsed;
  } catch {
    // not strict JSON, try the salvage below
  }

  const match = content.match(/\{[\s\S]*\}/);
  if (!match) return null;
  try {
    const salvaged: unknown = JSON.parse(match[0]);
    return isRecord(salvaged) ? salvaged : null;
  } catch {
    return null;
  }
}

/**
 * Runs the extraction prompt over the OCR text.
 *
 * A JSON-mode request that fails is retried once without `response_format`; a failure
 * of the retry is an LlmError. An unparseable answer yields `{}`.
 */
export async function extractFieldsWithLlm(
  client: LLMClient,
  ocrText: string,
  logger: Logger = silentLogger,
): Promise<RawExtraction> {
  const input = ocrText.slice(0, client.maxInputChars);
  if (input.length < ocrText.length) {
    logger.warn(
      `OCR text truncated from ${ocrText.length} to ${input.length} characters`,
    );
  }
  const userPrompt = getExtractUserPrompt(input);

  let response: ChatResponse;
  try {
    response = await client.chat(EXTRACT_SYSTEM_PROMPT, userPrompt, {
      responseFormat: { type: "json_object" },
    });
  } catch (err) {
    logger.warn(
      `JSON-mode request failed (${errorMessage(err)}), retrying without response_format`,
    );
    try {
      response = await client.chat(EXTRACT_SYSTEM_PROMPT, userPrompt);
    } catch (retryErr) {
      throw new LlmError(
        `Extraction request to ${client.model} failed: ${errorMessage(retryErr)}`,
        { cause: retryErr },
      );
    }
  }

  const fields = parseResponse(response.content);
  if (!fields) {
    logger.warn(
      `Response from ${response.model} held no JSON object, continuing with an empty extraction`,
    );
    return {};
  }

  logger.debug(
    `LLM returned ${Object.keys(fields).length} top-level fields from ${response.model}`,
  );
  return fields;
}
