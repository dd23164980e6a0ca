/**
 * Runtime configuration, resolved once from the environment.
 *
 * Credentials are not checked here: each client validates the section it needs when it
 * is constructed, so a missing key fails before any network call.
 */

import { isLogLevel, type LogLevel } from "./logger.js";

export interface OcrConfig {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  /** Page range sent with layout-mode requests */
  layoutPages: string;
  /** Deadline for the analyze request to be accepted */
  submitTimeoutMs: number;
  /** Result wait for PDF layout analysis */
  resultTimeoutMs: number;
  /** Result wait for image (read mode) analysis */
  imageResultTimeoutMs: number;
  /** Result wait for the secondary read passes of the fallback cascade */
  secondaryResultTimeoutMs: number;
  pollIntervalMs: number;
}

export interface LlmConfig {
  endpoint: string;
  apiKey: string;
  deployment: string;
  apiVersion: string;
  temperature: number;
  /** OCR text beyond this many characters is not sent */
  maxInputChars: number;
}

export interface AppConfig {
  ocr: OcrConfig;
  llm: LlmConfig;
  logLevel: LogLevel;
  port: number;
}

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function floatFromEnv(name: string, fallback: number): number {
  const parsed = parseFloat(process.env[name] || "");
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Get default configuration from environment
 */
export function getDefaultConfig(): AppConfig {
  const logLevel = process.env.LOG_LEVEL || "info";

  return {
    ocr: {
      endpoint:
        process.env.AZURE_DOC_INTEL_ENDPOINT ||
        process.env.AZURE_DI_ENDPOINT ||
        "",
      apiKey:
        process.env.AZURE_DOC_INTEL_KEY || process.env.AZURE_DI_KEY || "",
      apiVersion: process.env.AZURE_DOC_INTEL_API_VERSION || "2024-11-30",
      layoutPages: process.env.OCR_LAYOUT_PAGES || "1-2",
      submitTimeoutMs: intFromEnv("OCR_SUBMIT_TIMEOUT_MS", 15_000),
      resultTimeoutMs: intFromEnv("OCR_RESULT_TIMEOUT_MS", 45_000),
      imageResultTimeoutMs: intFromEnv("OCR_IMAGE_RESULT_TIMEOUT_MS", 30_000),
      secondaryResultTimeoutMs: intFromEnv(
        "OCR_SECONDARY_RESULT_TIMEOUT_MS",
        60_000,
      ),
      pollIntervalMs: intFromEnv("OCR_POLL_INTERVAL_MS", 1_000),
    },
    llm: {
      endpoint: process.env.AZURE_OPENAI_ENDPOINT || "",
      apiKey: process.env.AOAI_API_KEY || "",
      deployment: process.env.AZURE_OPENAI_DEPLOYMENT || "gpt-4o",
      apiVersion: process.env.AZURE_OPENAI_API_VERSION || "2024-02-15-preview",
      temperature: floatFromEnv("AOAI_TEMPERATURE", 0.1),
      maxInputChars: intFromEnv("LLM_MAX_INPUT_CHARS", 120_000),
    },
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    port: intFromEnv("PORT", 8080),
  };
}
