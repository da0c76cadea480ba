/**
 * Extraction service configuration.
 */

const DEFAULT_EXTRACTION_TIMEOUT_MS = 45_000;
// Largest delay setTimeout honours; anything above fires immediately
const MAX_TIMER_MS = 2_147_483_647;

/**
 * OpenAI key used by the extractor. Returns null when unset so callers can
 * decide whether extraction is available at all.
 */
export function getOpenAiApiKey(): string | null {
  const key = process.env.OPENAI_API_KEY;
  return key && key.trim().length > 0 ? key.trim() : null;
}

/**
 * Get the OpenAI model name to use for extraction.
 * Defaults to "gpt-4o-mini" (cost-effective, good for structured extraction).
 * Can be overridden with OPENAI_MODEL_NAME environment variable.
 */
export function getAiModelName(): string {
  return process.env.OPENAI_MODEL_NAME || "gpt-4o-mini";
}

/**
 * Upper bound on one extraction attempt (OCR + AI call together).
 */
export function getExtractionTimeoutMs(): number {
  return readPositiveInt(
    process.env.EXTRACTION_TIMEOUT_MS,
    DEFAULT_EXTRACTION_TIMEOUT_MS,
    MAX_TIMER_MS
  );
}

/**
 * Base URL of the OCR microservice, without trailing slash. Null when unset;
 * only image reports need it.
 */
export function getOcrServiceUrl(): string | null {
  const baseUrl = process.env.OCR_SERVICE_URL;
  if (!baseUrl) return null;
  return baseUrl.replace(/\/+$/, "");
}

/**
 * Positive integer from an env value; the fallback when unset, not a number,
 * not positive or above `max`.
 */
export function readPositiveInt(
  raw: string | undefined,
  fallback: number,
  max = Number.MAX_SAFE_INTEGER
): number {
  if (raw === undefined || raw === "") return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 && value <= max ? value : fallback;
}
