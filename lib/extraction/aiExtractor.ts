/**
 * AI extractor: turns report text into a JSON list of care events.
 *
 * Returns the model's raw text; parseExtraction.ts treats it as untrusted.
 */

import OpenAI from "openai";
import { getAiModelName, getOpenAiApiKey } from "@/lib/config/ai";
import type { ReportFormat } from "@/lib/careReports/types";
import { ExtractionServiceError } from "./serviceError";

export const MAX_REPORT_CHARS = 12_000;

export type ExtractionRequest = {
  text: string;
  format: ReportFormat;
  /** Calendar day the report describes, yyyy-MM-dd */
  reportDate: string;
  signal?: AbortSignal;
};

export interface CareReportExtractor {
  extract(request: ExtractionRequest): Promise<string>;
}

const CONTEXT_LABELS: Record<ReportFormat, string> = {
  image: "photographed daycare report",
  text: "daycare report text",
  csv: "daycare report CSV export",
};

export function buildExtractionPrompt(request: ExtractionRequest): string {
  const text = request.text.slice(0, MAX_REPORT_CHARS);

  return `Extract structured caregiving events from the following text, taken from a ${CONTEXT_LABELS[request.format]}.

REPORT DATE: ${request.reportDate}
(Assume all times refer to this date unless the text says otherwise.)

TEXT:
${text}

Return a JSON object with this shape:
{
  "events": [
    {
      "type": "sleep | bottle | nursing | solid | diaper | activity | other",
      "startTime": "HH:mm",
      "endTime": "HH:mm or null",
      "quantity": "e.g. 4oz, 120ml, 15 min, or null",
      "details": "short description",
      "isWet": true,
      "isDirty": false
    }
  ]
}

Rules:
- Use 24-hour HH:mm times.
- endTime only for sleep/naps.
- isWet and isDirty only for diapers.
- Do not invent events that are not in the text.

Return ONLY JSON.`;
}

/**
 * OpenAI-backed extractor. Errors are rethrown as ExtractionServiceError with
 * the transient flag set for connectivity, rate limit and 5xx failures.
 * Aborts are rethrown untouched.
 */
export function createOpenAiExtractor(
  options: { apiKey?: string | null; model?: string } = {}
): CareReportExtractor {
  const apiKey = options.apiKey === undefined ? getOpenAiApiKey() : options.apiKey;
  const model = options.model ?? getAiModelName();
  let client: OpenAI | null = null;

  return {
    async extract(request) {
      if (!apiKey) {
        throw new ExtractionServiceError("OPENAI_API_KEY is not set", { transient: false });
      }
      client ??= new OpenAI({ apiKey, maxRetries: 0 });

      let content: string | null | undefined;
      try {
        const response = await client.chat.completions.create(
          {
            model,
            messages: [
              {
                role: "system",
                content:
                  "You are an accurate childcare report parser. Always respond with valid JSON only, no explanations.",
              },
              { role: "user", content: buildExtractionPrompt(request) },
            ],
            response_format: { type: "json_object" },
            temperature: 0.1,
          },
          { signal: request.signal }
        );
        content = response.choices[0]?.message?.content;
      } catch (error) {
        throw toServiceError(error);
      }

      if (!content) {
        console.error("[AI Extractor] Empty response from OpenAI");
        throw new ExtractionServiceError("Empty response from extraction service", {
          transient: false,
        });
      }
      return content;
    },
  };
}

function toServiceError(error: unknown): Error {
  if (error instanceof OpenAI.APIUserAbortError) {
    const abort = new Error("The operation was aborted", { cause: error });
    abort.name = "AbortError";
    return abort;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIConnectionError) {
    return new ExtractionServiceError(error.message, { transient: true, cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    const status = typeof error.status === "number" ? error.status : null;
    const transient = status === null || status === 408 || status === 429 || status >= 500;
    console.error("[AI Extractor] OpenAI request failed:", { status, message: error.message });
    return new ExtractionServiceError(error.message, { status, transient, cause: error });
  }
  return error instanceof Error
    ? error
    : new ExtractionServiceError(String(error), { transient: false });
}
