import { getOcrServiceUrl } from "@/lib/config/ai";
import { ExtractionServiceError, isTransientStatus } from "./serviceError";

export interface OcrClient {
  recognizeText(
    image: Uint8Array,
    options: { filename?: string; mediaType?: string; signal?: AbortSignal }
  ): Promise<string>;
}

function readDetail(body: string): string {
  try {
    const json: unknown = JSON.parse(body);
    if (typeof json === "object" && json !== null && "detail" in json) {
      const { detail } = json;
      if (typeof detail === "string") return detail;
    }
  } catch {
    // Plain-text error body
    return body;
  }
  return body;
}

/**
 * Client for the OCR microservice: POST /v1/ocr/text with the image as
 * multipart form data, returns the recognised text.
 */
export function createOcrClient(
  baseUrl: string | null = getOcrServiceUrl(),
  fetchImpl: typeof fetch = fetch
): OcrClient {
  return {
    async recognizeText(image, options) {
      if (!baseUrl) {
        throw new ExtractionServiceError(
          "OCR_SERVICE_URL is not set. Point this to the OCR service base URL.",
          { transient: false }
        );
      }
      const endpoint = `${baseUrl}/v1/ocr/text`;

      const formData = new FormData();
      formData.append(
        "file",
        new Blob([image], { type: options.mediaType ?? "application/octet-stream" }),
        options.filename || "care-report"
      );

      console.log(`[OCR] Calling OCR endpoint:`, endpoint, { size: image.byteLength });

      let response: Response;
      try {
        response = await fetchImpl(endpoint, {
          method: "POST",
          body: formData,
          signal: options.signal,
        });
      } catch (error) {
        if (error instanceof Error && error.name === "AbortError") throw error;
        throw new ExtractionServiceError("OCR service unreachable", {
          transient: true,
          cause: error,
        });
      }

      if (!response.ok) {
        const text = await response.text();
        const message = readDetail(text) || response.statusText;
        console.error(`[OCR] OCR service returned ${response.status}:`, message);
        throw new ExtractionServiceError(`OCR service error (${response.status}): ${message}`, {
          status: response.status,
          transient: isTransientStatus(response.status),
        });
      }

      const body: unknown = await response.json();
      if (typeof body !== "object" || body === null || !("text" in body) || typeof body.text !== "string") {
        throw new ExtractionServiceError("OCR response missing text", { transient: false });
      }
      return body.text;
    },
  };
}
