/**
 * Extraction runner: report bytes → candidate events.
 *
 * Images go through OCR first; text and CSV are decoded directly. OCR and the
 * AI call share one deadline and the caller's cancellation signal. Every
 * failure comes back as a PipelineError whose category says whether the
 * report is worth queueing.
 */

import { DateTime } from "luxon";
import { classifyError, PipelineError } from "@/lib/careReports/errors";
import type { ReportFormat, ReportSource } from "@/lib/careReports/types";
import { createDeadline, raceAbort } from "@/lib/utils/abort";
import { err, ok, type Result } from "@/lib/utils/result";
import type { CareReportExtractor } from "./aiExtractor";
import { resolveSourceFormat } from "./inputFormat";
import type { OcrClient } from "./ocrClient";
import { parseExtraction, type ParsedExtraction } from "./parseExtraction";

export interface ExtractionDeps {
  ocr: OcrClient;
  extractor: CareReportExtractor;
  /** IANA zone the report's clock times are written in */
  timeZone: string;
}

export interface ExtractReportOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Day the report describes. Defaults to now. */
  referenceDate?: Date;
}

export type ExtractionOutcome = ParsedExtraction & {
  format: ReportFormat;
  text: string;
};

const textDecoder = new TextDecoder("utf-8");

async function readReportText(
  source: ReportSource,
  format: ReportFormat,
  deps: ExtractionDeps,
  signal: AbortSignal
): Promise<string> {
  if (format !== "image") {
    return textDecoder.decode(source.bytes);
  }
  return raceAbort(
    deps.ocr.recognizeText(source.bytes, {
      filename: source.filename,
      mediaType: source.mediaType,
      signal,
    }),
    signal
  );
}

function classifyFailure(error: unknown, reason: "cancelled" | "timeout" | null): PipelineError {
  const operation = "extraction.run";
  if (reason === "cancelled") {
    return new PipelineError("CANCELLED", "Extraction was cancelled", { operation, cause: error });
  }
  if (reason === "timeout") {
    return new PipelineError("EXTRACTION_TIMEOUT", "Extraction did not finish in time", {
      operation,
      cause: error,
    });
  }
  return classifyError(error, operation);
}

export async function extractReport(
  source: ReportSource,
  deps: ExtractionDeps,
  options: ExtractReportOptions
): Promise<Result<ExtractionOutcome, PipelineError>> {
  if (source.bytes.byteLength === 0) {
    return err(
      new PipelineError("EMPTY_INPUT", "Report is empty", { operation: "extraction.input" })
    );
  }

  const format = resolveSourceFormat(source);
  if (!format) {
    return err(
      new PipelineError(
        "UNSUPPORTED_FORMAT",
        "Only photos (JPEG, PNG, HEIC, WebP), plain text and CSV reports are supported",
        { operation: "extraction.input" }
      )
    );
  }

  if (options.signal?.aborted) {
    return err(new PipelineError("CANCELLED", "Extraction was cancelled", { operation: "extraction.run" }));
  }

  const referenceDate = options.referenceDate ?? new Date();
  const reportDate = DateTime.fromJSDate(referenceDate, { zone: deps.timeZone }).toFormat("yyyy-MM-dd");
  const deadline = createDeadline(options.timeoutMs, options.signal);
  const startedAt = Date.now();

  try {
    const text = await readReportText(source, format, deps, deadline.signal);
    if (text.trim().length === 0) {
      return err(
        new PipelineError("NO_TEXT_DETECTED", "No text was found in the report", {
          operation: format === "image" ? "extraction.ocr" : "extraction.input",
        })
      );
    }

    const raw = await raceAbort(
      deps.extractor.extract({ text, format, reportDate, signal: deadline.signal }),
      deadline.signal
    );

    const parsed = parseExtraction(raw, { referenceDate, timeZone: deps.timeZone });
    if (!parsed.ok) return parsed;

    console.log(`[Extraction] Extracted ${parsed.value.candidates.length} events`, {
      format,
      reportDate,
      dropped: parsed.value.issues.length,
      ms: Date.now() - startedAt,
    });
    return ok({ ...parsed.value, format, text });
  } catch (error) {
    const failure = classifyFailure(error, deadline.reason());
    console.error(`[Extraction] ${failure.code}:`, {
      message: failure.message,
      transient: failure.transient,
      ms: Date.now() - startedAt,
    });
    return err(failure);
  } finally {
    deadline.dispose();
  }
}
