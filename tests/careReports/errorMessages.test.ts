import { describe, expect, it } from "vitest";
import { getPipelineErrorUx } from "@/lib/careReports/errorMessages";
import { PIPELINE_ERROR_CODES, PipelineError, classifyError } from "@/lib/careReports/errors";
import { ExtractionServiceError } from "@/lib/extraction/serviceError";

describe("getPipelineErrorUx", () => {
  it("has copy for every error code", () => {
    for (const code of Object.values(PIPELINE_ERROR_CODES)) {
      const ux = getPipelineErrorUx(code);
      expect(ux.title.length).toBeGreaterThan(0);
      expect(ux.actionLabel.length).toBeGreaterThan(0);
    }
  });

  it("points transient failures at the pending queue", () => {
    expect(getPipelineErrorUx("EXTRACTION_UNAVAILABLE")).toMatchObject({
      actionLabel: "View pending reports",
      tone: "info",
    });
  });
});

describe("classifyError", () => {
  it("passes pipeline errors through", () => {
    const error = new PipelineError("NO_TEXT_DETECTED", "blank", { operation: "extraction.ocr" });
    expect(classifyError(error, "extraction.ai")).toBe(error);
  });

  it("maps aborts, transient and permanent failures", () => {
    const abort = classifyError(new DOMException("aborted", "AbortError"), "extraction.ai");
    expect(abort.code).toBe("CANCELLED");

    const down = classifyError(new ExtractionServiceError("down", { status: 502, transient: true }), "extraction.ai");
    expect(down.code).toBe("EXTRACTION_UNAVAILABLE");
    expect(down.transient).toBe(true);
    expect(down.operation).toBe("extraction.ai");

    const bad = classifyError(new ExtractionServiceError("bad", { status: 400, transient: false }), "extraction.ai");
    expect(bad.code).toBe("EXTRACTION_FAILED");
    expect(bad.transient).toBe(false);
  });
});
