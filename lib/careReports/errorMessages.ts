import type { PipelineErrorCode } from "./errors";

export interface PipelineErrorUx {
  title: string;
  message: string;
  actionLabel: string;
  tone: "warning" | "info" | "danger";
}

const UX: Record<PipelineErrorCode, PipelineErrorUx> = {
  UNSUPPORTED_FORMAT: {
    title: "Unsupported file",
    message: "Use a photo of the report, a text file or a CSV export.",
    actionLabel: "Choose another file",
    tone: "warning",
  },
  EMPTY_INPUT: {
    title: "Empty report",
    message: "The selected file has no content.",
    actionLabel: "Choose another file",
    tone: "warning",
  },
  NO_TEXT_DETECTED: {
    title: "No text found",
    message: "We couldn't read any text in this photo. Try a sharper, well-lit picture.",
    actionLabel: "Retake photo",
    tone: "warning",
  },
  EXTRACTION_TIMEOUT: {
    title: "Request timed out",
    message: "Reading the report took too long. It was saved and can be retried later.",
    actionLabel: "View pending reports",
    tone: "info",
  },
  EXTRACTION_UNAVAILABLE: {
    title: "Service unavailable",
    message: "The report reader is unreachable right now. The report was saved for later.",
    actionLabel: "View pending reports",
    tone: "info",
  },
  EXTRACTION_FAILED: {
    title: "Couldn't read the report",
    message: "The report reader rejected this report. Try another photo or file.",
    actionLabel: "Try again",
    tone: "danger",
  },
  MALFORMED_EXTRACTION: {
    title: "Invalid response",
    message: "We couldn't make sense of what was read from this report. Try again or enter the events by hand.",
    actionLabel: "Try again",
    tone: "danger",
  },
  CANCELLED: {
    title: "Import cancelled",
    message: "Nothing was saved.",
    actionLabel: "Start over",
    tone: "info",
  },
  HISTORY_UNAVAILABLE: {
    title: "Couldn't check for duplicates",
    message: "Existing logs could not be loaded. The report was saved and can be retried later.",
    actionLabel: "View pending reports",
    tone: "info",
  },
  STORAGE_FAILED: {
    title: "Storage error",
    message: "The report could not be saved on this device. Free up space and try again.",
    actionLabel: "Try again",
    tone: "danger",
  },
  REPORT_NOT_FOUND: {
    title: "Report not found",
    message: "This pending report no longer exists.",
    actionLabel: "Refresh list",
    tone: "warning",
  },
  VALIDATION_FAILED: {
    title: "Event needs changes",
    message: "Check the start and end times before saving.",
    actionLabel: "Edit event",
    tone: "warning",
  },
  NOT_CONFIRMED: {
    title: "Not confirmed",
    message: "Only confirmed events are saved.",
    actionLabel: "Review events",
    tone: "info",
  },
  STORE_WRITE_FAILED: {
    title: "Couldn't save some events",
    message: "Some events were not saved. Saved events stay saved; retry the rest.",
    actionLabel: "Retry failed events",
    tone: "danger",
  },
};

export function getPipelineErrorUx(code: PipelineErrorCode): PipelineErrorUx {
  return UX[code];
}
