/**
 * Input format policy.
 *
 * Decides how a report is read before any extraction is attempted:
 * - image: JPEG, PNG, HEIC/HEIF or WebP by magic bytes, or an image/* media type
 * - csv:   text/csv media type or a .csv filename
 * - text:  text/plain, a .txt filename, or bytes that decode as UTF-8 without NUL
 *
 * PDFs and other binaries resolve to null (unsupported).
 */

import type { ReportFormat, ReportSource } from "@/lib/careReports/types";

function startsWith(bytes: Uint8Array, signature: number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((byte, index) => bytes[offset + index] === byte);
}

function asciiAt(bytes: Uint8Array, offset: number, length: number): string {
  if (bytes.length < offset + length) return "";
  return String.fromCharCode(...bytes.subarray(offset, offset + length));
}

const HEIF_BRANDS = new Set(["heic", "heix", "hevc", "hevx", "heim", "heis", "mif1", "msf1"]);

/**
 * Image container detected from the first bytes, or null.
 */
export function sniffImageType(bytes: Uint8Array): "jpeg" | "png" | "heic" | "webp" | null {
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return "jpeg";
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return "png";
  if (asciiAt(bytes, 0, 4) === "RIFF" && asciiAt(bytes, 8, 4) === "WEBP") return "webp";
  if (asciiAt(bytes, 4, 4) === "ftyp" && HEIF_BRANDS.has(asciiAt(bytes, 8, 4))) return "heic";
  return null;
}

export function isPdf(bytes: Uint8Array): boolean {
  return asciiAt(bytes, 0, 5) === "%PDF-";
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

export function looksLikeText(bytes: Uint8Array): boolean {
  if (bytes.includes(0)) return false;
  try {
    strictUtf8.decode(bytes);
    return true;
  } catch {
    return false;
  }
}

function extensionOf(filename: string | undefined): string | null {
  if (!filename) return null;
  const dot = filename.lastIndexOf(".");
  return dot >= 0 ? filename.slice(dot + 1).toLowerCase() : null;
}

function baseMediaType(mediaType: string | undefined): string | null {
  if (!mediaType) return null;
  return mediaType.split(";")[0].trim().toLowerCase();
}

/**
 * Resolve the format of a report. Returns null when it is not supported.
 * Callers check for empty input first; an empty source also resolves to null.
 */
export function resolveReportFormat(
  source: Pick<ReportSource, "bytes" | "mediaType" | "filename">
): ReportFormat | null {
  const { bytes } = source;
  if (bytes.length === 0) return null;
  if (sniffImageType(bytes)) return "image";
  if (isPdf(bytes)) return null;

  const mediaType = baseMediaType(source.mediaType);
  const extension = extensionOf(source.filename);

  if (mediaType?.startsWith("image/")) {
    // Declared image whose bytes we could not identify is still sent to OCR
    return looksLikeText(bytes) ? null : "image";
  }

  if (!looksLikeText(bytes)) return null;

  if (mediaType === "text/csv" || extension === "csv") return "csv";
  return "text";
}

/**
 * Format of a source, checked against its bytes. A declared format is only
 * honoured when the bytes agree: `image` needs image bytes, `text` and `csv`
 * need text bytes. Null when unsupported or contradicted.
 */
export function resolveSourceFormat(source: ReportSource): ReportFormat | null {
  const detected = resolveReportFormat(source);
  if (!detected || !source.format) return detected;
  if (source.format === "image") return detected === "image" ? "image" : null;
  return detected === "image" ? null : source.format;
}
