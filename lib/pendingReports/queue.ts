/**
 * Offline ingestion queue.
 *
 * Holds reports whose extraction (or commit) failed for a transient reason so
 * nothing the caregiver captured is lost. Storage layout per report:
 *
 *   reports/{id}/source      raw image / text bytes
 *   reports/{id}/meta.json   PendingReport metadata
 *
 * The metadata object is written last and deleted first, so it is the marker
 * of a complete report: a source without metadata is never listed.
 *
 * Operations on the same id are serialized; different ids run independently.
 * Reports leave the queue only through a successful retry or an explicit
 * discard.
 */

import { randomUUID } from "crypto";
import { z } from "zod";
import { PipelineError, storageFailure } from "@/lib/careReports/errors";
import type { PendingReport, ReportFormat, ReportSource } from "@/lib/careReports/types";
import { resolveSourceFormat } from "@/lib/extraction/inputFormat";
import { getErrorMessage } from "@/lib/utils/error";
import { KeyedMutex } from "@/lib/utils/keyedMutex";
import { err, ok, type Result } from "@/lib/utils/result";
import type { DurableStorage } from "./storage";

const REPORTS_PREFIX = "reports/";

const sourceKey = (id: string) => `${REPORTS_PREFIX}${id}/source`;
const metaKey = (id: string) => `${REPORTS_PREFIX}${id}/meta.json`;

const StoredMetadata = z.object({
  id: z.string().min(1),
  createdAt: z.string().datetime(),
  sourceReference: z.string().min(1),
  format: z.enum(["image", "text", "csv"]),
  byteLength: z.number().int().nonnegative(),
  mediaType: z.string().optional(),
  filename: z.string().optional(),
  reason: z.enum(["extraction", "commit"]).optional(),
});

type StoredMetadata = z.infer<typeof StoredMetadata>;

function toStored(report: PendingReport): StoredMetadata {
  return { ...report, createdAt: report.createdAt.toISOString() };
}

function fromStored(stored: StoredMetadata): PendingReport {
  const report: PendingReport = {
    id: stored.id,
    createdAt: new Date(stored.createdAt),
    sourceReference: stored.sourceReference,
    format: stored.format,
    byteLength: stored.byteLength,
  };
  if (stored.mediaType) report.mediaType = stored.mediaType;
  if (stored.filename) report.filename = stored.filename;
  if (stored.reason) report.reason = stored.reason;
  return report;
}

/** Everything needed to run the report again, rebuilt from storage. */
export type StoredReportSource = ReportSource & { format: ReportFormat };

/**
 * Re-runs the expensive, failure-prone part of ingestion for a stored report.
 */
export type ReportProcessor<T> = (
  source: StoredReportSource,
  context: { report: PendingReport; signal?: AbortSignal }
) => Promise<Result<T, PipelineError>>;

export interface PendingReportQueueOptions<T> {
  storage: DurableStorage;
  processor: ReportProcessor<T>;
  now?: () => Date;
  generateId?: () => string;
}

export class PendingReportQueue<T> {
  private readonly storage: DurableStorage;
  private readonly processor: ReportProcessor<T>;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly locks = new KeyedMutex();
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder();

  constructor(options: PendingReportQueueOptions<T>) {
    this.storage = options.storage;
    this.processor = options.processor;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Durably store a report. The signal is honoured only before the first
   * write; once writing starts the report is completed (or fully removed)
   * before this resolves.
   */
  async enqueue(
    source: ReportSource,
    options: { signal?: AbortSignal; reason?: PendingReport["reason"] } = {}
  ): Promise<Result<PendingReport, PipelineError>> {
    const format = resolveSourceFormat(source);
    if (!format) {
      return err(
        new PipelineError("UNSUPPORTED_FORMAT", "Report format is not supported", {
          operation: "pendingReports.enqueue",
        })
      );
    }

    if (options.signal?.aborted) {
      return err(
        new PipelineError("CANCELLED", "Enqueue cancelled before any write", {
          operation: "pendingReports.enqueue",
        })
      );
    }

    const id = this.generateId();
    const report: PendingReport = {
      id,
      createdAt: this.now(),
      sourceReference: sourceKey(id),
      format,
      byteLength: source.bytes.byteLength,
    };
    if (source.mediaType) report.mediaType = source.mediaType;
    if (source.filename) report.filename = source.filename;
    if (options.reason) report.reason = options.reason;

    return this.locks.runExclusive(id, async () => {
      try {
        await this.storage.put(report.sourceReference, source.bytes);
      } catch (error) {
        console.error(`[PendingReports] Failed to store source for ${id}:`, getErrorMessage(error));
        return err(storageFailure("STORAGE_FAILED", "pendingReports.enqueue.source", error));
      }

      try {
        const json = JSON.stringify(toStored(report));
        await this.storage.put(metaKey(id), this.encoder.encode(json));
      } catch (error) {
        console.error(`[PendingReports] Failed to store metadata for ${id}:`, getErrorMessage(error));
        await this.removeQuietly(report.sourceReference);
        return err(storageFailure("STORAGE_FAILED", "pendingReports.enqueue.meta", error));
      }

      console.log(`[PendingReports] Queued report ${id}`, {
        format,
        byteLength: report.byteLength,
        reason: report.reason,
      });
      return ok(report);
    });
  }

  /**
   * Pending reports, newest first, read from storage on every call.
   */
  async list(): Promise<Result<PendingReport[], PipelineError>> {
    let keys: string[];
    try {
      keys = await this.storage.list(REPORTS_PREFIX);
    } catch (error) {
      return err(storageFailure("STORAGE_FAILED", "pendingReports.list", error));
    }

    const reports: PendingReport[] = [];
    for (const key of keys.filter((k) => k.endsWith("/meta.json"))) {
      const id = key.slice(REPORTS_PREFIX.length, -"/meta.json".length);
      const result = await this.readMetadata(id, "pendingReports.list");
      if (result.ok) {
        reports.push(result.value);
      } else if (result.error.code !== "REPORT_NOT_FOUND") {
        return result;
      }
    }

    reports.sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || a.id.localeCompare(b.id)
    );
    return ok(reports);
  }

  async get(id: string): Promise<Result<PendingReport, PipelineError>> {
    return this.readMetadata(id, "pendingReports.get");
  }

  /**
   * Run the processor against the stored source. Success deletes the report;
   * failure leaves it exactly as it was.
   */
  async retry(
    id: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<Result<T, PipelineError>> {
    return this.locks.runExclusive(id, async () => {
      const metadata = await this.readMetadata(id, "pendingReports.retry");
      if (!metadata.ok) return metadata;
      const report = metadata.value;

      let bytes: Uint8Array | null;
      try {
        bytes = await this.storage.get(report.sourceReference);
      } catch (error) {
        return err(storageFailure("STORAGE_FAILED", "pendingReports.retry.read", error));
      }
      if (!bytes) {
        return err(
          new PipelineError("REPORT_NOT_FOUND", `Source bytes for report ${id} are missing`, {
            operation: "pendingReports.retry.read",
          })
        );
      }

      const source: StoredReportSource = { bytes, format: report.format };
      if (report.mediaType) source.mediaType = report.mediaType;
      if (report.filename) source.filename = report.filename;

      const result = await this.processor(source, { report, signal: options.signal });
      if (!result.ok) {
        console.warn(`[PendingReports] Retry of ${id} failed, keeping report:`, {
          code: result.error.code,
          transient: result.error.transient,
        });
        return result;
      }

      const removed = await this.remove(report, "pendingReports.retry.delete");
      if (!removed.ok) return removed;

      console.log(`[PendingReports] Retry of ${id} succeeded, report removed`);
      return result;
    });
  }

  /**
   * Permanently delete a report and its bytes. User-initiated only.
   * Discarding an unknown id is a no-op.
   */
  async discard(id: string): Promise<Result<void, PipelineError>> {
    return this.locks.runExclusive(id, async () => {
      const metadata = await this.readMetadata(id, "pendingReports.discard");
      if (!metadata.ok) {
        if (metadata.error.code !== "REPORT_NOT_FOUND") return metadata;
        // Metadata already gone; still clear any leftover bytes
        return this.deleteKey(sourceKey(id), "pendingReports.discard");
      }

      const removed = await this.remove(metadata.value, "pendingReports.discard");
      if (removed.ok) {
        console.log(`[PendingReports] Discarded report ${id}`);
      }
      return removed;
    });
  }

  private async readMetadata(
    id: string,
    operation: string
  ): Promise<Result<PendingReport, PipelineError>> {
    let raw: Uint8Array | null;
    try {
      raw = await this.storage.get(metaKey(id));
    } catch (error) {
      return err(storageFailure("STORAGE_FAILED", operation, error));
    }
    if (!raw) {
      return err(
        new PipelineError("REPORT_NOT_FOUND", `Pending report ${id} not found`, { operation })
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(this.decoder.decode(raw));
    } catch (error) {
      return err(
        new PipelineError("STORAGE_FAILED", `Metadata for ${id} is not valid JSON`, {
          operation,
          cause: error,
        })
      );
    }

    const parsed = StoredMetadata.safeParse(json);
    if (!parsed.success) {
      return err(
        new PipelineError("STORAGE_FAILED", `Metadata for ${id} is malformed`, {
          operation,
          cause: parsed.error,
        })
      );
    }
    return ok(fromStored(parsed.data));
  }

  /** Metadata first so a half-finished removal never lists a report without bytes. */
  private async remove(
    report: PendingReport,
    operation: string
  ): Promise<Result<void, PipelineError>> {
    const metaRemoved = await this.deleteKey(metaKey(report.id), operation);
    if (!metaRemoved.ok) return metaRemoved;
    return this.deleteKey(report.sourceReference, operation);
  }

  private async deleteKey(key: string, operation: string): Promise<Result<void, PipelineError>> {
    try {
      await this.storage.delete(key);
      return ok(undefined);
    } catch (error) {
      console.error(`[PendingReports] Delete of ${key} failed:`, getErrorMessage(error));
      return err(storageFailure("STORAGE_FAILED", operation, error));
    }
  }

  /** Roll back a source write whose metadata could not be stored. */
  private async removeQuietly(key: string): Promise<void> {
    try {
      await this.storage.delete(key);
    } catch (error) {
      console.warn(`[PendingReports] Could not remove orphaned source ${key}:`, getErrorMessage(error));
    }
  }
}
