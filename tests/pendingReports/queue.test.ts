/**
 * Unit tests for the pending report queue.
 *
 * Tests PendingReportQueue to ensure:
 * - Enqueue writes source then metadata, and refuses unsupported or contradicted formats
 * - List order, orphaned sources and corrupt metadata
 * - Retry removes a report only after processing succeeds
 * - Operations on one report are serialized
 * - Discard is idempotent
 * - Reports survive a restart on the file system
 */

import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PipelineError } from "@/lib/careReports/errors";
import { FileSystemStorage } from "@/lib/pendingReports/fileSystemStorage";
import { PendingReportQueue, type ReportProcessor } from "@/lib/pendingReports/queue";
import type { DurableStorage } from "@/lib/pendingReports/storage";
import { err, ok } from "@/lib/utils/result";
import { MemoryStorage } from "../helpers/memoryStorage";

const reportText = "Bottle 4oz at 9:15 PM";
const source = () => ({ bytes: new TextEncoder().encode(reportText), mediaType: "text/plain" });

function sequentialIds() {
  let n = 0;
  return () => `r${++n}`;
}

function steppingClock(startIso = "2024-03-05T18:00:00Z") {
  let current = new Date(startIso).getTime();
  return () => {
    const now = new Date(current);
    current += 60_000;
    return now;
  };
}

function createQueue(storage: DurableStorage, processor: ReportProcessor<string[]> = async () => ok(["done"])) {
  return new PendingReportQueue<string[]>({
    storage,
    processor,
    now: steppingClock(),
    generateId: sequentialIds(),
  });
}

describe("PendingReportQueue", () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  describe("enqueue", () => {
    it("stores the source and metadata", async () => {
      const queue = createQueue(storage);
      const result = await queue.enqueue(source(), { reason: "extraction" });

      expect(result).toEqual({
        ok: true,
        value: {
          id: "r1",
          createdAt: new Date("2024-03-05T18:00:00Z"),
          sourceReference: "reports/r1/source",
          format: "text",
          byteLength: reportText.length,
          mediaType: "text/plain",
          reason: "extraction",
        },
      });
      expect([...storage.objects.keys()].sort()).toEqual(["reports/r1/meta.json", "reports/r1/source"]);
    });

    it("refuses an unsupported format before writing", async () => {
      const queue = createQueue(storage);
      const pdf = new TextEncoder().encode("%PDF-1.7 binary");
      const result = await queue.enqueue({ bytes: pdf });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("UNSUPPORTED_FORMAT");
      expect(storage.objects.size).toBe(0);
    });

    it("refuses a declared format the bytes contradict", async () => {
      const queue = createQueue(storage);
      const binary = new Uint8Array([0x25, 0x50, 0x44, 0x46, 0x00, 0x01]);

      const asText = await queue.enqueue({ bytes: binary, format: "text" });
      const asImage = await queue.enqueue({ ...source(), format: "image" });

      expect(!asText.ok && asText.error.code).toBe("UNSUPPORTED_FORMAT");
      expect(!asImage.ok && asImage.error.code).toBe("UNSUPPORTED_FORMAT");
      expect(storage.objects.size).toBe(0);
    });

    it("does not write when cancelled up front", async () => {
      const queue = createQueue(storage);
      const controller = new AbortController();
      controller.abort();

      const result = await queue.enqueue(source(), { signal: controller.signal });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("CANCELLED");
      expect(storage.objects.size).toBe(0);
    });

    it("removes the source again when metadata cannot be written", async () => {
      storage.failOn("put", (key) => key.endsWith("meta.json"), new Error("disk full"));
      const queue = createQueue(storage);

      const result = await queue.enqueue(source());

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("STORAGE_FAILED");
      expect(result.error.operation).toBe("pendingReports.enqueue.meta");
      expect(storage.objects.size).toBe(0);
    });

    it("reports a failed source write with its operation", async () => {
      storage.failOn("put", (key) => key.endsWith("/source"));
      const result = await createQueue(storage).enqueue(source());

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.operation).toBe("pendingReports.enqueue.source");
    });
  });

  describe("list", () => {
    it("returns reports newest first", async () => {
      const queue = createQueue(storage);
      await queue.enqueue(source());
      await queue.enqueue(source());
      await queue.enqueue(source());

      const result = await queue.list();
      expect(result.ok && result.value.map((r) => r.id)).toEqual(["r3", "r2", "r1"]);
    });

    it("ignores source bytes without metadata", async () => {
      await storage.put("reports/orphan/source", new Uint8Array([1, 2, 3]));
      const result = await createQueue(storage).list();
      expect(result).toEqual({ ok: true, value: [] });
    });

    it("reports corrupt metadata as a storage failure", async () => {
      await storage.put("reports/bad/meta.json", new TextEncoder().encode("{not json"));
      const result = await createQueue(storage).list();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("STORAGE_FAILED");
    });
  });

  it("get returns REPORT_NOT_FOUND for an unknown id", async () => {
    const result = await createQueue(storage).get("nope");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("REPORT_NOT_FOUND");
  });

  describe("retry", () => {
    it("runs the processor on the stored bytes and removes the report on success", async () => {
      const processor = vi.fn<ReportProcessor<string[]>>(async () => ok(["candidate"]));
      const queue = createQueue(storage, processor);
      await queue.enqueue(source());

      const result = await queue.retry("r1");

      expect(result).toEqual({ ok: true, value: ["candidate"] });
      expect(processor).toHaveBeenCalledTimes(1);
      const [stored, context] = processor.mock.calls[0];
      expect(new TextDecoder().decode(stored.bytes)).toBe(reportText);
      expect(stored.format).toBe("text");
      expect(stored.mediaType).toBe("text/plain");
      expect(context.report.id).toBe("r1");
      expect(storage.objects.size).toBe(0);
    });

    it("keeps the report untouched when processing fails", async () => {
      const failure = new PipelineError("EXTRACTION_UNAVAILABLE", "service down");
      const queue = createQueue(storage, async () => err(failure));
      await queue.enqueue(source());
      const before = new Map(storage.objects);

      const result = await queue.retry("r1");

      expect(result).toEqual({ ok: false, error: failure });
      expect(storage.objects).toEqual(before);
      const listed = await queue.list();
      expect(listed.ok && listed.value.map((r) => r.id)).toEqual(["r1"]);
    });

    it("fails with STORAGE_FAILED and keeps the report when it cannot be deleted", async () => {
      const queue = createQueue(storage);
      await queue.enqueue(source());
      storage.failOn("delete");

      const result = await queue.retry("r1");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("STORAGE_FAILED");
      expect(result.error.operation).toBe("pendingReports.retry.delete");

      storage.clearFailures();
      const listed = await queue.list();
      expect(listed.ok && listed.value).toHaveLength(1);
    });

    it("returns REPORT_NOT_FOUND for an unknown id", async () => {
      const result = await createQueue(storage).retry("missing");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("REPORT_NOT_FOUND");
    });

    it("serializes operations on the same report", async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const queue = createQueue(storage, async () => {
        await gate;
        return ok(["late"]);
      });
      await queue.enqueue(source());

      const retrying = queue.retry("r1");
      const discarding = queue.discard("r1");
      await new Promise((resolve) => setTimeout(resolve, 20));

      // discard is still waiting behind the in-flight retry
      expect(storage.objects.has("reports/r1/meta.json")).toBe(true);

      release();
      expect(await retrying).toEqual({ ok: true, value: ["late"] });
      expect(await discarding).toEqual({ ok: true, value: undefined });
      expect(storage.objects.size).toBe(0);
    });
  });

  describe("discard", () => {
    it("removes the report and is idempotent", async () => {
      const queue = createQueue(storage);
      await queue.enqueue(source());

      expect(await queue.discard("r1")).toEqual({ ok: true, value: undefined });
      expect(storage.objects.size).toBe(0);
      expect(await queue.discard("r1")).toEqual({ ok: true, value: undefined });
    });

    it("leaves other reports alone", async () => {
      const queue = createQueue(storage);
      await queue.enqueue(source());
      await queue.enqueue(source());

      await queue.discard("r1");

      const listed = await queue.list();
      expect(listed.ok && listed.value.map((r) => r.id)).toEqual(["r2"]);
    });
  });

  describe("durability", () => {
    let root: string;

    beforeEach(async () => {
      root = await mkdtemp(path.join(os.tmpdir(), "pending-reports-"));
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    it("lists the same reports after a restart", async () => {
      const before = createQueue(new FileSystemStorage(root));
      await before.enqueue(source(), { reason: "extraction" });
      await before.enqueue({ bytes: new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0, 16]), filename: "sheet.jpg" });
      const listedBefore = await before.list();

      // fresh instances, same directory
      const after = createQueue(new FileSystemStorage(root));
      const listedAfter = await after.list();

      expect(listedAfter).toEqual(listedBefore);
      expect(listedAfter.ok && listedAfter.value.map((r) => [r.id, r.format])).toEqual([
        ["r2", "image"],
        ["r1", "text"],
      ]);

      const retried = await after.retry("r1");
      expect(retried).toEqual({ ok: true, value: ["done"] });
      const remaining = await after.list();
      expect(remaining.ok && remaining.value.map((r) => r.id)).toEqual(["r2"]);
    });
  });
});
