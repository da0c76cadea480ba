import path from "path";
import { getExtractionTimeoutMs } from "@/lib/config/ai";
import { loadEnv } from "@/lib/config/env";
import {
  getHistoryLookbackDays,
  getInstantWindowMinutes,
  getPendingReportsDir,
  getReportTimeZone,
  getSleepDefaultWindowMinutes,
} from "@/lib/config/pipeline";
import { getDb } from "@/lib/db/drizzle";
import { createDrizzleDomainStores } from "@/lib/db/services/careLogs";
import { createOpenAiExtractor } from "@/lib/extraction/aiExtractor";
import { createOcrClient } from "@/lib/extraction/ocrClient";
import { FileSystemStorage } from "@/lib/pendingReports/fileSystemStorage";
import { PendingReportQueue } from "@/lib/pendingReports/queue";
import type { DurableStorage } from "@/lib/pendingReports/storage";
import type { Result } from "@/lib/utils/result";
import type { DomainStores } from "./domainStores";
import type { PipelineError } from "./errors";
import {
  commitReview,
  createSessionProcessor,
  ingestReport,
  retryPendingReport,
  type BuiltSession,
  type CommitReviewOutcome,
  type IngestOutcome,
  type PipelineDeps,
  type SessionBuilderDeps,
} from "./ingestReport";
import type { ReviewSession } from "./reviewSession";
import type { PendingReport, ReportSource } from "./types";

/**
 * One child's import pipeline: ingest, review hand-off, commit and the
 * pending report queue behind a single object.
 */
export class CareReportPipeline {
  readonly deps: PipelineDeps;

  constructor(deps: SessionBuilderDeps & { storage: DurableStorage }) {
    const { storage, ...builderDeps } = deps;
    const queue = new PendingReportQueue<BuiltSession>({
      storage,
      processor: createSessionProcessor(builderDeps),
      now: builderDeps.now,
    });
    this.deps = { ...builderDeps, queue };
  }

  ingest(
    source: ReportSource,
    options: { signal?: AbortSignal; referenceDate?: Date } = {}
  ): Promise<IngestOutcome> {
    return ingestReport(source, this.deps, options);
  }

  commit(session: ReviewSession): Promise<CommitReviewOutcome> {
    return commitReview(session, this.deps);
  }

  listPending(): Promise<Result<PendingReport[], PipelineError>> {
    return this.deps.queue.list();
  }

  retryPending(
    id: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<Result<BuiltSession, PipelineError>> {
    return retryPendingReport(id, this.deps, options);
  }

  discardPending(id: string): Promise<Result<void, PipelineError>> {
    return this.deps.queue.discard(id);
  }
}

/**
 * Build a pipeline from environment configuration (.env.local, then .env).
 * `stores` overrides the Postgres stores, e.g. for a local run without a database.
 */
export function createCareReportPipelineFromEnv(options: {
  childId: string;
  stores?: DomainStores;
}): CareReportPipeline {
  loadEnv();

  const timeZone = getReportTimeZone();
  const stores = options.stores ?? createDrizzleDomainStores(getDb(), options.childId);

  console.log("[Pipeline] Configured from environment", {
    childId: options.childId,
    timeZone,
    pendingReportsDir: getPendingReportsDir(),
  });

  return new CareReportPipeline({
    extraction: {
      ocr: createOcrClient(),
      extractor: createOpenAiExtractor(),
      timeZone,
    },
    stores,
    detectorOptions: {
      instantWindowMinutes: getInstantWindowMinutes(),
      sleepDefaultWindowMinutes: getSleepDefaultWindowMinutes(),
      timeZone,
    },
    timeoutMs: getExtractionTimeoutMs(),
    historyLookbackDays: getHistoryLookbackDays(),
    storage: new FileSystemStorage(path.resolve(getPendingReportsDir())),
  });
}
