export type {
  CandidateEvent,
  EventKind,
  ExistingRecord,
  NormalizedQuantity,
  PendingReport,
  QuantityUnit,
  ReportFormat,
  ReportSource,
  ReviewState,
  TimeRange,
} from "./types";

export { createCandidate, validateCandidate } from "./candidates";
export type { CandidateIssue, CandidateIssueCode, NewCandidateInput } from "./candidates";

export { normalizeQuantity, isVolumeUnit, toDurationMinutes } from "./normalizeQuantity";

export {
  detectDuplicate,
  detectDuplicates,
  resolveHistoryRange,
} from "./duplicates";
export type { DuplicateDetectorOptions } from "./duplicates";

export {
  applyPatch,
  confirmAll,
  rejectAll,
  selectForCommit,
  transition,
} from "./reviewState";
export type {
  BulkResult,
  CandidatePatch,
  ReviewAction,
  ReviewError,
  ReviewErrorCode,
} from "./reviewState";

export {
  applyReviewAction,
  confirmAllInSession,
  createReviewSession,
  rejectAllInSession,
  summarizeSession,
} from "./reviewSession";
export type { ReviewSession, SessionError, SessionSummary } from "./reviewSession";

export { loadHistory } from "./domainStores";
export type {
  ActivityRecordInput,
  BottleFeedRecordInput,
  CommitTarget,
  DiaperRecordInput,
  DiaperType,
  DomainStore,
  DomainStores,
  NursingRecordInput,
  RecordReference,
  SleepRecordInput,
} from "./domainStores";

export {
  candidatesToRetry,
  commitCandidates,
  resolveDiaperType,
  routeCandidate,
} from "./commitDispatcher";
export type { CommitItemResult, CommitResult } from "./commitDispatcher";

export {
  classifyError,
  PIPELINE_ERROR_CODES,
  PipelineError,
} from "./errors";
export type { PipelineErrorCategory, PipelineErrorCode } from "./errors";
export { getPipelineErrorUx } from "./errorMessages";
export type { PipelineErrorUx } from "./errorMessages";

export {
  buildReviewSession,
  commitReview,
  createSessionProcessor,
  ingestReport,
  retryPendingReport,
} from "./ingestReport";
export type {
  BuiltSession,
  CommitReviewOutcome,
  IngestOutcome,
  PipelineDeps,
  SessionBuilderDeps,
} from "./ingestReport";

export { CareReportPipeline, createCareReportPipelineFromEnv } from "./createPipeline";
