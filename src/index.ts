export {
  runSync,
  resolveRoots,
  type SyncOptions,
  type SyncOutcome,
  type SyncStatus,
} from "./sync.js";

export { scanTree, type ScanOptions, type ScanResult } from "./scan.js";

export {
  createPlan,
  compareActions,
  compareFileMeta,
  finalizePlan,
  EMPTY_PLAN,
  type Action,
  type ActionKind,
  type AddAction,
  type UpdateAction,
  type DeleteAction,
  type DigestFn,
  type Entry,
  type Mapping,
  type Plan,
  type SpecialKind,
  type PlanResult,
} from "./plan.js";

export {
  applyPlan,
  plannedBytes,
  type ApplyOptions,
  type ApplyResult,
  type ProgressObserver,
} from "./executor.js";

export { DigestPool, type DigestPoolOptions } from "./digest-pool.js";
export {
  fileDigest,
  listSupportedHashes,
  normalizeHashAlg,
  type HashAlg,
} from "./hash.js";

export {
  createIgnorer,
  loadSourceIgnorer,
  parseIgnoreFile,
  type IgnorePredicate,
} from "./ignore.js";

export { ProgressReporter, type ProgressSnapshot } from "./progress.js";
export { renderPlanSummary, formatAction } from "./plan-report.js";
export { promptConfirm, isAffirmative, type Confirm } from "./confirm.js";

export {
  FatalSetupError,
  DigestError,
  type ActionError,
  type ComparisonWarning,
  type ScanWarning,
} from "./errors.js";

export {
  ConsoleLogger,
  StructuredLogger,
  silentLogger,
  parseLogLevel,
  type Logger,
  type LogEntry,
  type LogLevel,
} from "./logger.js";
