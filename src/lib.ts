export { CdnRangeSource } from "./range-source";
export { RefreshScheduler } from "./scheduler";
export type {
  RefreshListener,
  SchedulerDeps,
  SchedulerState,
  SchedulerStatus,
} from "./scheduler";
export { SnapshotStore } from "./store";
export { fetchRanges, fetchRangesText, DEFAULT_SOURCE } from "./fetch";
export type { FetchOptions } from "./fetch";
export {
  formatPrefix,
  formatRangesForFile,
  parsePrefix,
  parseRangesFromContent,
  prefixEquals,
} from "./ip";
export { DEFAULT_INTERVAL_MS, resolveOptions } from "./config";
export type { RefreshOptionsInput, ResolvedRefreshOptions } from "./config";
export { parseDirectiveBlock } from "./directives";
export type { DirectiveBlock } from "./directives";
export { formatDuration, parseDuration } from "./duration";
export {
  AppError,
  ConfigError,
  FetchError,
  PrefixParseError,
  toAppError,
} from "./errors";
export { createLogger, logLevelFromEnv, silentLogger, withFields } from "./logger";
export type { LogFields, LogLevel, Logger } from "./logger";
export type {
  FetchLike,
  LifecycleState,
  NetworkPrefix,
  PrefixSnapshot,
  RangeSourceDescriptor,
} from "./types";
