export { task } from "./task.js"
export { createTaskGraph } from "./graph.js"
export { createTaskRunner } from "./runner.js"
export {
  createFingerprintCache,
  loadCache,
  saveCache,
  resolveCachePath,
} from "./cache.js"
export { StrataError, isStrataError, errorMessage } from "./errors.js"
export type { StrataErrorCode } from "./errors.js"
export { resolvePatterns } from "./internal/file-resolver.js"
export {
  computeFingerprint,
  fingerprintFiles,
} from "./internal/fingerprint.js"
export {
  createChangeDetector,
  describeChange,
} from "./internal/change-detector.js"
export type {
  ChangeDetector,
  ChangeDetectorOptions,
} from "./internal/change-detector.js"
export { runCommand, isSuccess } from "./internal/process-executor.js"
export type { RunCommandOptions } from "./internal/process-executor.js"
export { createOutputSink } from "./internal/output-sink.js"
export type { OutputSinkTargets } from "./internal/output-sink.js"
export { EMPTY_FINGERPRINT } from "./internal/constants.js"
export type {
  ChangeDecision,
  ChangeReason,
  ExecutionLevel,
  ExitOutcome,
  FingerprintCache,
  Logger,
  OrderingOnlyDependency,
  OutputMode,
  OutputSink,
  OutputStream,
  RunResult,
  RunStats,
  SpawnFunction,
  SpawnedProcess,
  Task,
  TaskConfig,
  TaskGraph,
  TaskNode,
  TaskRunner,
  TaskRunnerOptions,
  TaskStats,
  TaskStatus,
} from "./types.js"
