import type { EventEmitter } from "node:events"
import type { SpawnOptions } from "node:child_process"
import type { Readable } from "node:stream"

import type { StrataError } from "./errors.js"

/**
 * Configuration for creating a task.
 */
export interface TaskConfig {
  /**
   * Unique identifier of the task. Also the name used to target it.
   */
  id: string
  /**
   * Shell command to execute (run through `sh -c`, or `cmd /c` on Windows).
   */
  command: string
  /**
   * Ids of tasks that must finish before this one starts.
   */
  dependencies?: readonly string[]
  /**
   * Alternate names that resolve to this task when used as a target.
   * Must not collide with any task id or another task's alias.
   */
  aliases?: readonly string[]
  /**
   * Literal paths or glob patterns of the files this task reads.
   * A task without inputs is never cached and runs on every invocation.
   */
  inputs?: readonly string[]
  /**
   * Literal paths or glob patterns of the files this task produces.
   */
  outputs?: readonly string[]
  /**
   * Delete the resolved outputs after the task succeeds.
   * @default false
   */
  autoRemove?: boolean
  /**
   * Maximum run time in milliseconds. Falls back to the runner's default timeout.
   */
  timeout?: number
}

/**
 * An immutable task record, created with `task()`.
 */
export interface Task {
  readonly id: string
  readonly command: string
  readonly dependencies: readonly string[]
  readonly aliases: readonly string[]
  readonly inputs: readonly string[]
  readonly outputs: readonly string[]
  readonly autoRemove: boolean
  readonly timeout?: number
}

export interface TaskNode {
  task: Task
  dependencies: Set<string> // ids of tasks this one depends on
  dependents: Set<string> // ids of tasks that depend on this one
}

/**
 * Tasks that are the same distance (by longest dependency path) from the
 * graph's sources. Every dependency of a task in level L is in a level < L.
 */
export interface ExecutionLevel {
  level: number
  taskIds: string[]
}

/**
 * A dependency edge that carries no file relationship: none of the
 * dependency's outputs match any of the dependent's inputs.
 */
export interface OrderingOnlyDependency {
  taskId: string
  dependencyId: string
}

export interface TaskGraph {
  /**
   * Nodes keyed by task id, in declaration order.
   */
  nodes: Map<string, TaskNode>
  /**
   * Checks id uniqueness, dependency existence, self-dependencies, alias
   * collisions and cycles.
   * @throws StrataError with code `dependency`
   */
  validate(): void
  /**
   * Resolves a task id or alias to a task id.
   * @throws StrataError with code `task-not-found`
   */
  resolve(target: string): string
  getTask(taskId: string): Task | undefined
  /**
   * Orders the given tasks (all tasks by default) so that every task comes
   * after its dependencies.
   */
  sortTopologically(taskIds?: Iterable<string>): string[]
  /**
   * Returns the target and everything it transitively depends on,
   * topologically sorted.
   * @throws StrataError with code `task-not-found`
   */
  getRequiredTasks(target: string): string[]
  /**
   * Groups the given tasks (all tasks by default) into dependency levels,
   * ascending. Dependencies outside the given set are ignored.
   */
  calculateDependencyLevels(taskIds?: Iterable<string>): ExecutionLevel[]
  findOrderingOnlyDependencies(): OrderingOnlyDependency[]
}

/**
 * Optional logging seam. The library never prints on its own.
 */
export interface Logger {
  debug?: (message: string) => void
  info?: (message: string) => void
  warn?: (message: string) => void
  error?: (message: string) => void
}

export type OutputStream = "stdout" | "stderr"

/**
 * Destination for task output. Implementations serialize writes so that
 * output of concurrently running tasks never interleaves mid-write.
 */
export interface OutputSink {
  write(stream: OutputStream, chunk: Uint8Array | string): Promise<void>
  /**
   * Writes a task's buffered output as one uninterrupted block.
   */
  writeBlock(stdout: Uint8Array | string, stderr: Uint8Array | string): Promise<void>
}

/**
 * The part of a child process the executor relies on.
 * `ChildProcess` from `node:child_process` satisfies it.
 */
export interface SpawnedProcess extends EventEmitter {
  readonly pid?: number
  readonly stdout: Readable | null
  readonly stderr: Readable | null
  kill(signal?: NodeJS.Signals | number): boolean
}

export type SpawnFunction = (
  command: string,
  args: string[],
  options: SpawnOptions
) => SpawnedProcess

export type ExitOutcome =
  | {
      kind: "exited"
      exitCode: number | null
      signal: NodeJS.Signals | null
      stdout: Buffer
      stderr: Buffer
      durationMs: number
    }
  | {
      kind: "timeout"
      timeoutMs: number
      stdout: Buffer
      stderr: Buffer
      durationMs: number
    }
  | {
      kind: "error"
      error: StrataError
      durationMs: number
    }

export type ChangeReason =
  | "no-inputs"
  | "missing-outputs"
  | "outdated-outputs"
  | "timestamps-unavailable"
  | "inputs-changed"
  | "check-failed"
  | "up-to-date"

export interface ChangeDecision {
  run: boolean
  reason: ChangeReason
  /**
   * Fingerprint of the resolved inputs, when it was computed.
   */
  fingerprint?: string
}

export type OutputMode = "stream" | "group"

/**
 * Configuration options for a task runner.
 */
export interface TaskRunnerOptions {
  /**
   * Fingerprints of previous successful runs. The runner adds to it.
   */
  cache: FingerprintCache
  /**
   * Directory commands run in and patterns resolve against.
   * @default process.cwd()
   */
  cwd?: string
  /**
   * Maximum number of commands in flight across the whole run.
   * @default os.availableParallelism()
   */
  workers?: number
  /**
   * Timeout in milliseconds for tasks that do not set their own.
   */
  defaultTimeout?: number
  /**
   * Keep attempting later levels after a task fails.
   * @default false
   */
  continueOnFailure?: boolean
  /**
   * Delete every task's outputs after it succeeds, as if `autoRemove` were set.
   * @default false
   */
  removeOutputs?: boolean
  /**
   * "stream" writes output live as it arrives, "group" writes each task's
   * output as one block once it finishes.
   * @default "group"
   */
  outputMode?: OutputMode
  /**
   * Where task output goes.
   * @default a sink over process.stdout / process.stderr
   */
  output?: OutputSink
  /**
   * @default import("node:child_process").spawn
   */
  spawn?: SpawnFunction
  /**
   * Extra environment variables for every command.
   */
  env?: Record<string, string>
  /**
   * Treat unreadable input files as an error instead of leaving them out of
   * the fingerprint. Affected tasks always run and are never cached.
   * @default false
   */
  strictFingerprints?: boolean
  logger?: Logger
  onLevelBegin?: (level: ExecutionLevel) => void
  onTaskBegin?: (taskId: string) => void
  onTaskSkipped?: (taskId: string, reason: ChangeReason) => void
  onTaskComplete?: (taskId: string, stats: TaskStats) => void
  onTaskFailed?: (taskId: string, error: StrataError) => void
}

export interface TaskRunner {
  /**
   * Runs the levels in ascending order. Never rejects because of a task
   * failure; check `ok` on the result.
   */
  run(levels: ExecutionLevel[]): Promise<RunResult>
}

export interface FingerprintCache {
  has(fingerprint: string): boolean
  /**
   * @returns true if the fingerprint was not present before
   */
  add(fingerprint: string): boolean
  readonly size: number
  values(): string[]
}

/**
 * Status of a task in a run.
 * - "pending": never reached (an earlier level failed)
 * - "skipped": up to date
 * - "running": currently executing
 * - "completed": command exited successfully
 * - "failed": non-zero exit, signal, timeout or spawn error
 */
export type TaskStatus =
  | "pending"
  | "skipped"
  | "running"
  | "completed"
  | "failed"

export interface TaskStats {
  id: string
  level: number
  command: string
  status: TaskStatus
  /**
   * Why change detection decided to skip or run the task.
   */
  reason?: ChangeReason
  startedAt?: number
  finishedAt?: number
  durationMs?: number
  exitCode?: number
  signal?: string
  /**
   * Fingerprint inserted into the cache after a successful run.
   */
  fingerprint?: string
  error?: StrataError
  output?: {
    stdout: string
    stderr: string
  }
}

export interface RunStats {
  startedAt: number
  finishedAt: number
  durationMs: number
  status: "success" | "failed"
  tasks: TaskStats[]
  summary: {
    total: number
    completed: number
    failed: number
    skipped: number
    pending: number
  }
}

export type RunResult =
  | {
      ok: true
      error: null
      /**
       * Whether any fingerprint was newly added to the cache, i.e. whether
       * the caller should persist it.
       */
      cacheChanged: boolean
      stats: RunStats
    }
  | {
      ok: false
      /**
       * The first task failure, with code `task-failed`; the task's own
       * error is its `cause`.
       */
      error: StrataError
      cacheChanged: boolean
      stats: RunStats
    }
