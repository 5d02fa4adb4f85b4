import chalk, { type ChalkInstance } from "chalk"
import { createOutputSink, describeChange, errorMessage } from "strata"
import type {
  Logger,
  OutputSink,
  OutputSinkTargets,
  RunResult,
  TaskRunnerOptions,
} from "strata"

export interface ConsoleReporterOptions {
  verbose?: boolean
  targets?: OutputSinkTargets
  /**
   * @default chalk, with colors when the terminal supports them
   */
  colors?: ChalkInstance
}

type RunCallbacks = Pick<
  TaskRunnerOptions,
  | "onLevelBegin"
  | "onTaskBegin"
  | "onTaskSkipped"
  | "onTaskComplete"
  | "onTaskFailed"
>

export interface ConsoleReporter {
  logger: Logger
  output: OutputSink
  callbacks: RunCallbacks
  /**
   * Prints a plain line to stdout.
   */
  print(line: string): void
  summarize(result: RunResult): void
  /**
   * Waits until everything printed so far has been written.
   */
  flush(): Promise<void>
}

/**
 * Console logger, output sink and run callbacks sharing one write lock, so
 * status lines never land inside a task's output block.
 */
export function createConsoleReporter({
  verbose = false,
  targets,
  colors = chalk,
}: ConsoleReporterOptions = {}): ConsoleReporter {
  const output = createOutputSink(targets)
  let pending: Promise<void>[] = []

  const emit = (stream: "stdout" | "stderr", line: string) => {
    pending.push(
      output.write(stream, `${line}\n`).catch((error: unknown) => {
        process.exitCode = 1
        console.error(`strata: failed to write output: ${errorMessage(error)}`)
      })
    )
  }

  const logger: Logger = {
    debug: verbose ? (message) => emit("stderr", colors.dim(message)) : undefined,
    info: (message) => emit("stderr", message),
    warn: (message) => emit("stderr", colors.yellow(`Warning: ${message}`)),
    error: (message) => emit("stderr", colors.red(`Error: ${message}`)),
  }

  const callbacks: RunCallbacks = {
    onLevelBegin: verbose
      ? (level) =>
          emit(
            "stderr",
            colors.dim(`Level ${level.level}: ${level.taskIds.join(", ")}`)
          )
      : undefined,
    onTaskBegin: (taskId) =>
      emit("stderr", `${colors.cyan("→")} Running task ${colors.bold(taskId)}`),
    onTaskSkipped: verbose
      ? (taskId, reason) =>
          emit(
            "stderr",
            colors.dim(`- Skipped ${taskId} (${describeChange(reason)})`)
          )
      : undefined,
    onTaskComplete: (taskId, stats) =>
      emit(
        "stderr",
        `${colors.green("✓")} ${colors.bold(taskId)}${
          stats.durationMs !== undefined
            ? colors.dim(` ${formatDuration(stats.durationMs)}`)
            : ""
        }`
      ),
    onTaskFailed: (_taskId, error) =>
      emit("stderr", `${colors.red("✗")} ${error.message}`),
  }

  return {
    logger,
    output,
    callbacks,
    print(line) {
      emit("stdout", line)
    },
    summarize(result) {
      const { completed, failed, skipped, pending: notRun } = result.stats.summary
      const parts = [
        `${completed} completed`,
        `${skipped} skipped`,
        ...(failed > 0 ? [colors.red(`${failed} failed`)] : []),
        ...(notRun > 0 ? [`${notRun} not run`] : []),
      ]
      emit(
        "stderr",
        `${parts.join(", ")} ${colors.dim(`in ${formatDuration(result.stats.durationMs)}`)}`
      )
    },
    async flush() {
      while (pending.length > 0) {
        const writes = pending
        pending = []
        await Promise.all(writes)
      }
    },
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  return `${(ms / 1000).toFixed(1)}s`
}
