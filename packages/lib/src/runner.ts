import { availableParallelism } from "node:os"
import pLimit from "p-limit"

import { StrataError, errorMessage } from "./errors.js"
import {
  createChangeDetector,
  describeChange,
} from "./internal/change-detector.js"
import { createExecutionContext } from "./internal/execution-context.js"
import type { ExecutionContext } from "./internal/execution-context.js"
import { computeFingerprint } from "./internal/fingerprint.js"
import { createOutputSink } from "./internal/output-sink.js"
import { isSuccess, runCommand } from "./internal/process-executor.js"
import { removeOutputs } from "./internal/remove-outputs.js"
import type {
  ChangeDecision,
  ExecutionLevel,
  ExitOutcome,
  Task,
  TaskGraph,
  TaskRunner,
  TaskRunnerOptions,
} from "./types.js"

/**
 * Creates a runner that executes dependency levels one after another.
 *
 * Inside a level every stale task is started at once, bounded by a single
 * worker limit shared by the whole run. A level starts only after every
 * task of the previous one has finished.
 *
 * @example
 * const graph = createTaskGraph(tasks)
 * graph.validate()
 * const runner = createTaskRunner(graph, { cache: createFingerprintCache() })
 * const result = await runner.run(graph.calculateDependencyLevels(graph.getRequiredTasks("build")))
 * if (!result.ok) console.error(result.error.message)
 */
export function createTaskRunner(
  graph: TaskGraph,
  options: TaskRunnerOptions
): TaskRunner {
  const {
    cache,
    cwd = process.cwd(),
    workers = availableParallelism(),
    defaultTimeout,
    continueOnFailure = false,
    removeOutputs: removeAllOutputs = false,
    outputMode = "group",
    output = createOutputSink(),
    spawn,
    env,
    strictFingerprints = false,
    logger,
  } = options

  if (!Number.isInteger(workers) || workers < 1) {
    throw new StrataError(
      `Worker count must be a positive integer, got ${workers}`,
      StrataError.Config
    )
  }

  const limit = pLimit(workers)
  const detector = createChangeDetector({
    cwd,
    cache,
    logger,
    strict: strictFingerprints,
  })

  const getTask = (taskId: string): Task => {
    const task = graph.getTask(taskId)
    if (!task) {
      throw new StrataError(
        `Task "${taskId}" not found`,
        StrataError.TaskNotFound,
        taskId
      )
    }
    return task
  }

  const writeGrouped = async (outcome: ExitOutcome): Promise<void> => {
    if (outputMode !== "group" || outcome.kind === "error") return
    if (outcome.stdout.length === 0 && outcome.stderr.length === 0) return
    try {
      await output.writeBlock(outcome.stdout, outcome.stderr)
    } catch (error) {
      logger?.warn?.(`Failed to write task output: ${errorMessage(error)}`)
    }
  }

  const toTaskError = (task: Task, outcome: ExitOutcome): StrataError => {
    switch (outcome.kind) {
      case "error":
        return new StrataError(
          outcome.error.message,
          StrataError.CommandIo,
          task.id,
          { cause: outcome.error.cause }
        )
      case "timeout":
        return new StrataError(
          `Task "${task.id}" timed out after ${outcome.timeoutMs}ms`,
          StrataError.CommandTimeout,
          task.id
        )
      case "exited":
        return new StrataError(
          outcome.signal !== null
            ? `Task "${task.id}" was terminated by ${outcome.signal}`
            : `Task "${task.id}" exited with code ${outcome.exitCode}`,
          StrataError.TaskFailed,
          task.id
        )
    }
  }

  const recordFingerprint = async (
    task: Task,
    context: ExecutionContext
  ): Promise<string | undefined> => {
    if (task.inputs.length === 0) return undefined
    try {
      const fingerprint = await computeFingerprint(task.inputs, {
        cwd,
        logger,
        strict: strictFingerprints,
      })
      if (cache.add(fingerprint)) {
        context.cacheChanged = true
      }
      return fingerprint
    } catch (error) {
      logger?.warn?.(
        `Not caching task "${task.id}": ${errorMessage(error)}`
      )
      return undefined
    }
  }

  const executeTask = async (
    task: Task,
    decision: ChangeDecision,
    context: ExecutionContext
  ): Promise<void> => {
    const outcome = await limit(() => {
      options.onTaskBegin?.(task.id)
      context.updateTaskStatus(task.id, {
        status: "running",
        reason: decision.reason,
        startedAt: Date.now(),
      })
      return runCommand(task.command, {
        cwd,
        env,
        timeout: task.timeout ?? defaultTimeout,
        stream: outputMode === "stream",
        output,
        spawn,
        logger,
      })
    })

    await writeGrouped(outcome)

    const finishedAt = Date.now()
    const captured =
      outcome.kind === "error"
        ? undefined
        : {
            stdout: outcome.stdout.toString("utf8"),
            stderr: outcome.stderr.toString("utf8"),
          }

    if (!isSuccess(outcome)) {
      const error = toTaskError(task, outcome)
      context.updateTaskStatus(task.id, {
        status: "failed",
        finishedAt,
        error,
        output: captured,
        ...(outcome.kind === "exited"
          ? {
              exitCode: outcome.exitCode ?? undefined,
              signal: outcome.signal ?? undefined,
            }
          : {}),
      })
      context.fail(
        new StrataError(
          `Task "${task.id}" failed: ${error.message}`,
          StrataError.TaskFailed,
          task.id,
          { cause: error }
        )
      )
      options.onTaskFailed?.(task.id, error)
      return
    }

    const fingerprint = await recordFingerprint(task, context)

    if ((task.autoRemove || removeAllOutputs) && task.outputs.length > 0) {
      await removeOutputs(task.outputs, { cwd, logger })
    }

    const stats = context.updateTaskStatus(task.id, {
      status: "completed",
      finishedAt,
      exitCode: 0,
      fingerprint,
      output: captured,
    })
    options.onTaskComplete?.(task.id, stats)
  }

  const runLevel = async (
    level: ExecutionLevel,
    context: ExecutionContext
  ): Promise<void> => {
    options.onLevelBegin?.(level)

    const tasks = level.taskIds.map(getTask)
    const decisions = await Promise.all(
      tasks.map((task) => detector.shouldRun(task))
    )

    await Promise.all(
      tasks.map(async (task, index) => {
        const decision = decisions[index]
        logger?.debug?.(`Task "${task.id}": ${describeChange(decision.reason)}`)

        if (!decision.run) {
          context.updateTaskStatus(task.id, {
            status: "skipped",
            reason: decision.reason,
          })
          options.onTaskSkipped?.(task.id, decision.reason)
          return
        }

        await executeTask(task, decision, context)
      })
    )
  }

  return {
    async run(levels) {
      for (const { taskIds } of levels) taskIds.forEach(getTask)

      const context = createExecutionContext(graph, levels)

      for (const level of levels) {
        if (context.error && !continueOnFailure) break
        await runLevel(level, context)
      }

      return context.buildResult()
    },
  }
}
