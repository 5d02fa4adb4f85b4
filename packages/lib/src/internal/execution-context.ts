import type { StrataError } from "../errors.js"
import type {
  ExecutionLevel,
  RunResult,
  RunStats,
  TaskGraph,
  TaskStats,
} from "../types.js"

/**
 * Per-run bookkeeping: task stats keyed by id, plus whether the run has
 * failed and whether the cache changed.
 */
export interface ExecutionContext {
  taskStats: Map<string, TaskStats>
  startedAt: number
  error: StrataError | null
  cacheChanged: boolean

  updateTaskStatus: (taskId: string, updates: Partial<TaskStats>) => TaskStats
  /**
   * Records a failure. The first one becomes the run's error.
   */
  fail: (error: StrataError) => void
  buildResult: () => RunResult
}

export function createExecutionContext(
  graph: TaskGraph,
  levels: readonly ExecutionLevel[]
): ExecutionContext {
  const taskStats = new Map<string, TaskStats>()

  for (const { level, taskIds } of levels) {
    for (const taskId of taskIds) {
      taskStats.set(taskId, {
        id: taskId,
        level,
        command: graph.getTask(taskId)?.command ?? "",
        status: "pending",
      })
    }
  }

  const context: ExecutionContext = {
    taskStats,
    startedAt: Date.now(),
    error: null,
    cacheChanged: false,

    updateTaskStatus(taskId, updates) {
      const current = taskStats.get(taskId)
      const updated: TaskStats = {
        id: taskId,
        level: 0,
        command: "",
        status: "pending",
        ...current,
        ...updates,
      }

      if (updated.startedAt !== undefined && updated.finishedAt !== undefined) {
        updated.durationMs = updated.finishedAt - updated.startedAt
      }

      taskStats.set(taskId, updated)
      return updated
    },

    fail(error) {
      context.error ??= error
    },

    buildResult() {
      const finishedAt = Date.now()
      const summary = {
        total: taskStats.size,
        completed: 0,
        failed: 0,
        skipped: 0,
        pending: 0,
      }

      for (const stats of taskStats.values()) {
        switch (stats.status) {
          case "completed":
            summary.completed++
            break
          case "failed":
            summary.failed++
            break
          case "skipped":
            summary.skipped++
            break
          case "pending":
            summary.pending++
            break
        }
      }

      const { error, cacheChanged } = context
      const stats: RunStats = {
        startedAt: context.startedAt,
        finishedAt,
        durationMs: finishedAt - context.startedAt,
        status: error ? "failed" : "success",
        tasks: [...taskStats.values()],
        summary,
      }

      if (error) {
        return { ok: false, error, cacheChanged, stats }
      }
      return { ok: true, error: null, cacheChanged, stats }
    },
  }

  return context
}
