import { StrataError } from "./errors.js"
import type { Task, TaskConfig } from "./types.js"

/**
 * Creates a task.
 * @param config - The configuration for the task.
 * @returns A frozen task record.
 * @example
 * const lint = task({ id: "lint", command: "eslint src", inputs: ["src/**\/*.ts"] })
 * const build = task({
 *   id: "build",
 *   command: "tsc -p .",
 *   dependencies: ["lint"],
 *   inputs: ["src/**\/*.ts"],
 *   outputs: ["dist/index.js"],
 * })
 * createTaskGraph([lint, build]).validate()
 */
export function task(config: TaskConfig): Task {
  const {
    id,
    command,
    dependencies = [],
    aliases = [],
    inputs = [],
    outputs = [],
    autoRemove = false,
    timeout,
  } = config

  if (typeof id !== "string" || id.length === 0) {
    throw new StrataError(
      "Task id must be a non-empty string",
      StrataError.InvalidTask
    )
  }

  if (typeof command !== "string") {
    throw new StrataError(
      `Task "${id}" must have a command string`,
      StrataError.InvalidTask,
      id
    )
  }

  if (timeout !== undefined && !(Number.isFinite(timeout) && timeout > 0)) {
    throw new StrataError(
      `Task "${id}" has an invalid timeout: ${timeout}`,
      StrataError.InvalidTask,
      id
    )
  }

  const result: Task = {
    id,
    command,
    dependencies: Object.freeze(dedupe(dependencies, id)),
    // duplicate aliases are kept so that validate() can report them
    aliases: Object.freeze(stringList(aliases, id, "aliases")),
    inputs: Object.freeze(filterPatterns(inputs, id, "inputs")),
    outputs: Object.freeze(filterPatterns(outputs, id, "outputs")),
    autoRemove,
    ...(timeout !== undefined ? { timeout } : {}),
  }

  return Object.freeze(result)
}

function dedupe(values: readonly string[], taskId: string): string[] {
  return [...new Set(stringList(values, taskId, "dependencies"))]
}

function filterPatterns(
  values: readonly string[],
  taskId: string,
  field: "inputs" | "outputs"
): string[] {
  return stringList(values, taskId, field).filter((value) => value.length > 0)
}

function stringList(
  values: readonly unknown[],
  taskId: string,
  field: string
): string[] {
  const result: string[] = []
  if (Array.isArray(values)) {
    for (const value of values) {
      if (typeof value !== "string") break
      result.push(value)
    }
  }
  if (!Array.isArray(values) || result.length !== values.length) {
    throw new StrataError(
      `Task "${taskId}" has an invalid ${field} list: expected strings`,
      StrataError.InvalidTask,
      taskId
    )
  }
  return result
}
