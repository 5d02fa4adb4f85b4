import { minimatch } from "minimatch"

import { StrataError } from "./errors.js"
import type {
  ExecutionLevel,
  OrderingOnlyDependency,
  Task,
  TaskGraph,
  TaskNode,
} from "./types.js"

/**
 * Creates a task graph. Nodes keep the order in which the tasks are given,
 * which is the order every traversal below falls back on.
 *
 * The graph is not validated on creation; call `validate()` before
 * running anything from it.
 */
export function createTaskGraph(tasks: readonly Task[]): TaskGraph {
  const nodes = new Map<string, TaskNode>()
  const duplicateIds: string[] = []

  for (const task of tasks) {
    if (nodes.has(task.id)) {
      duplicateIds.push(task.id)
      continue
    }
    nodes.set(task.id, {
      task,
      dependencies: new Set(),
      dependents: new Set(),
    })
  }

  // Edges to unknown tasks are left out; validate() reports them.
  for (const [taskId, node] of nodes) {
    for (const depId of node.task.dependencies) {
      const dep = nodes.get(depId)
      if (!dep || depId === taskId) continue
      node.dependencies.add(depId)
      dep.dependents.add(taskId)
    }
  }

  const aliases = new Map<string, string>()
  for (const [taskId, node] of nodes) {
    for (const alias of node.task.aliases) {
      if (!aliases.has(alias)) aliases.set(alias, taskId)
    }
  }

  const getNode = (taskId: string): TaskNode => {
    const node = nodes.get(taskId)
    if (!node) {
      throw new StrataError(
        `Task "${taskId}" not found`,
        StrataError.TaskNotFound,
        taskId
      )
    }
    return node
  }

  /** Subset of task ids in the given order, or every id in declaration order. */
  const selectIds = (taskIds?: Iterable<string>): string[] => {
    if (!taskIds) return [...nodes.keys()]
    const selected = new Set<string>()
    for (const taskId of taskIds) {
      getNode(taskId)
      selected.add(taskId)
    }
    return [...selected]
  }

  const validateTasks = (): void => {
    if (duplicateIds.length > 0) {
      throw new StrataError(
        `Duplicate task id "${duplicateIds[0]}"`,
        StrataError.Dependency,
        duplicateIds[0]
      )
    }

    for (const [taskId, node] of nodes) {
      for (const depId of node.task.dependencies) {
        if (depId === taskId) {
          throw new StrataError(
            `Task "${taskId}" cannot depend on itself`,
            StrataError.Dependency,
            taskId
          )
        }
        if (!nodes.has(depId)) {
          throw new StrataError(
            `Task "${taskId}" depends on "${depId}" which does not exist`,
            StrataError.Dependency,
            taskId
          )
        }
      }
    }
  }

  const validateAliases = (): void => {
    const owners = new Map<string, string>()
    for (const [taskId, node] of nodes) {
      for (const alias of node.task.aliases) {
        if (nodes.has(alias)) {
          throw new StrataError(
            `Alias "${alias}" of task "${taskId}" conflicts with the task id "${alias}"`,
            StrataError.Dependency,
            taskId
          )
        }
        const owner = owners.get(alias)
        if (owner !== undefined) {
          throw new StrataError(
            owner === taskId
              ? `Alias "${alias}" is declared twice by task "${taskId}"`
              : `Alias "${alias}" of task "${taskId}" is already used by task "${owner}"`,
            StrataError.Dependency,
            taskId
          )
        }
        owners.set(alias, taskId)
      }
    }
  }

  const detectCycles = (): void => {
    // nodes whose whole dependency subtree is known to be acyclic
    const cleared = new Set<string>()

    for (const startId of nodes.keys()) {
      if (cleared.has(startId)) continue

      const path: string[] = [startId]
      const onPath = new Set<string>([startId])
      const frames: { deps: string[]; next: number }[] = [
        { deps: [...getNode(startId).dependencies], next: 0 },
      ]

      while (frames.length > 0) {
        const frame = frames[frames.length - 1]

        if (frame.next >= frame.deps.length) {
          frames.pop()
          const done = path.pop()
          if (done !== undefined) {
            onPath.delete(done)
            cleared.add(done)
          }
          continue
        }

        const depId = frame.deps[frame.next++]
        if (onPath.has(depId)) {
          throw new StrataError(
            `Circular dependency detected: ${[...path, depId].join(" -> ")}`,
            StrataError.Dependency,
            depId
          )
        }
        if (cleared.has(depId)) continue

        path.push(depId)
        onPath.add(depId)
        frames.push({ deps: [...getNode(depId).dependencies], next: 0 })
      }
    }
  }

  const sortTopologically = (taskIds?: Iterable<string>): string[] => {
    const selected = new Set(selectIds(taskIds))
    const inDegree = new Map<string, number>()
    const queue: string[] = []

    // declaration order, not the order of the given ids
    for (const taskId of nodes.keys()) {
      if (!selected.has(taskId)) continue
      let degree = 0
      for (const depId of getNode(taskId).dependencies) {
        if (selected.has(depId)) degree++
      }
      inDegree.set(taskId, degree)
      if (degree === 0) queue.push(taskId)
    }

    const sorted: string[] = []
    for (let i = 0; i < queue.length; i++) {
      const taskId = queue[i]
      sorted.push(taskId)
      for (const dependentId of getNode(taskId).dependents) {
        const degree = inDegree.get(dependentId)
        if (degree === undefined) continue
        inDegree.set(dependentId, degree - 1)
        if (degree - 1 === 0) queue.push(dependentId)
      }
    }

    return sorted
  }

  const calculateDependencyLevels = (
    taskIds?: Iterable<string>
  ): ExecutionLevel[] => {
    const ordered = selectIds(taskIds)
    const selected = new Set(ordered)
    const levelOf = new Map<string, number>()

    for (const rootId of ordered) {
      if (levelOf.has(rootId)) continue

      const stack = [rootId]
      const onStack = new Set(stack)

      while (stack.length > 0) {
        const taskId = stack[stack.length - 1]
        let level = 0
        let pending = false

        for (const depId of getNode(taskId).dependencies) {
          if (!selected.has(depId)) continue
          const depLevel = levelOf.get(depId)
          if (depLevel !== undefined) {
            level = Math.max(level, depLevel + 1)
            continue
          }
          if (onStack.has(depId)) {
            throw new StrataError(
              `Circular dependency detected: ${[...stack, depId].join(" -> ")}`,
              StrataError.Dependency,
              depId
            )
          }
          stack.push(depId)
          onStack.add(depId)
          pending = true
          break
        }

        if (pending) continue

        levelOf.set(taskId, level)
        stack.pop()
        onStack.delete(taskId)
      }
    }

    const levels: ExecutionLevel[] = []
    for (const taskId of ordered) {
      const level = levelOf.get(taskId) ?? 0
      while (levels.length <= level) {
        levels.push({ level: levels.length, taskIds: [] })
      }
      levels[level].taskIds.push(taskId)
    }

    return levels
  }

  const resolve = (target: string): string => {
    if (nodes.has(target)) return target
    const taskId = aliases.get(target)
    if (taskId === undefined) {
      throw new StrataError(
        `Task or alias "${target}" not found`,
        StrataError.TaskNotFound
      )
    }
    return taskId
  }

  return {
    nodes,
    validate() {
      validateTasks()
      validateAliases()
      detectCycles()
    },
    resolve,
    getTask(taskId) {
      return nodes.get(taskId)?.task
    },
    sortTopologically,
    getRequiredTasks(target) {
      const rootId = resolve(target)
      const required = new Set<string>([rootId])
      const queue = [rootId]

      for (let i = 0; i < queue.length; i++) {
        for (const depId of getNode(queue[i]).dependencies) {
          if (required.has(depId)) continue
          required.add(depId)
          queue.push(depId)
        }
      }

      return sortTopologically(required)
    },
    calculateDependencyLevels,
    findOrderingOnlyDependencies() {
      const result: OrderingOnlyDependency[] = []
      for (const [taskId, node] of nodes) {
        for (const depId of node.dependencies) {
          const dep = getNode(depId).task
          if (!sharesFiles(dep.outputs, node.task.inputs)) {
            result.push({ taskId, dependencyId: depId })
          }
        }
      }
      return result
    },
  }
}

function sharesFiles(
  outputs: readonly string[],
  inputs: readonly string[]
): boolean {
  return outputs.some((output) =>
    inputs.some((input) => outputMatchesInput(output, input))
  )
}

function outputMatchesInput(output: string, input: string): boolean {
  if (output === input) return true
  if (minimatch(output, input, { dot: true })) return true
  const globstar = input.indexOf("**")
  return globstar > 0 && output.startsWith(input.slice(0, globstar))
}
