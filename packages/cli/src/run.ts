import * as path from "node:path"
import type { ChalkInstance } from "chalk"
import {
  createTaskGraph,
  createTaskRunner,
  errorMessage,
  loadCache,
  resolveCachePath,
  saveCache,
} from "strata"
import type {
  ExecutionLevel,
  OutputSinkTargets,
  SpawnFunction,
  TaskGraph,
} from "strata"

import type { CliOptions } from "./cli.js"
import { parseTimeout } from "./config/duration.js"
import { loadConfig } from "./config/load-config.js"
import type { LoadedConfig } from "./config/load-config.js"
import { createConsoleReporter } from "./reporter.js"
import type { ConsoleReporter } from "./reporter.js"

export interface RunEnvironment {
  /**
   * Directory commands run in and relative paths resolve against.
   * @default process.cwd()
   */
  cwd?: string
  env?: NodeJS.ProcessEnv
  targets?: OutputSinkTargets
  colors?: ChalkInstance
  spawn?: SpawnFunction
}

/**
 * Loads the config, runs the selected tasks and persists the cache.
 * @returns the process exit code
 */
export async function runStrata(
  options: CliOptions,
  { cwd = process.cwd(), env = process.env, targets, colors, spawn }: RunEnvironment = {}
): Promise<number> {
  const reporter = createConsoleReporter({
    verbose: options.verbose,
    targets,
    colors,
  })

  try {
    return await execute(options, reporter, { cwd, env, spawn })
  } catch (error) {
    reporter.logger.error?.(errorMessage(error))
    return 1
  } finally {
    await reporter.flush()
  }
}

async function execute(
  options: CliOptions,
  reporter: ConsoleReporter,
  { cwd, env, spawn }: { cwd: string; env: NodeJS.ProcessEnv; spawn?: SpawnFunction }
): Promise<number> {
  const { logger } = reporter
  const config = loadConfig(path.resolve(cwd, options.file), { logger, env, cwd })

  const graph = createTaskGraph(config.tasks)
  graph.validate()

  const levels = graph.calculateDependencyLevels(selectTasks(graph, options.target ?? config.defaultTarget))

  if (options.verbose) {
    for (const { taskId, dependencyId } of graph.findOrderingOnlyDependencies()) {
      logger.info?.(`Task '${taskId}' depends on '${dependencyId}' for ordering only`)
    }
  }

  if (options.dryRun) {
    printPlan(reporter, graph, levels)
    return 0
  }

  const cacheFile = resolveCachePath(config.path, config.cacheDir)
  const cache = loadCache(cacheFile, logger)

  const runner = createTaskRunner(graph, {
    cache,
    cwd,
    workers: options.workers ?? config.workers,
    defaultTimeout: defaultTimeout(options, config, reporter),
    continueOnFailure: options.continueOnFailure,
    removeOutputs: options.rm,
    outputMode: options.output,
    output: reporter.output,
    spawn,
    logger,
    ...reporter.callbacks,
  })

  const result = await runner.run(levels)
  reporter.summarize(result)

  if (result.cacheChanged) {
    saveCache(cache, cacheFile, logger)
  } else if (options.verbose) {
    logger.info?.("No changes detected, cache not saved.")
  }

  if (!result.ok) {
    logger.error?.(result.error.message)
    return 1
  }
  return 0
}

/**
 * The target and its dependencies, or every task when there is no target.
 */
function selectTasks(graph: TaskGraph, target: string | undefined): string[] {
  if (target === undefined) return graph.sortTopologically()
  return graph.getRequiredTasks(target)
}

function defaultTimeout(
  options: CliOptions,
  config: LoadedConfig,
  { logger }: ConsoleReporter
): number | undefined {
  if (options.timeout !== undefined) return parseTimeout(options.timeout, logger)
  return config.defaultTimeout
}

function printPlan(
  reporter: ConsoleReporter,
  graph: TaskGraph,
  levels: ExecutionLevel[]
) {
  for (const { level, taskIds } of levels) {
    reporter.print(`Level ${level}:`)
    for (const taskId of taskIds) {
      reporter.print(`  ${taskId}: ${graph.getTask(taskId)?.command ?? ""}`)
    }
  }
}
