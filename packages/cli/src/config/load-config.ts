import * as fs from "node:fs"
import * as path from "node:path"
import { parse as parseToml } from "smol-toml"
import { parse as parseYaml } from "yaml"
import type { ZodIssue } from "zod"
import { StrataError, errorMessage, task } from "strata"
import type { Logger, Task } from "strata"

import { parseTimeout } from "./duration.js"
import { ConfigFileSchema, type ConfigFile, type TaskEntry } from "./schema.js"
import { buildVariables, substituteVariables } from "./variables.js"

export interface LoadedConfig {
  /**
   * Absolute path of the file the config was read from.
   */
  path: string
  /**
   * Tasks in declaration order.
   */
  tasks: Task[]
  defaultTarget?: string
  cacheDir?: string
  workers?: number
  /**
   * Default timeout in milliseconds.
   */
  defaultTimeout?: number
}

export interface LoadConfigOptions {
  logger?: Logger
  env?: NodeJS.ProcessEnv
  /**
   * Value of the built-in `PWD` variable.
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * Reads a TOML, YAML or JSON config file (by extension, TOML otherwise) and
 * turns it into tasks with variables substituted.
 * @throws StrataError with code `config`
 */
export function loadConfig(
  configPath: string,
  { logger, env, cwd }: LoadConfigOptions = {}
): LoadedConfig {
  const absolutePath = path.resolve(configPath)

  let raw: string
  try {
    raw = fs.readFileSync(absolutePath, "utf8")
  } catch (error) {
    throw new StrataError(
      `Failed to read config file "${configPath}": ${errorMessage(error)}`,
      StrataError.Config,
      undefined,
      { cause: error }
    )
  }

  const document = parseDocument(raw, configPath)
  const result = ConfigFileSchema.safeParse(document)
  if (!result.success) {
    throw new StrataError(
      `Invalid config file "${configPath}":\n${formatIssues(result.error.issues)}`,
      StrataError.Config
    )
  }

  return {
    path: absolutePath,
    ...toLoadedConfig(result.data, { logger, env, cwd }),
  }
}

function parseDocument(raw: string, file: string): unknown {
  const extension = path.extname(file).toLowerCase()
  try {
    switch (extension) {
      case ".json":
        return JSON.parse(raw)
      case ".yaml":
      case ".yml":
        return parseYaml(raw)
      default:
        return parseToml(raw)
    }
  } catch (error) {
    throw new StrataError(
      `Failed to parse config file "${file}": ${errorMessage(error)}`,
      StrataError.Config,
      undefined,
      { cause: error }
    )
  }
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>"
      if (issue.code === "invalid_type") {
        return `  ${location}: expected ${issue.expected}, received ${issue.received}`
      }
      return `  ${location}: ${issue.message}`
    })
    .join("\n")
}

function toLoadedConfig(
  config: ConfigFile,
  { logger, env, cwd }: LoadConfigOptions
): Omit<LoadedConfig, "path"> {
  const variables = buildVariables(config.variables, { env, cwd })
  const tasks = Object.entries(config.task).map(([key, entry]) =>
    toTask(key, entry, variables, logger)
  )
  const { default: defaultTarget, cache_dir, workers, default_timeout } =
    config.config

  return {
    tasks,
    defaultTarget,
    cacheDir: cache_dir,
    workers,
    defaultTimeout: parseTimeout(default_timeout, logger),
  }
}

function toTask(
  key: string,
  entry: TaskEntry,
  variables: ReadonlyMap<string, string>,
  logger?: Logger
): Task {
  const substitute = (text: string) => substituteVariables(text, variables)
  const id = entry.id || key

  try {
    return task({
      id,
      command: substitute(entry.command),
      dependencies: entry.dependencies,
      aliases: entry.aliases,
      inputs: entry.inputs.map(substitute),
      outputs: entry.outputs.map(substitute),
      autoRemove: entry.auto_remove,
      timeout: parseTimeout(entry.timeout, logger),
    })
  } catch (error) {
    throw new StrataError(
      `Invalid task "${key}": ${errorMessage(error)}`,
      StrataError.Config,
      id,
      { cause: error }
    )
  }
}
