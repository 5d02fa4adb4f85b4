import { errorMessage } from "../errors.js"
import { modifiedTime, resolvePatterns } from "./file-resolver.js"
import { fingerprintFiles } from "./fingerprint.js"
import type {
  ChangeDecision,
  ChangeReason,
  FingerprintCache,
  Logger,
  Task,
} from "../types.js"

export interface ChangeDetectorOptions {
  cwd: string
  cache: FingerprintCache
  logger?: Logger
  strict?: boolean
}

export interface ChangeDetector {
  shouldRun(task: Task): Promise<ChangeDecision>
}

/**
 * Decides whether a task is stale. Rules are checked in order and the first
 * one that asks for a run wins:
 * 1. no inputs
 * 2. an output pattern matches nothing
 * 3. an input is newer than the oldest output (only with outputs declared)
 * 4. the inputs' fingerprint is not cached
 */
export function createChangeDetector({
  cwd,
  cache,
  logger,
  strict,
}: ChangeDetectorOptions): ChangeDetector {
  const resolveOptions = { cwd, logger }

  const check = async (task: Task): Promise<ChangeDecision> => {
    if (task.inputs.length === 0) {
      return { run: true, reason: "no-inputs" }
    }

    const outputs: string[] = []
    for (const pattern of task.outputs) {
      const resolved = await resolvePatterns([pattern], resolveOptions)
      if (resolved.length === 0) {
        return { run: true, reason: "missing-outputs" }
      }
      outputs.push(...resolved)
    }

    const inputs = await resolvePatterns(task.inputs, resolveOptions)

    if (task.outputs.length > 0) {
      const newestInput = await modifiedTime(inputs, "max", resolveOptions)
      const oldestOutput = await modifiedTime(outputs, "min", resolveOptions)
      if (newestInput === undefined || oldestOutput === undefined) {
        return { run: true, reason: "timestamps-unavailable" }
      }
      if (newestInput > oldestOutput) {
        return { run: true, reason: "outdated-outputs" }
      }
    }

    const fingerprint = await fingerprintFiles(inputs, {
      ...resolveOptions,
      strict,
    })
    if (!cache.has(fingerprint)) {
      return { run: true, reason: "inputs-changed", fingerprint }
    }

    return { run: false, reason: "up-to-date", fingerprint }
  }

  return {
    async shouldRun(task) {
      try {
        return await check(task)
      } catch (error) {
        logger?.warn?.(
          `Could not check inputs of task "${task.id}": ${errorMessage(error)}`
        )
        return { run: true, reason: "check-failed" }
      }
    },
  }
}

const DESCRIPTIONS: Record<ChangeReason, string> = {
  "no-inputs": "no inputs, always runs",
  "missing-outputs": "outputs missing, must run",
  "outdated-outputs": "outputs older than inputs, must run",
  "timestamps-unavailable": "timestamps unavailable, must run",
  "inputs-changed": "input content changed, must run",
  "check-failed": "inputs could not be checked, must run",
  "up-to-date": "up to date, skipping",
}

export function describeChange(reason: ChangeReason): string {
  return DESCRIPTIONS[reason]
}
