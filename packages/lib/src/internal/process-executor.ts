import { spawn as nodeSpawn } from "node:child_process"

import { StrataError, errorMessage } from "../errors.js"
import { shellCommand, terminateProcessTree } from "./util.js"
import type {
  ExitOutcome,
  Logger,
  OutputSink,
  OutputStream,
  SpawnFunction,
  SpawnedProcess,
} from "../types.js"

export interface RunCommandOptions {
  cwd: string
  env?: Record<string, string>
  /**
   * Milliseconds before the process tree is terminated.
   */
  timeout?: number
  /**
   * Write output to `output` as it arrives, in addition to buffering it.
   */
  stream?: boolean
  output?: OutputSink
  spawn?: SpawnFunction
  logger?: Logger
}

/**
 * Runs a command through the platform shell and waits for it to finish.
 * Never rejects: spawn failures come back as an `error` outcome.
 */
export function runCommand(
  command: string,
  {
    cwd,
    env,
    timeout,
    stream = false,
    output,
    spawn = nodeSpawn,
    logger,
  }: RunCommandOptions
): Promise<ExitOutcome> {
  const startedAt = Date.now()
  const elapsed = () => Date.now() - startedAt
  const { cmd, args } = shellCommand(command)

  const spawnError = (error: unknown): ExitOutcome => ({
    kind: "error",
    error: new StrataError(
      `Failed to start command "${command}": ${errorMessage(error)}`,
      StrataError.CommandIo,
      undefined,
      { cause: error }
    ),
    durationMs: elapsed(),
  })

  let child: SpawnedProcess
  try {
    child = spawn(cmd, args, {
      cwd,
      env: { ...process.env, ...env },
      stdio: ["ignore", "pipe", "pipe"],
    })
  } catch (error) {
    return Promise.resolve(spawnError(error))
  }

  return new Promise((resolve) => {
    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    const writes: Promise<void>[] = []
    let settled = false
    let exited = false
    let timedOut = false
    let timer: NodeJS.Timeout | undefined
    let exitStatus:
      | { exitCode: number | null; signal: NodeJS.Signals | null }
      | undefined

    const collect =
      (name: OutputStream, chunks: Buffer[]) => (chunk: Buffer | string) => {
        const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk
        chunks.push(buffer)
        if (stream && output) {
          writes.push(
            output.write(name, buffer).catch((error: unknown) => {
              logger?.warn?.(`Failed to write ${name}: ${errorMessage(error)}`)
            })
          )
        }
      }

    child.stdout?.on("data", collect("stdout", stdout))
    child.stderr?.on("data", collect("stderr", stderr))

    const finish = (outcome: ExitOutcome) => {
      if (settled) return
      settled = true
      if (timer) clearTimeout(timer)
      // streamed chunks must reach the sink before the caller moves on
      Promise.all(writes).then(
        () => resolve(outcome),
        () => resolve(outcome)
      )
    }

    const timeoutOutcome = (timeoutMs: number): ExitOutcome => ({
      kind: "timeout",
      timeoutMs,
      stdout: Buffer.concat(stdout),
      stderr: Buffer.concat(stderr),
      durationMs: elapsed(),
    })

    // Orphaned grandchildren can hold the pipes open long after the
    // shell has gone; after a timeout the exit is what counts.
    const abandonPipes = () => {
      child.stdout?.destroy()
      child.stderr?.destroy()
    }

    child.on("error", (error: unknown) => {
      // after a timeout this comes from a failed kill, not from spawning
      if (timedOut) {
        logger?.warn?.(
          `Failed to terminate command "${command}": ${errorMessage(error)}`
        )
        return
      }
      finish(spawnError(error))
    })

    child.on(
      "exit",
      (exitCode: number | null, signal: NodeJS.Signals | null) => {
        exited = true
        if (timedOut && timeout !== undefined) {
          abandonPipes()
          finish(timeoutOutcome(timeout))
          return
        }
        // finished in time; background children may still hold the pipes
        if (timer) clearTimeout(timer)
        exitStatus = { exitCode, signal }
      }
    )

    child.on(
      "close",
      (exitCode: number | null, signal: NodeJS.Signals | null) => {
        if (timedOut && timeout !== undefined) {
          finish(timeoutOutcome(timeout))
          return
        }
        finish({
          kind: "exited",
          exitCode: exitStatus ? exitStatus.exitCode : exitCode,
          signal: exitStatus ? exitStatus.signal : signal,
          stdout: Buffer.concat(stdout),
          stderr: Buffer.concat(stderr),
          durationMs: elapsed(),
        })
      }
    )

    if (timeout !== undefined) {
      timer = setTimeout(() => {
        timedOut = true
        logger?.debug?.(`Command "${command}" timed out after ${timeout}ms`)
        if (exited) {
          abandonPipes()
          finish(timeoutOutcome(timeout))
          return
        }
        terminateProcessTree(child, logger)
      }, timeout)
    }
  })
}

/**
 * Whether an outcome counts as a successful run.
 */
export function isSuccess(outcome: ExitOutcome): boolean {
  return (
    outcome.kind === "exited" &&
    outcome.exitCode === 0 &&
    outcome.signal === null
  )
}
