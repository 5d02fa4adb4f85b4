import { EventEmitter } from "node:events"
import { PassThrough } from "node:stream"
import { mkdtempSync, mkdirSync, rmSync, utimesSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import * as path from "node:path"

import type {
  Logger,
  OutputSink,
  OutputStream,
  SpawnFunction,
  SpawnedProcess,
} from "../types.js"

// Test helpers

export class FakeChildProcess extends EventEmitter implements SpawnedProcess {
  readonly pid = undefined
  readonly stdout = new PassThrough()
  readonly stderr = new PassThrough()
  readonly signals: (NodeJS.Signals | number | undefined)[] = []
  private done = false

  constructor(readonly command: string) {
    super()
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal)
    this.finish(null, { signal: "SIGTERM" })
    return true
  }

  /**
   * Writes the given output, then emits "exit" and "close".
   */
  finish(
    exitCode: number | null,
    {
      stdout = "",
      stderr = "",
      signal = null,
    }: { stdout?: string; stderr?: string; signal?: NodeJS.Signals | null } = {}
  ): void {
    if (this.done) return
    this.done = true
    if (stdout) this.stdout.write(stdout)
    if (stderr) this.stderr.write(stderr)
    setImmediate(() => {
      this.stdout.end()
      this.stderr.end()
      this.emit("exit", exitCode, signal)
      this.emit("close", exitCode, signal)
    })
  }
}

/**
 * A spawn stand-in. The handler decides when and how each process ends;
 * the command is the string handed to the shell.
 */
export function createFakeSpawn(
  handler: (child: FakeChildProcess) => void = (child) => child.finish(0)
): { spawn: SpawnFunction; spawned: FakeChildProcess[] } {
  const spawned: FakeChildProcess[] = []
  const spawn: SpawnFunction = (_cmd, args) => {
    const child = new FakeChildProcess(args[args.length - 1] ?? "")
    spawned.push(child)
    handler(child)
    return child
  }
  return { spawn, spawned }
}

/**
 * An output sink that records every write in order.
 */
export function createMemorySink(): OutputSink & {
  writes: { stream: OutputStream | "block"; text: string }[]
} {
  const writes: { stream: OutputStream | "block"; text: string }[] = []
  const text = (chunk: Uint8Array | string) =>
    typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8")

  return {
    writes,
    async write(stream, chunk) {
      writes.push({ stream, text: text(chunk) })
    },
    async writeBlock(stdout, stderr) {
      writes.push({ stream: "block", text: text(stdout) + text(stderr) })
    },
  }
}

export function createRecordingLogger(): Required<Logger> & {
  messages: { level: keyof Logger; message: string }[]
} {
  const messages: { level: keyof Logger; message: string }[] = []
  return {
    messages,
    debug: (message) => messages.push({ level: "debug", message }),
    info: (message) => messages.push({ level: "info", message }),
    warn: (message) => messages.push({ level: "warn", message }),
    error: (message) => messages.push({ level: "error", message }),
  }
}

export interface TempDir {
  dir: string
  write(file: string, content: string): string
  touch(file: string, seconds: number): void
  remove(): void
}

export function createTempDir(): TempDir {
  const dir = mkdtempSync(path.join(tmpdir(), "strata-test-"))
  return {
    dir,
    write(file, content) {
      const full = path.join(dir, file)
      mkdirSync(path.dirname(full), { recursive: true })
      writeFileSync(full, content)
      return full
    },
    // Sets both atime and mtime to the given epoch seconds.
    touch(file, seconds) {
      utimesSync(path.join(dir, file), seconds, seconds)
    },
    remove() {
      rmSync(dir, { recursive: true, force: true })
    },
  }
}

/**
 * A shell command that runs a snippet of JavaScript with this Node binary.
 * The snippet must not contain double quotes.
 */
export function nodeCommand(script: string): string {
  return `"${process.execPath}" -e "${script}"`
}
