import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import * as path from "node:path"
import { Writable } from "node:stream"
import type { Logger } from "strata"

export interface CapturedStream {
  stream: Writable
  text(): string
  lines(): string[]
}

export function captureStream(): CapturedStream {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"))
      callback()
    },
  })
  const text = () => chunks.join("")
  return {
    stream,
    text,
    lines: () => text().split("\n").filter((line) => line.length > 0),
  }
}

export function createRecordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = []
  return {
    warnings,
    warn: (message) => warnings.push(message),
  }
}

export interface TempDir {
  dir: string
  write(file: string, content: string): string
  remove(): void
}

export function createTempDir(): TempDir {
  const dir = mkdtempSync(path.join(tmpdir(), "strata-cli-test-"))
  return {
    dir,
    write(file, content) {
      const full = path.join(dir, file)
      mkdirSync(path.dirname(full), { recursive: true })
      writeFileSync(full, content)
      return full
    },
    remove() {
      rmSync(dir, { recursive: true, force: true })
    },
  }
}

/**
 * A shell command running a snippet of JavaScript with this Node binary.
 * The snippet must not contain double quotes.
 */
export function nodeCommand(script: string): string {
  return `"${process.execPath}" -e "${script}"`
}
