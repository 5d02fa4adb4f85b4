import type { Writable } from "node:stream"
import pLimit from "p-limit"

import type { OutputSink } from "../types.js"

export interface OutputSinkTargets {
  stdout: Writable
  stderr: Writable
}

/**
 * Creates an output sink over two writable streams. Writes are queued
 * behind a single lock, so a grouped block is never split by another task's
 * chunk.
 */
export function createOutputSink(
  targets: OutputSinkTargets = {
    stdout: process.stdout,
    stderr: process.stderr,
  }
): OutputSink {
  const lock = pLimit(1)

  return {
    write(stream, chunk) {
      return lock(() => writeTo(targets[stream], chunk))
    },
    writeBlock(stdout, stderr) {
      return lock(async () => {
        if (stdout.length > 0) await writeTo(targets.stdout, stdout)
        if (stderr.length > 0) await writeTo(targets.stderr, stderr)
      })
    },
  }
}

function writeTo(target: Writable, chunk: Uint8Array | string): Promise<void> {
  return new Promise((resolve, reject) => {
    target.write(chunk, (error) => {
      if (error) reject(error)
      else resolve()
    })
  })
}
