import { spawn } from "node:child_process"
import { platform } from "node:os"

import { errorMessage } from "../errors.js"
import type { Logger, SpawnedProcess } from "../types.js"

/**
 * The platform shell invocation for a command string.
 */
export function shellCommand(command: string): { cmd: string; args: string[] } {
  if (platform() === "win32") {
    return {
      cmd: process.env.ComSpec || "cmd.exe",
      args: ["/d", "/s", "/c", command],
    }
  }
  return { cmd: "sh", args: ["-c", command] }
}

/**
 * Sends SIGTERM to a shell and the processes it started. The shell alone
 * is not enough: a command like `sleep 10` runs as its child.
 * Failures are logged, never thrown.
 */
export function terminateProcessTree(
  child: SpawnedProcess,
  logger?: Logger
): void {
  const pid = child.pid
  const warn = (error: unknown) =>
    logger?.warn?.(`Failed to terminate process ${pid ?? "?"}: ${errorMessage(error)}`)

  if (pid === undefined) {
    sendTerm(child, warn)
    return
  }

  if (platform() === "win32") {
    const taskkill = spawn("taskkill", ["/PID", pid.toString(), "/T", "/F"], {
      stdio: "ignore",
    })
    taskkill.on("error", (error) => {
      warn(error)
      sendTerm(child, warn)
    })
    return
  }

  const pkill = spawn("pkill", ["-P", pid.toString(), "-TERM"], {
    stdio: "ignore",
  })
  // pkill missing: the shell still gets its signal below
  pkill.on("error", (error) => logger?.debug?.(`pkill unavailable: ${errorMessage(error)}`))
  sendTerm(child, warn)
}

function sendTerm(
  child: SpawnedProcess,
  onError: (error: unknown) => void
): void {
  try {
    child.kill("SIGTERM")
  } catch (error) {
    onError(error)
  }
}
