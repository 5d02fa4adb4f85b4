import { StrataError, errorMessage } from "strata"
import type { Logger } from "strata"

const UNIT_MS = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
} as const

type Unit = keyof typeof UNIT_MS

const COMPONENT = /(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)/y

function isUnit(value: string): value is Unit {
  return value in UNIT_MS
}

/**
 * Parses durations such as `250ms`, `30s`, `5m` or `1h30m` into
 * milliseconds. `"0"` and the empty string mean no duration.
 * @throws StrataError with code `config` on anything else
 */
export function parseDuration(text: string): number | undefined {
  const trimmed = text.trim()
  if (trimmed === "" || trimmed === "0") return undefined

  let total = 0
  let index = 0

  while (index < trimmed.length) {
    COMPONENT.lastIndex = index
    const match = COMPONENT.exec(trimmed)
    const amount = match?.[1]
    const unit = match?.[2]
    if (amount === undefined || unit === undefined || !isUnit(unit)) {
      throw new StrataError(
        `Invalid duration "${text}": use a format like 5m, 30s or 1h30m`,
        StrataError.Config
      )
    }
    total += Number(amount) * UNIT_MS[unit]
    index = COMPONENT.lastIndex
    while (trimmed[index] === " ") index++
  }

  // "0s" and the like also mean no timeout
  return total > 0 ? Math.round(total) : undefined
}

/**
 * Like `parseDuration`, but an invalid value only logs a warning and means
 * no timeout.
 */
export function parseTimeout(
  text: string | undefined,
  logger?: Logger
): number | undefined {
  if (text === undefined) return undefined
  try {
    return parseDuration(text)
  } catch (error) {
    logger?.warn?.(errorMessage(error))
    return undefined
  }
}
