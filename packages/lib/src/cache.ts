import * as fs from "node:fs"
import * as path from "node:path"

import { CACHE_DIR, CACHE_FILENAME, CACHE_VERSION } from "./internal/constants.js"
import { errorMessage } from "./errors.js"
import type { FingerprintCache, Logger } from "./types.js"

interface CacheFile {
  version: number
  fingerprints: string[]
}

/**
 * Creates an in-memory set of fingerprints of successful task runs.
 */
export function createFingerprintCache(
  fingerprints: Iterable<string> = []
): FingerprintCache {
  const entries = new Set(fingerprints)

  return {
    has(fingerprint) {
      return entries.has(fingerprint)
    },
    add(fingerprint) {
      if (entries.has(fingerprint)) return false
      entries.add(fingerprint)
      return true
    },
    get size() {
      return entries.size
    },
    values() {
      return [...entries]
    },
  }
}

/**
 * Location of the cache file for a config file. A relative `cacheDir` is
 * taken from the config file's directory.
 */
export function resolveCachePath(
  configPath: string,
  cacheDir: string = CACHE_DIR
): string {
  const configDir = path.dirname(path.resolve(configPath))
  return path.join(path.resolve(configDir, cacheDir), CACHE_FILENAME)
}

/**
 * Loads a persisted cache. A missing, unreadable or incompatible file gives
 * an empty cache.
 */
export function loadCache(cacheFile: string, logger?: Logger): FingerprintCache {
  if (!fs.existsSync(cacheFile)) {
    return createFingerprintCache()
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(cacheFile, "utf8"))
    if (!isCacheFile(parsed)) {
      logger?.warn?.(`Ignoring cache file "${cacheFile}": unsupported format`)
      return createFingerprintCache()
    }
    return createFingerprintCache(parsed.fingerprints)
  } catch (error) {
    logger?.warn?.(`Ignoring cache file "${cacheFile}": ${errorMessage(error)}`)
    return createFingerprintCache()
  }
}

/**
 * Writes the cache next to a temporary file and renames it into place.
 * @returns false if the cache could not be written
 */
export function saveCache(
  cache: FingerprintCache,
  cacheFile: string,
  logger?: Logger
): boolean {
  const snapshot: CacheFile = {
    version: CACHE_VERSION,
    fingerprints: cache.values().sort(),
  }
  const tmpFile = `${cacheFile}.tmp-${process.pid}-${Date.now()}`

  try {
    fs.mkdirSync(path.dirname(cacheFile), { recursive: true })
    fs.writeFileSync(tmpFile, JSON.stringify(snapshot, null, 2), "utf8")
    fs.renameSync(tmpFile, cacheFile)
    return true
  } catch (error) {
    logger?.warn?.(`Failed to save cache to "${cacheFile}": ${errorMessage(error)}`)
    removeTempFile(tmpFile, logger)
    return false
  }
}

function removeTempFile(tmpFile: string, logger?: Logger) {
  try {
    if (fs.existsSync(tmpFile)) fs.rmSync(tmpFile)
  } catch (error) {
    logger?.warn?.(`Failed to remove "${tmpFile}": ${errorMessage(error)}`)
  }
}

function isCacheFile(value: unknown): value is CacheFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "version" in value &&
    value.version === CACHE_VERSION &&
    "fingerprints" in value &&
    Array.isArray(value.fingerprints) &&
    value.fingerprints.every((entry: unknown) => typeof entry === "string")
  )
}
