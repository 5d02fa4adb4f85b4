import * as path from "node:path"
import { readFile } from "node:fs/promises"
import { createHash } from "node:crypto"

import { StrataError, errorMessage } from "../errors.js"
import { resolvePatterns, type ResolveOptions } from "./file-resolver.js"

export interface FingerprintOptions extends ResolveOptions {
  /**
   * Throw on an unreadable file instead of leaving it out.
   */
  strict?: boolean
}

/**
 * Resolves the patterns and fingerprints the resulting files.
 */
export async function computeFingerprint(
  patterns: readonly string[],
  options: FingerprintOptions
): Promise<string> {
  return fingerprintFiles(await resolvePatterns(patterns, options), options)
}

/**
 * Content-addressed digest of a set of files: each file is hashed together
 * with its path, then the per-file digests are hashed in path order. The
 * same contents at the same paths always give the same fingerprint,
 * whatever order the paths come in.
 */
export async function fingerprintFiles(
  files: readonly string[],
  { cwd, logger, strict = false }: FingerprintOptions
): Promise<string> {
  const combined = createHash("sha256")

  for (const file of [...files].sort()) {
    let content: Buffer
    try {
      content = await readFile(path.resolve(cwd, file))
    } catch (error) {
      if (strict) {
        throw new StrataError(
          `Failed to read input "${file}": ${errorMessage(error)}`,
          StrataError.File,
          undefined,
          { cause: error }
        )
      }
      logger?.warn?.(`Skipping unreadable input "${file}": ${errorMessage(error)}`)
      continue
    }

    const hash = createHash("sha256")
    hash.update(`${Buffer.byteLength(file)}:${file}`)
    hash.update(content)
    combined.update(hash.digest())
  }

  return combined.digest("hex")
}
