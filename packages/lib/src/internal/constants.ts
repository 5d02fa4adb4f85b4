export const CACHE_VERSION = 1
export const CACHE_DIR = ".strata"
export const CACHE_FILENAME = "cache.json"

/** SHA-256 of the empty byte sequence. */
export const EMPTY_FINGERPRINT =
  "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
