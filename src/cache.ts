import { resolve } from "path"
import { getLogger } from "@logtape/logtape"
import {
  BundleCache,
  BundleCacheEntry,
  EvictListener,
  EvictionReason,
  Fingerprint,
} from "./data"

// --------------------  constants  --------------------
const logger = getLogger(["assetpress", "cache"])

// --------------------  cache  --------------------
export type BundleCacheOptions = {
  /** `0` keeps every entry */
  maxEntries?: number
  now?: () => number
  onEvict?: EvictListener
}

/**
 * In-memory bundle store. Every entry remembers the files it was built from;
 * a change to any of them removes the entry through `invalidateByPath`.
 */
export function createBundleCache({
  maxEntries = 0,
  now = Date.now,
  onEvict,
}: BundleCacheOptions = {}): BundleCache {
  const entries = new Map<Fingerprint, BundleCacheEntry>()
  const dependents = new Map<string, Set<Fingerprint>>()

  function remove(fingerprint: Fingerprint, reason: EvictionReason): boolean {
    const entry = entries.get(fingerprint)

    if (entry === undefined) return false

    entries.delete(fingerprint)
    entry.dependencies.forEach(path => {
      const keys = dependents.get(path)

      keys?.delete(fingerprint)
      if (keys?.size === 0) dependents.delete(path)
    })
    logger.debug("Evicted {fingerprint} ({reason})", { fingerprint, reason })
    onEvict?.(entry, reason)

    return true
  }
  function isExpired(entry: BundleCacheEntry): boolean {
    return entry.expiresAt !== null && entry.expiresAt <= now()
  }
  function enforceCapacity(): void {
    if (maxEntries <= 0) return

    // Map iteration is insertion order, oldest first
    for (const priority of ["default", "notRemovable"] as const) {
      for (const entry of Array.from(entries.values())) {
        if (entries.size <= maxEntries) return
        if (entry.priority === priority) remove(entry.fingerprint, "capacity")
      }
    }
  }

  return {
    get: fingerprint => {
      const entry = entries.get(fingerprint)

      if (entry === undefined) return undefined
      if (isExpired(entry)) {
        remove(fingerprint, "expired")
        return undefined
      }

      return entry
    },
    put: (fingerprint, content, dependencies, { expiry, priority = "default" }) => {
      remove(fingerprint, "replaced")

      const createdAt = now()
      const expiresAt = expiry.type === "absolute" ? createdAt + expiry.ttlMs : null

      if (expiresAt !== null && expiresAt <= createdAt) return undefined

      const paths = new Set(Array.from(dependencies, path => resolve(path)))
      const entry: BundleCacheEntry = {
        fingerprint,
        content,
        dependencies: paths,
        createdAt,
        expiresAt,
        priority,
      }

      entries.set(fingerprint, entry)
      paths.forEach(path => {
        const keys = dependents.get(path) ?? new Set<Fingerprint>()

        keys.add(fingerprint)
        dependents.set(path, keys)
      })
      enforceCapacity()

      return entry
    },
    invalidateByPath: path => {
      const keys = Array.from(dependents.get(resolve(path)) ?? [])

      return keys.filter(key => remove(key, "invalidated"))
    },
    clear: () => {
      Array.from(entries.keys()).forEach(key => remove(key, "cleared"))
    },
    prune: () =>
      Array.from(entries.values())
        .filter(isExpired)
        .map(entry => entry.fingerprint)
        .filter(key => remove(key, "expired")),
    size: () => entries.size,
    tracks: path => dependents.has(resolve(path)),
  }
}
