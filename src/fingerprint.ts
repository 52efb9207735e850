import { createHash } from "crypto"
import { Fingerprint } from "./data"

// --------------------  fingerprints  --------------------
/**
 * Hashes an ordered identifier list into a cache key. Identifiers are length
 * prefixed, so `["ab", "c"]` and `["a", "bc"]` never collide.
 */
export function fingerprint(identifiers: readonly string[]): Fingerprint {
  const hash = createHash("md5")

  identifiers.forEach(id => hash.update(`${id.length}:${id}`))

  return hash.digest("hex")
}
export function hashContent(content: string): string {
  return createHash("md5").update(content).digest("hex")
}

export const EMPTY_FINGERPRINT: Fingerprint = fingerprint([])
