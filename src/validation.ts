import { stat } from "fs/promises"
import { BuildOutput, ConditionalHeaders, Validators } from "./data"
import { hashContent } from "./fingerprint"
import { ignoreMissing } from "./tools"

// --------------------  validators  --------------------
// ETag over the final bytes, Last-Modified from the newest dependency
export async function createValidators({
  content,
  dependencies,
}: BuildOutput): Promise<Validators> {
  const times = await Promise.all(
    Array.from(dependencies, async path => {
      const stats = await stat(path).catch(ignoreMissing)

      return stats === null ? 0 : stats.mtimeMs
    })
  )
  const newest = Math.max(0, ...times)

  return {
    etag: `"${hashContent(content)}"`,
    // http dates carry whole seconds
    lastModified: newest > 0 ? new Date(Math.floor(newest / 1000) * 1000) : null,
  }
}

export function isNotModified(
  { ifNoneMatch, ifModifiedSince }: ConditionalHeaders,
  { etag, lastModified }: Validators
): boolean {
  if (ifNoneMatch) {
    const tags = ifNoneMatch.split(",").map(tag => tag.trim())

    return tags.some(tag => tag === "*" || weak(tag) === weak(etag))
  }
  if (ifModifiedSince && lastModified !== null) {
    const since = Date.parse(ifModifiedSince)

    return !Number.isNaN(since) && lastModified.getTime() <= since
  }

  return false
}

function weak(tag: string): string {
  return tag.startsWith("W/") ? tag.slice(2) : tag
}
