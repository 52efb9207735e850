import { dirname, relative, resolve } from "path"
import { findRoot, isExternal, isRemote, toUrlPath } from "./tools"

// --------------------  constants  --------------------
const urlRgx = /url\(\s*(["']?)([^"')]*?)\1\s*\)/gi

// --------------------  rewriting  --------------------
/**
 * Makes the relative `url(...)` references of a stylesheet independent from
 * the file they were written in. Local references become root relative
 * (`/img/a.png`), references inside a remote stylesheet become absolute URLs.
 */
export function rewriteUrls(
  css: string,
  from: string,
  roots: readonly string[]
): string {
  return css.replace(urlRgx, (match, quote: string, target: string) => {
    const rewritten = rewriteTarget(target.trim(), from, roots)

    return rewritten === null ? match : `url(${quote}${rewritten}${quote})`
  })
}
function rewriteTarget(
  target: string,
  from: string,
  roots: readonly string[]
): string | null {
  if (
    target === "" ||
    target.startsWith("#") ||
    target.startsWith("/") ||
    isExternal(target)
  )
    return null
  if (isRemote(from)) return new URL(target, from).href

  const suffixIndex = target.search(/[?#]/)
  const suffix = suffixIndex >= 0 ? target.slice(suffixIndex) : ""
  const path = resolve(
    dirname(from),
    suffixIndex >= 0 ? target.slice(0, suffixIndex) : target
  )
  const root = findRoot(path, roots)

  if (root === undefined) return null

  return "/" + toUrlPath(relative(root, path)) + suffix
}
