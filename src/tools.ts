import { extname, isAbsolute, relative, sep } from "path"
import { stat } from "fs/promises"

// --------------------  constants  --------------------
const remoteRgx = /^https?:\/\//i
const schemeRgx = /^[a-z][\w+.-]*:/i

// --------------------  strings  --------------------
export function removeDuplicate<T>(ar: T[]): T[] {
  return Array.from(new Set(ar))
}
export function joinRgxs(rgxs: RegExp[], flags = "g"): RegExp {
  return new RegExp(rgxs.map(rgx => rgx.source).join("|"), flags)
}
export function unquote(value: string): string {
  const trimmed = value.trim()
  const first = trimmed[0]

  return (first === '"' || first === "'") && trimmed.endsWith(first)
    ? trimmed.slice(1, -1)
    : trimmed
}

// --------------------  paths  --------------------
export function isRemote(id: string): boolean {
  return remoteRgx.test(id)
}
/** `http:`, `data:`, `//cdn` ... anything that is not a path on this machine */
export function isExternal(target: string): boolean {
  return schemeRgx.test(target) || target.startsWith("//")
}
export function extensionOf(path: string): string {
  return extname(path).toLowerCase()
}
export function isWithin(path: string, root: string): boolean {
  const rel = relative(root, path)

  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel))
}
export function findRoot(
  path: string,
  roots: readonly string[]
): string | undefined {
  return roots.find(root => isWithin(path, root))
}
export function toUrlPath(path: string): string {
  return path.split(sep).join("/")
}

// --------------------  fs  --------------------
export async function isFile(path: string): Promise<boolean> {
  const stats = await stat(path).catch(ignoreMissing)

  return stats !== null && stats.isFile()
}
export async function isDirectory(path: string): Promise<boolean> {
  const stats = await stat(path).catch(ignoreMissing)

  return stats !== null && stats.isDirectory()
}
export function ignoreMissing(error: unknown): null {
  if (isMissingFileError(error)) return null

  throw error
}
export function isMissingFileError(error: unknown): boolean {
  return (
    // fs errors may come from another realm, so no instanceof
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  )
}
