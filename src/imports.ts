import { readFile } from "fs/promises"
import { basename, dirname, join, resolve } from "path"
import { getLogger } from "@logtape/logtape"
import {
  DependencyTracker,
  ImportResolver,
  ImportStatement,
  ImportSyntax,
  ReadFile,
  ResourceKind,
} from "./data"
import { BundleError, ErrorKind } from "./errors"
import { rewriteUrls } from "./urls"
import {
  extensionOf,
  findRoot,
  isExternal,
  isFile,
  joinRgxs,
  removeDuplicate,
  unquote,
} from "./tools"

// --------------------  constants  --------------------
const logger = getLogger(["assetpress", "imports"])
const quotedRgxs = [/"(?:\\.|[^\\"\n])*"/, /'(?:\\.|[^\\'\n])*'/]
const templateRgx = /`(?:\\.|[^\\`])*`/
const blockCommentRgx = /\/\*[\s\S]*?\*\//
// `(?<!:)` keeps `url(http://...)` out of line comments
const lineCommentRgx = /(?<!:)\/\/[^\n]*/
const hashCommentRgxs = [/###[\s\S]*?###/, /#[^\n]*/]
const cssImportRgx =
  /@import\s+(?:url\(\s*(["']?)([^"')]+?)\1\s*\)|(["'])([^"']+)\3)([^;]*);/gi
const sassImportRgx = /@import\s+([^;\n]+);?/g
const jsImportRgx =
  /^[ \t]*import\s*(["'])([^"'\n]+\.(?:js|ts|coffee))\1[ \t]*;?/gim
const sassTargetRgx = /^[^\s"'()]+$/

// --------------------  syntaxes  --------------------
const css = cssFamily([".css"], [".css"], [blockCommentRgx])
const less = cssFamily(
  [".less"],
  [".less", ".css"],
  [blockCommentRgx, lineCommentRgx]
)
const scss = sassFamily([".scss"], [".scss", ".sass", ".css"])
const sass = sassFamily([".sass"], [".sass", ".scss", ".css"])
const js = jsFamily([".js", ".ts"], [blockCommentRgx, lineCommentRgx])
const coffee = jsFamily([".coffee"], hashCommentRgxs)

const syntaxes: Record<string, ImportSyntax> = {
  ".css": css,
  ".less": less,
  ".scss": scss,
  ".sass": sass,
  ".js": js,
  ".ts": js,
  ".coffee": coffee,
}

export function syntaxFor(path: string, kind: ResourceKind): ImportSyntax {
  return syntaxes[extensionOf(path)] ?? (kind === "css" ? css : js)
}

function cssFamily(
  extensions: string[],
  fallbacks: string[],
  comments: RegExp[]
): ImportSyntax {
  return {
    extensions,
    fallbacks,
    partials: false,
    comments: joinRgxs([...quotedRgxs, ...comments]),
    find: source =>
      matchAll(source, cssImportRgx).map(m => ({
        text: m[0],
        index: m.index,
        targets: [(m[2] ?? m[4]).trim()],
        media: m[5].trim() || undefined,
      })),
  }
}
function sassFamily(extensions: string[], fallbacks: string[]): ImportSyntax {
  return {
    extensions,
    fallbacks,
    partials: true,
    comments: joinRgxs([...quotedRgxs, blockCommentRgx, lineCommentRgx]),
    find: source =>
      matchAll(source, sassImportRgx).flatMap(m => {
        const targets = m[1].split(",").map(unquote)

        // plain css imports are the compiler's business
        return targets.every(isSassPartialTarget)
          ? [{ text: m[0], index: m.index, targets }]
          : []
      }),
  }
}
function jsFamily(extensions: string[], comments: RegExp[]): ImportSyntax {
  return {
    extensions,
    fallbacks: [],
    partials: false,
    comments: joinRgxs([...quotedRgxs, templateRgx, ...comments]),
    find: source =>
      matchAll(source, jsImportRgx).map(m => ({
        text: m[0],
        index: m.index,
        targets: [m[2]],
      })),
  }
}
function isSassPartialTarget(target: string): boolean {
  return (
    sassTargetRgx.test(target) &&
    !isExternal(target) &&
    extensionOf(target) !== ".css"
  )
}

// --------------------  parser  --------------------
export function findImports(
  source: string,
  syntax: ImportSyntax
): ImportStatement[] {
  const hidden = matchAll(source, syntax.comments).map(
    m => [m.index, m.index + m[0].length] as const
  )

  return syntax
    .find(source)
    .filter(({ index }) => !hidden.some(([from, to]) => index >= from && index < to))
}
function matchAll(source: string, regex: RegExp): RegExpExecArray[] {
  const result: RegExpExecArray[] = []
  regex.lastIndex = 0
  let match = regex.exec(source)

  while (match) {
    result.push(match)
    if (match[0].length === 0) regex.lastIndex++
    match = regex.exec(source)
  }

  return result
}

// --------------------  resolver  --------------------
export type ImportResolverOptions = {
  kind: ResourceKind
  roots: readonly string[]
  rewriteUrls?: boolean
  readFile?: ReadFile
}

export function createImportResolver({
  kind,
  roots,
  rewriteUrls: rewrite = false,
  readFile: read = readText,
}: ImportResolverOptions): ImportResolver {
  const adjust = (css: string, path: string) =>
    rewrite && kind === "css" ? rewriteUrls(css, path, roots) : css

  async function resolveImports(
    source: string,
    path: string,
    tracker: DependencyTracker,
    stack: readonly string[] = []
  ): Promise<string> {
    const syntax = syntaxFor(path, kind)
    const chain = [...stack, resolve(path)]
    let output = ""
    let lastIndex = 0

    for (const statement of findImports(source, syntax)) {
      output += adjust(source.slice(lastIndex, statement.index), path)
      output += await inline(statement, path, syntax, tracker, chain)
      lastIndex = statement.index + statement.text.length
    }

    return output + adjust(source.slice(lastIndex), path)
  }
  async function inline(
    statement: ImportStatement,
    from: string,
    syntax: ImportSyntax,
    tracker: DependencyTracker,
    chain: readonly string[]
  ): Promise<string> {
    if (statement.targets.some(isExternal)) return statement.text

    const pieces: string[] = []

    for (const target of statement.targets) {
      const file = await locate(target, from, syntax)

      if (file === null) {
        logger.warn("Import {target} in {path} was not found, inlining nothing", {
          target,
          path: from,
        })
        continue
      }
      if (chain.includes(file)) {
        throw new BundleError(
          ErrorKind.CircularImport,
          `Circular import: ${[...chain, file].join(" -> ")}`,
          { path: file }
        )
      }

      // tracked before reading so a watch is in place for any later change
      tracker.add(file)
      pieces.push(await resolveImports(await read(file), file, tracker, chain))
    }

    const content = pieces.join("\n")

    return statement.media === undefined
      ? content
      : `@media ${statement.media} {\n${content}\n}`
  }
  async function locate(
    target: string,
    from: string,
    syntax: ImportSyntax
  ): Promise<string | null> {
    const bases = target.startsWith("/")
      ? roots.map(root => join(root, target))
      : [
          resolve(dirname(from), target),
          ...roots.map(root => resolve(root, target)),
        ]

    for (const base of removeDuplicate(bases)) {
      for (const candidate of candidates(base, syntax)) {
        if (!(await isFile(candidate))) continue
        if (findRoot(candidate, roots) === undefined) {
          throw new BundleError(
            ErrorKind.AccessDenied,
            `Import ${target} in ${from} resolves outside the configured roots`,
            { path: candidate }
          )
        }

        return candidate
      }
    }

    return null
  }

  return { resolveImports }
}

// --------------------  helpers  --------------------
function candidates(base: string, syntax: ImportSyntax): string[] {
  const known = [...syntax.extensions, ...syntax.fallbacks]
  const names = known.includes(extensionOf(base))
    ? [base]
    : [base, ...syntax.fallbacks.map(ext => base + ext)]

  return syntax.partials
    ? names.flatMap(name => [name, join(dirname(name), "_" + basename(name))])
    : names
}
export function readText(path: string): Promise<string> {
  return readFile(path, "utf-8")
}
