import { readdir, stat } from "fs/promises"
import { isAbsolute, join, resolve } from "path"
import { getLogger } from "@logtape/logtape"
import {
  BuildOptions,
  BuildOutput,
  BundleBuilder,
  BundleResult,
  DependencySet,
  DependencyTracker,
  ExpiryPolicy,
  Fetcher,
  FileWatcher,
  Fingerprint,
  Minifier,
  Plugins,
  ReadFile,
  Resource,
  ResourceKind,
  ResourceRequest,
} from "./data"
import { BundlerConfigInput, cacheTtlMs, parseConfig } from "./config"
import { createBundleCache } from "./cache"
import { BundleError, ErrorKind, errorMessage, isBundleError } from "./errors"
import { fingerprint } from "./fingerprint"
import { createImportResolver, readText } from "./imports"
import { createRemoteFetcher } from "./remote"
import { createSingleFlight } from "./singleFlight"
import { createDependencyTracker } from "./tracker"
import {
  defaultPlugins,
  esbuildMinifier,
  runMinifier,
  runTransformer,
} from "./transformers"
import { rewriteUrls } from "./urls"
import { createFileWatcher } from "./watcher"
import { extensionOf, findRoot, ignoreMissing, isDirectory, isRemote } from "./tools"

// --------------------  constants  --------------------
const logger = getLogger(["assetpress", "builder"])
const baseExtensions: Record<ResourceKind, string[]> = {
  css: [".css", ".less", ".scss", ".sass"],
  js: [".js", ".ts", ".coffee"],
}

// --------------------  types  --------------------
export type Collaborators = {
  fetcher: Fetcher
  minifier: Minifier
  /** defaults to an `fs.watch` based watcher when the `watch` option is on */
  watcher: FileWatcher
  plugins: Partial<Record<ResourceKind, Plugins>>
  readFile: ReadFile
  now: () => number
}

// --------------------  builder  --------------------
export function createBundleBuilder(
  input: BundlerConfigInput = {},
  collaborators: Partial<Collaborators> = {}
): BundleBuilder {
  const config = parseConfig(input)
  const {
    fetcher = createRemoteFetcher(),
    minifier = esbuildMinifier,
    readFile = readText,
    now = Date.now,
  } = collaborators
  const watcher = config.watch
    ? collaborators.watcher ?? createFileWatcher()
    : null
  const plugins: Record<ResourceKind, Plugins> = {
    css: { ...defaultPlugins.css, ...collaborators.plugins?.css },
    js: { ...defaultPlugins.js, ...collaborators.plugins?.js },
  }
  const allowed: Record<ResourceKind, string[]> = {
    css: [...baseExtensions.css, ...Object.keys(plugins.css)],
    js: [...baseExtensions.js, ...Object.keys(plugins.js)],
  }
  const resolvers = {
    css: createImportResolver({
      kind: "css",
      roots: config.roots.css,
      rewriteUrls: config.rewriteUrls,
      readFile,
    }),
    js: createImportResolver({ kind: "js", roots: config.roots.js, readFile }),
  }
  const ttlMs = cacheTtlMs(config)
  const expiry: ExpiryPolicy =
    ttlMs === null ? { type: "untilInvalidated" } : { type: "absolute", ttlMs }
  const cache = createBundleCache({
    maxEntries: config.maxEntries,
    now,
    onEvict: entry => entry.dependencies.forEach(release),
  })
  const flights = createSingleFlight<BundleResult>()

  // --------------------  cache wiring  --------------------
  // paths read by builds still running, and when they last changed
  const building = new Map<string, number>()
  const changedAt = new Map<string, number>()
  let generation = 0

  function invalidate(path: string): Fingerprint[] {
    const absolute = resolve(path)
    const removed = cache.invalidateByPath(absolute)

    generation++
    if (building.has(absolute)) changedAt.set(absolute, generation)
    if (removed.length > 0)
      logger.info("{path} changed, dropped {count} cached bundles", {
        path,
        count: removed.length,
      })

    return removed
  }
  function hold(path: string): void {
    building.set(path, (building.get(path) ?? 0) + 1)
    watcher?.watch(path, invalidate)
  }
  function letGo(paths: DependencySet): void {
    paths.forEach(path => {
      const count = (building.get(path) ?? 1) - 1

      if (count > 0) {
        building.set(path, count)
        return
      }

      building.delete(path)
      changedAt.delete(path)
      release(path)
    })
  }
  function release(path: string): void {
    if (watcher !== null && !building.has(path) && !cache.tracks(path))
      watcher.unwatch(path)
  }
  function store(key: Fingerprint, output: BuildOutput, startedAt: number): void {
    const stale = Array.from(output.dependencies).find(
      path => (changedAt.get(path) ?? 0) > startedAt
    )

    if (stale !== undefined) {
      logger.debug("{path} changed while {key} was built, not caching it", {
        path: stale,
        key,
      })
      return
    }

    cache.put(key, output.content, output.dependencies, {
      expiry,
      priority: "notRemovable",
    })
  }

  // --------------------  requests  --------------------
  async function getOrBuildBundle(
    resources: ResourceRequest,
    { kind, minify = config.minify[kind] }: BuildOptions
  ): Promise<BundleResult> {
    const key = fingerprint([kind, minify ? "min" : "raw", ...resources])
    const cached = config.cacheFiles ? cache.get(key) : undefined

    if (cached !== undefined) {
      logger.debug("Cache hit for {key}", { key })
      return {
        content: cached.content,
        dependencies: cached.dependencies,
        fingerprint: key,
        fromCache: true,
      }
    }

    logger.debug("Cache miss for {key}", { key })
    return flights.execute(key, async () => {
      if (!config.cacheFiles) {
        const output = await compile(resources, kind, minify, createDependencyTracker())

        return { ...output, fingerprint: key, fromCache: false }
      }

      const startedAt = generation
      // files are watched as soon as they are read, not once the bundle is stored
      const tracker = createDependencyTracker(hold)

      try {
        const output = await compile(resources, kind, minify, tracker)

        store(key, output, startedAt)
        return { ...output, fingerprint: key, fromCache: false }
      } finally {
        letGo(tracker.contents())
      }
    })
  }
  function build(
    resources: ResourceRequest,
    { kind, minify = config.minify[kind] }: BuildOptions
  ): Promise<BuildOutput> {
    return compile(resources, kind, minify, createDependencyTracker())
  }
  async function compile(
    resources: ResourceRequest,
    kind: ResourceKind,
    minify: boolean,
    tracker: DependencyTracker
  ): Promise<BuildOutput> {
    // Promise.all keeps the requested order whatever finishes first
    const pieces = await Promise.all(
      resources.map(id => load(classify(id), kind, tracker))
    )
    const combined = pieces.join("\n")
    const content = minify
      ? await runMinifier(minifier, combined, kind)
      : combined
    const dependencies = tracker.contents()

    logger.info("Built {kind} bundle of {count} resources from {files} files", {
      kind,
      count: resources.length,
      files: dependencies.size,
    })

    return { content, dependencies }
  }

  // --------------------  loading  --------------------
  function classify(id: string): Resource {
    const token = id.toLowerCase()
    const safe = config.remote.whitelist.find(
      item => item.token.toLowerCase() === token
    )

    if (safe !== undefined) return { type: "remote", id, url: safe.url }
    if (isRemote(id)) return { type: "remote", id, url: id }

    return { type: "local", id }
  }
  function load(
    resource: Resource,
    kind: ResourceKind,
    tracker: DependencyTracker
  ): Promise<string> {
    return resource.type === "remote"
      ? loadRemote(resource, kind, tracker)
      : loadLocal(resource, kind, tracker)
  }
  async function loadRemote(
    { url }: Resource.Remote,
    kind: ResourceKind,
    tracker: DependencyTracker
  ): Promise<string> {
    const whitelisted = config.remote.whitelist.some(item => item.url === url)

    if (!config.remote.allow && !whitelisted)
      throw new BundleError(
        ErrorKind.RemoteFetchRejected,
        `Remote files are not allowed: ${url}`,
        { path: url }
      )

    let text: string

    try {
      text = await fetcher(url, {
        maxBytes: config.remote.maxBytes,
        timeoutMs: config.remote.timeoutMs,
      })
    } catch (error) {
      if (!isBundleError(error, ErrorKind.RemoteFetchFailed)) throw error

      // the site may be down, it will be tried again next build
      logger.warn("Skipping {url}: {error}", { url, error: errorMessage(error) })
      return ""
    }

    const source =
      kind === "css" && config.rewriteUrls
        ? rewriteUrls(text, url, config.roots.css)
        : text

    return transform(source, url, url.split(/[?#]/)[0], kind, tracker)
  }
  async function loadLocal(
    { id }: Resource.Local,
    kind: ResourceKind,
    tracker: DependencyTracker
  ): Promise<string> {
    const path = await locate(id, config.roots[kind])

    if (path !== null && (await isDirectory(path)))
      return loadDirectory(path, kind, tracker)
    if (!allowed[kind].includes(extensionOf(id)))
      throw new BundleError(
        ErrorKind.AccessDenied,
        `${id} is not an allowed ${kind} resource`,
        { path: id }
      )
    if (path === null)
      throw new BundleError(ErrorKind.NotFound, `${id} was not found`, {
        path: id,
      })

    return loadFile(path, kind, tracker)
  }
  async function loadFile(
    path: string,
    kind: ResourceKind,
    tracker: DependencyTracker
  ): Promise<string> {
    tracker.add(path)

    const source = await resolvers[kind].resolveImports(
      await readFile(path),
      path,
      tracker
    )

    return transform(source, path, path, kind, tracker)
  }
  async function loadDirectory(
    dir: string,
    kind: ResourceKind,
    tracker: DependencyTracker
  ): Promise<string> {
    // watched directories report added and removed files, fs.watch is not recursive
    const files = (await listFiles(dir, tracker)).filter(file =>
      allowed[kind].includes(extensionOf(file))
    )
    const pieces: string[] = []

    for (const file of files) pieces.push(await loadFile(file, kind, tracker))

    return pieces.join("\n")
  }
  function transform(
    source: string,
    path: string,
    extensionPath: string,
    kind: ResourceKind,
    tracker: DependencyTracker
  ): Promise<string> | string {
    const transformer = plugins[kind][extensionOf(extensionPath)]

    return transformer === undefined
      ? source
      : runTransformer(transformer, source, path, tracker)
  }

  return {
    getOrBuildBundle,
    build,
    invalidate,
    clear: () => cache.clear(),
    close: () => {
      cache.clear()
      watcher?.close()
    },
  }
}

// --------------------  tools  --------------------
async function locate(
  id: string,
  roots: readonly string[]
): Promise<string | null> {
  const candidates =
    isAbsolute(id) && findRoot(resolve(id), roots) !== undefined
      ? [resolve(id)]
      : roots.map(root => join(root, id))

  for (const candidate of candidates) {
    if (findRoot(candidate, roots) === undefined)
      throw new BundleError(
        ErrorKind.AccessDenied,
        `${id} resolves outside the configured roots`,
        { path: id }
      )
    if ((await stat(candidate).catch(ignoreMissing)) !== null) return candidate
  }

  return null
}
async function listFiles(
  dir: string,
  tracker: DependencyTracker
): Promise<string[]> {
  tracker.add(dir)

  const entries = await readdir(dir, { withFileTypes: true })
  const sorted = entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  const nested = await Promise.all(
    sorted.map(entry => {
      const path = join(dir, entry.name)

      return entry.isDirectory() ? listFiles(path, tracker) : Promise.resolve([path])
    })
  )

  return nested.flat()
}
