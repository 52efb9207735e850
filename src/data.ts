// --------------------  resources  --------------------
export type ResourceKind = "css" | "js"
/** ordered identifiers: local paths, http(s) URLs or whitelist tokens */
export type ResourceRequest = readonly string[]
export type Fingerprint = string
export type DependencySet = ReadonlySet<string>

export namespace Resource {
  export type Local = {
    type: "local"
    id: string
  }
  export type Remote = {
    type: "remote"
    id: string
    url: string
  }
}
export type Resource = Resource.Local | Resource.Remote

// --------------------  collaborators  --------------------
export type TransformOutput = {
  code: string
  /** extra files the transformer read on its own, e.g. through a compiler's importer */
  files?: string[]
}
export type Transformer = (
  source: string,
  path: string
) => string | TransformOutput | Promise<string | TransformOutput>
/** transformers keyed by file extension, e.g. `{ ".less": compileLess }` */
export type Plugins = Record<string, Transformer>
export type FetchLimits = {
  maxBytes: number
  timeoutMs: number
}
export type Fetcher = (url: string, limits: FetchLimits) => Promise<string>
export type Minifier = (
  source: string,
  kind: ResourceKind
) => string | Promise<string>
export type ReadFile = (path: string) => Promise<string>
export type ChangeListener = (path: string) => void
export type FileWatcher = {
  watch: (path: string, listener: ChangeListener) => void
  unwatch: (path: string) => void
  close: () => void
}

// --------------------  dependency tracking  --------------------
export type DependencyTracker = {
  add: (path: string) => void
  has: (path: string) => boolean
  contents: () => DependencySet
}

// --------------------  imports  --------------------
export type ImportStatement = {
  /** full statement text, replaced by the inlined content */
  text: string
  index: number
  targets: string[]
  media?: string
}
export type ImportSyntax = {
  extensions: string[]
  /** extensions tried, in order, for a target written without one */
  fallbacks: string[]
  partials: boolean
  comments: RegExp
  find: (source: string) => ImportStatement[]
}
export type ImportResolver = {
  resolveImports: (
    source: string,
    path: string,
    tracker: DependencyTracker,
    stack?: readonly string[]
  ) => Promise<string>
}

// --------------------  cache  --------------------
export type ExpiryPolicy =
  | { type: "absolute"; ttlMs: number }
  | { type: "untilInvalidated" }
export type CachePriority = "default" | "notRemovable"
export type BundleCacheEntry = {
  fingerprint: Fingerprint
  content: string
  dependencies: DependencySet
  createdAt: number
  /** `null` when the entry lives until it is invalidated */
  expiresAt: number | null
  priority: CachePriority
}
export type PutOptions = {
  expiry: ExpiryPolicy
  priority?: CachePriority
}
export type EvictionReason =
  | "expired"
  | "invalidated"
  | "capacity"
  | "cleared"
  | "replaced"
export type EvictListener = (
  entry: BundleCacheEntry,
  reason: EvictionReason
) => void
export type BundleCache = {
  get: (fingerprint: Fingerprint) => BundleCacheEntry | undefined
  put: (
    fingerprint: Fingerprint,
    content: string,
    dependencies: DependencySet,
    options: PutOptions
  ) => BundleCacheEntry | undefined
  invalidateByPath: (path: string) => Fingerprint[]
  clear: () => void
  prune: () => Fingerprint[]
  size: () => number
  tracks: (path: string) => boolean
}

// --------------------  single flight  --------------------
export type SingleFlight<T> = {
  execute: (key: string, build: () => Promise<T>) => Promise<T>
  isInFlight: (key: string) => boolean
  size: () => number
}

// --------------------  builder  --------------------
export type BuildOptions = {
  kind: ResourceKind
  /** defaults to the configured flag of the kind */
  minify?: boolean
}
export type BuildOutput = {
  content: string
  dependencies: DependencySet
}
export type BundleResult = BuildOutput & {
  fingerprint: Fingerprint
  fromCache: boolean
}
export type BundleBuilder = {
  getOrBuildBundle: (
    resources: ResourceRequest,
    options: BuildOptions
  ) => Promise<BundleResult>
  build: (
    resources: ResourceRequest,
    options: BuildOptions
  ) => Promise<BuildOutput>
  invalidate: (path: string) => Fingerprint[]
  clear: () => void
  close: () => void
}

// --------------------  http validation  --------------------
export type Validators = {
  etag: string
  lastModified: Date | null
}
export type ConditionalHeaders = {
  ifNoneMatch?: string | null
  ifModifiedSince?: string | null
}
