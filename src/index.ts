// --------------------  main  --------------------
export { createBundleBuilder, type Collaborators } from "./core"
export { createBundleCache, type BundleCacheOptions } from "./cache"
export { createSingleFlight } from "./singleFlight"
export { createDependencyTracker } from "./tracker"
export {
  createImportResolver,
  findImports,
  syntaxFor,
  type ImportResolverOptions,
} from "./imports"
export { rewriteUrls } from "./urls"
export { fingerprint, hashContent, EMPTY_FINGERPRINT } from "./fingerprint"
export { createRemoteFetcher, type HttpRequest } from "./remote"
export {
  createFileWatcher,
  type WatchFile,
  type WatchHandle,
} from "./watcher"
export {
  typescriptTransformer,
  esbuildMinifier,
  defaultPlugins,
} from "./transformers"
export { createValidators, isNotModified } from "./validation"
export {
  parseConfig,
  cacheTtlMs,
  configSchema,
  type BundlerConfig,
  type BundlerConfigInput,
} from "./config"
export * from "./errors"
export * from "./data"
