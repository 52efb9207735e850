// --------------------  kinds  --------------------
export const ErrorKind = {
  NotFound: "NotFound",
  AccessDenied: "AccessDenied",
  RemoteFetchFailed: "RemoteFetchFailed",
  RemoteFetchRejected: "RemoteFetchRejected",
  CircularImport: "CircularImport",
  TransformFailed: "TransformFailed",
  ReentrantBuild: "ReentrantBuild",
  InvalidConfig: "InvalidConfig",
} as const
export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind]

// --------------------  error  --------------------
export type BundleErrorOptions = {
  /** file path or URL the failure is about */
  path?: string
  cause?: unknown
}

export class BundleError extends Error {
  readonly kind: ErrorKind
  readonly path?: string

  constructor(kind: ErrorKind, message: string, options: BundleErrorOptions = {}) {
    super(message, { cause: options.cause })

    this.name = "BundleError"
    this.kind = kind
    this.path = options.path
  }
}

export function isBundleError(
  error: unknown,
  kind?: ErrorKind
): error is BundleError {
  return error instanceof BundleError && (kind === undefined || error.kind === kind)
}

export function errorMessage(error: unknown): string {
  return typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
    ? error.message
    : String(error)
}
