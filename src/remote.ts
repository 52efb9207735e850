import { Fetcher } from "./data"
import { BundleError, ErrorKind, errorMessage } from "./errors"

// --------------------  types  --------------------
export type HttpRequest = (url: string, init: RequestInit) => Promise<Response>

// --------------------  fetcher  --------------------
/**
 * Downloads a remote resource as text.
 *
 * Transport failures and server errors raise `RemoteFetchFailed`, a 404
 * raises `NotFound`, and a body over `maxBytes` or a response slower than
 * `timeoutMs` raises `RemoteFetchRejected`.
 */
export function createRemoteFetcher(request: HttpRequest = fetch): Fetcher {
  return async (url, { maxBytes, timeoutMs }) => {
    try {
      const response = await request(url, {
        headers: { "accept-language": "en-us" },
        signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
      })

      if (response.status === 404)
        throw new BundleError(ErrorKind.NotFound, `No file exists at ${url}`, {
          path: url,
        })
      if (!response.ok)
        throw new BundleError(
          ErrorKind.RemoteFetchFailed,
          `Fetching ${url} answered ${response.status}`,
          { path: url }
        )

      const declared = Number(response.headers.get("content-length") ?? 0)

      if (maxBytes > 0 && declared > maxBytes) {
        await response.body?.cancel()
        throw tooLarge(url, maxBytes)
      }

      return await readBody(response, url, maxBytes)
    } catch (error) {
      if (error instanceof BundleError) throw error
      if (isTimeout(error))
        throw new BundleError(
          ErrorKind.RemoteFetchRejected,
          `Fetching ${url} took longer than ${timeoutMs}ms`,
          { cause: error, path: url }
        )

      throw new BundleError(
        ErrorKind.RemoteFetchFailed,
        `Fetching ${url} failed: ${errorMessage(error)}`,
        { cause: error, path: url }
      )
    }
  }
}

// --------------------  helpers  --------------------
async function readBody(
  response: Response,
  url: string,
  maxBytes: number
): Promise<string> {
  const reader = response.body?.getReader()

  if (reader === undefined) return ""

  const chunks: Uint8Array[] = []
  let total = 0

  for (;;) {
    const { done, value } = await reader.read()

    if (done) break

    total += value.byteLength
    if (maxBytes > 0 && total > maxBytes) {
      await reader.cancel()
      throw tooLarge(url, maxBytes)
    }
    chunks.push(value)
  }

  return Buffer.concat(chunks).toString("utf-8")
}
function tooLarge(url: string, maxBytes: number): BundleError {
  return new BundleError(
    ErrorKind.RemoteFetchRejected,
    `${url} is larger than the allowed ${maxBytes} bytes`,
    { path: url }
  )
}
function isTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "TimeoutError"
  )
}
