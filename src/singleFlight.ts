import { AsyncLocalStorage } from "async_hooks"
import { SingleFlight } from "./data"
import { BundleError, ErrorKind } from "./errors"

// --------------------  single flight  --------------------
/**
 * Runs at most one build per key. Callers arriving while a build is running
 * share its promise, whether it resolves or rejects; the ticket is dropped
 * once it settles.
 */
export function createSingleFlight<T>(): SingleFlight<T> {
  const inFlight = new Map<string, Promise<T>>()
  // keys whose build encloses the current async context
  const building = new AsyncLocalStorage<ReadonlySet<string>>()

  return {
    execute: (key, build) => {
      const enclosing = building.getStore()

      if (enclosing?.has(key))
        return Promise.reject(
          new BundleError(
            ErrorKind.ReentrantBuild,
            `Build of ${key} requested itself`,
            { path: key }
          )
        )

      const running = inFlight.get(key)

      if (running !== undefined) return running

      const ticket = building
        .run(new Set(enclosing).add(key), () => Promise.resolve().then(build))
        .finally(() => {
          inFlight.delete(key)
        })

      inFlight.set(key, ticket)

      return ticket
    },
    isInFlight: key => inFlight.has(key),
    size: () => inFlight.size,
  }
}
