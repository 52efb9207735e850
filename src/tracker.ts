import { resolve } from "path"
import { DependencyTracker } from "./data"

// --------------------  tracker  --------------------
// one per build, never shared between builds
export function createDependencyTracker(
  onAdd?: (path: string) => void
): DependencyTracker {
  const paths = new Set<string>()

  return {
    add: path => {
      const absolute = resolve(path)

      if (paths.has(absolute)) return

      paths.add(absolute)
      onAdd?.(absolute)
    },
    has: path => paths.has(resolve(path)),
    contents: () => new Set(paths),
  }
}
