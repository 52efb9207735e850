import { watch } from "fs"
import { resolve } from "path"
import { mapFactory } from "vaco"
import { onProcessTermination } from "ontermination"
import { getLogger } from "@logtape/logtape"
import { ChangeListener, FileWatcher } from "./data"
import { errorMessage } from "./errors"

// --------------------  constants  --------------------
const logger = getLogger(["assetpress", "watcher"])

// --------------------  types  --------------------
/** the part of `fs.FSWatcher` the registry uses */
export type WatchHandle = {
  on: (event: "error", listener: (error: Error) => void) => unknown
  close: () => void
}
export type WatchFile = (
  path: string,
  listener: (eventType: string) => void
) => WatchHandle
type WatchedFile = {
  path: string
  listeners: Set<ChangeListener>
  watcher: WatchHandle | null
}

// --------------------  file watcher  --------------------
export function createFileWatcher(watchFile: WatchFile = watch): FileWatcher {
  const watched = mapFactory(
    (path: string): WatchedFile => ({
      path,
      listeners: new Set(),
      watcher: open(path),
    })
  )

  function open(path: string): WatchHandle | null {
    try {
      const watcher = watchFile(path, eventType => {
        notify(path)
        // the inode is gone (deleted, or replaced by a rename)
        if (eventType === "rename") unwatch(path)
      })

      watcher.on("error", error => {
        logger.warn("Stopped watching {path}: {error}", {
          path,
          error: errorMessage(error),
        })
        // changes are no longer seen, so whoever depends on the file must rebuild
        notify(path)
        unwatch(path)
      })
      logger.debug("Watching {path}", { path })

      return watcher
    } catch (error) {
      logger.warn("Cannot watch {path}: {error}", {
        path,
        error: errorMessage(error),
      })
      return null
    }
  }
  function notify(path: string): void {
    const file = watched.collection.get(path)

    if (file === undefined) return

    logger.debug("{path} changed", { path })
    Array.from(file.listeners).forEach(listener => listener(path))
  }
  function unwatch(path: string): void {
    const file = watched.collection.get(path)

    if (file === undefined) return

    watched.collection.delete(path)
    file.watcher?.close()
  }
  const close = () => {
    Array.from(watched.collection.keys()).forEach(unwatch)
  }

  onProcessTermination(close)

  return {
    watch: (path, listener) => {
      path = resolve(path)
      const file = watched(path)

      if (file.watcher === null) {
        watched.collection.delete(path)
        return
      }

      file.listeners.add(listener)
    },
    unwatch: path => unwatch(resolve(path)),
    close,
  }
}
