import { mkdir, mkdtemp, rm, writeFile } from "fs/promises"
import { tmpdir } from "os"
import { dirname, join } from "path"

// --------------------  fixtures  --------------------
export async function createFixture(
  files: Record<string, string>
): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "assetpress-"))

  await writeFiles(root, files)
  return root
}
export async function writeFiles(
  root: string,
  files: Record<string, string>
): Promise<void> {
  await Promise.all(
    Object.entries(files).map(async ([name, content]) => {
      const path = join(root, name)

      await mkdir(dirname(path), { recursive: true })
      await writeFile(path, content)
    })
  )
}
export function removeFixture(root: string): Promise<void> {
  return rm(root, { recursive: true, force: true })
}
export function deferred<T>() {
  let settle: (value: T) => void = () => {}
  const promise = new Promise<T>(resolve => {
    settle = resolve
  })

  return { promise, resolve: (value: T) => settle(value) }
}
