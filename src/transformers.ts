import ts from "typescript"
import { transform } from "esbuild"
import {
  DependencyTracker,
  Minifier,
  Plugins,
  ResourceKind,
  Transformer,
} from "./data"
import { BundleError, ErrorKind, errorMessage, isBundleError } from "./errors"

// --------------------  transformers  --------------------
export function typescriptTransformer(source: string, path: string): string {
  const { outputText, diagnostics = [] } = ts.transpileModule(source, {
    fileName: path,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2017,
      module: ts.ModuleKind.ESNext,
      removeComments: true,
    },
  })

  if (diagnostics.length > 0)
    throw new Error(
      diagnostics
        .map(d => ts.flattenDiagnosticMessageText(d.messageText, "\n"))
        .join("\n")
    )

  return outputText
}

export const defaultPlugins: Record<ResourceKind, Plugins> = {
  css: {},
  js: { ".ts": typescriptTransformer },
}

export async function runTransformer(
  transformer: Transformer,
  source: string,
  path: string,
  tracker: DependencyTracker
): Promise<string> {
  try {
    const output = await transformer(source, path)

    if (typeof output === "string") return output

    output.files?.forEach(file => tracker.add(file))
    return output.code
  } catch (error) {
    throw asTransformError(error, `Transforming ${path} failed`, path)
  }
}

// --------------------  minifiers  --------------------
export const esbuildMinifier: Minifier = async (source, kind) =>
  (await transform(source, { loader: kind, minify: true })).code

export async function runMinifier(
  minifier: Minifier,
  source: string,
  kind: ResourceKind
): Promise<string> {
  try {
    return await minifier(source, kind)
  } catch (error) {
    throw asTransformError(error, `Minifying ${kind} bundle failed`)
  }
}

// --------------------  helpers  --------------------
function asTransformError(
  error: unknown,
  context: string,
  path?: string
): BundleError {
  if (isBundleError(error)) return error

  return new BundleError(
    ErrorKind.TransformFailed,
    `${context}: ${errorMessage(error)}`,
    { cause: error, path }
  )
}
