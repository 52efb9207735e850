import { resolve } from "path"
import { z } from "zod"
import { BundleError, ErrorKind } from "./errors"

// --------------------  schema  --------------------
const roots = z
  .array(z.string().min(1))
  .min(1)
  .transform(paths => paths.map(path => resolve(path)))

export const configSchema = z.object({
  roots: z
    .object({
      css: roots.default(["."]),
      js: roots.default(["."]),
    })
    .default({}),
  minify: z
    .object({
      css: z.boolean().default(true),
      js: z.boolean().default(true),
    })
    .default({}),
  cacheFiles: z.boolean().default(true),
  /** `null` keeps entries until a dependency changes, `<= 0` expires them immediately */
  cacheDays: z.number().nullable().default(365),
  maxEntries: z.number().int().nonnegative().default(0),
  remote: z
    .object({
      allow: z.boolean().default(false),
      whitelist: z
        .array(z.object({ token: z.string().min(1), url: z.string().url() }))
        .default([]),
      maxBytes: z
        .number()
        .int()
        .nonnegative()
        .default(4 * 1024 * 1024),
      timeoutMs: z.number().int().nonnegative().default(10_000),
    })
    .default({}),
  rewriteUrls: z.boolean().default(true),
  watch: z.boolean().default(true),
})

export type BundlerConfig = z.infer<typeof configSchema>
export type BundlerConfigInput = z.input<typeof configSchema>

// --------------------  parsing  --------------------
export function parseConfig(input: BundlerConfigInput = {}): BundlerConfig {
  const result = configSchema.safeParse(input)

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ")

    throw new BundleError(
      ErrorKind.InvalidConfig,
      `Invalid bundler configuration: ${issues}`,
      { cause: result.error }
    )
  }

  return result.data
}

const DAY_MS = 24 * 60 * 60 * 1000

export function cacheTtlMs(config: BundlerConfig): number | null {
  if (config.cacheDays === null) return null

  return config.cacheDays > 0 ? config.cacheDays * DAY_MS : 0
}
