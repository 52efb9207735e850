import {
  createDependencyTracker,
  esbuildMinifier,
  isBundleError,
  typescriptTransformer,
} from "../src"
import { runMinifier, runTransformer } from "../src/transformers"

describe("typescript transformer", () => {
  it("strips types", () => {
    expect(typescriptTransformer("const x: number = 1", "a.ts")).toContain(
      "const x = 1;"
    )
  })
  it("throws on syntax errors", () => {
    expect(() => typescriptTransformer("const x = ;", "a.ts")).toThrow()
  })
})

describe("runTransformer", () => {
  it("adds the files a transformer read to the tracker", async () => {
    const tracker = createDependencyTracker()
    const code = await runTransformer(
      () => ({ code: "out", files: ["/site/css/vars.less"] }),
      "in",
      "/site/css/a.less",
      tracker
    )

    expect(code).toEqual("out")
    expect(Array.from(tracker.contents())).toEqual(["/site/css/vars.less"])
  })
  it("reports failures as transform errors", async () => {
    const error = await runTransformer(
      () => {
        throw new Error("unexpected token")
      },
      "in",
      "a.ts",
      createDependencyTracker()
    ).catch((e: unknown) => e)

    expect(isBundleError(error, "TransformFailed")).toBe(true)
    expect(isBundleError(error) && error.message).toEqual(
      "Transforming a.ts failed: unexpected token"
    )
    expect(isBundleError(error) && error.path).toEqual("a.ts")
  })
})

describe("esbuild minifier", () => {
  it("minifies css", async () => {
    expect(await esbuildMinifier(".a { color: red; }", "css")).toEqual(
      ".a{color:red}\n"
    )
  })
  it("minifies javascript", async () => {
    expect(await esbuildMinifier(`var answer = "a" ;`, "js")).toEqual(
      `var answer="a";\n`
    )
  })
  it("reports invalid input as a transform error", async () => {
    const error = await runMinifier(esbuildMinifier, "var = ;", "js").catch(
      (e: unknown) => e
    )

    expect(isBundleError(error, "TransformFailed")).toBe(true)
    expect(isBundleError(error) && error.message).toMatch(
      /^Minifying js bundle failed: /
    )
  })
})
