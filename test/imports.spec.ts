import { readFile } from "fs/promises"
import { join } from "path"
import {
  createDependencyTracker,
  createImportResolver,
  findImports,
  syntaxFor,
} from "../src"
import { createFixture, removeFixture } from "./helpers"

// --------------------  helpers  --------------------
let root = ""

afterEach(async () => {
  if (root !== "") await removeFixture(root)
  root = ""
})

async function resolveFile(
  name: string,
  options: { kind?: "css" | "js"; rewriteUrls?: boolean; roots?: string[] } = {}
) {
  const path = join(root, name)
  const tracker = createDependencyTracker()
  const resolver = createImportResolver({
    kind: options.kind ?? "css",
    roots: options.roots ?? [root],
    rewriteUrls: options.rewriteUrls,
  })
  const output = await resolver.resolveImports(
    await readFile(path, "utf-8"),
    path,
    tracker
  )

  return { output, tracker }
}

// --------------------  tests  --------------------
describe("css imports", () => {
  it("inlines url imports and tracks the imported file", async () => {
    root = await createFixture({
      "a.css": "@import url(b.css);\n.a{color:blue}",
      "b.css": ".x{color:red}",
    })
    const { output, tracker } = await resolveFile("a.css")

    expect(output).toEqual(".x{color:red}\n.a{color:blue}")
    expect(tracker.has(join(root, "b.css"))).toBe(true)
  })
  it("inlines quoted imports", async () => {
    root = await createFixture({
      "a.css": `@import "b.css";`,
      "b.css": ".x{color:red}",
    })

    expect((await resolveFile("a.css")).output).toEqual(".x{color:red}")
  })
  it("wraps media qualified imports", async () => {
    root = await createFixture({
      "a.css": "@import url(b.css) screen;",
      "b.css": ".x{color:red}",
    })

    expect((await resolveFile("a.css")).output).toEqual(
      "@media screen {\n.x{color:red}\n}"
    )
  })
  it("inlines nested imports depth first", async () => {
    root = await createFixture({
      "a.css": "@import url(parts/b.css);\n.a{}",
      "parts/b.css": "@import url(c.css);\n.b{}",
      "parts/c.css": ".c{}",
    })
    const { output, tracker } = await resolveFile("a.css")

    expect(output).toEqual(".c{}\n.b{}\n.a{}")
    expect(Array.from(tracker.contents()).sort()).toEqual([
      join(root, "parts/b.css"),
      join(root, "parts/c.css"),
    ])
  })
  it("replaces missing imports with nothing", async () => {
    root = await createFixture({
      "a.css": "@import url(missing.css);\n.a{}",
    })

    expect((await resolveFile("a.css")).output).toEqual("\n.a{}")
  })
  it("keeps remote imports", async () => {
    const css = "@import url(https://cdn.example.com/x.css);\n.a{}"
    root = await createFixture({ "a.css": css })

    expect((await resolveFile("a.css")).output).toEqual(css)
  })
  it("ignores imports inside comments", async () => {
    const css = "/* @import url(b.css); */\n.a{}"
    root = await createFixture({ "a.css": css, "b.css": ".b{}" })

    expect((await resolveFile("a.css")).output).toEqual(css)
  })
  it("fails on circular imports", async () => {
    root = await createFixture({
      "a.css": "@import url(b.css);",
      "b.css": "@import url(a.css);",
    })

    await expect(resolveFile("a.css")).rejects.toMatchObject({
      kind: "CircularImport",
    })
  })
  it("inlines a file imported from two branches twice", async () => {
    root = await createFixture({
      "a.css": "@import url(b.css);\n@import url(c.css);",
      "b.css": "@import url(d.css);",
      "c.css": "@import url(d.css);",
      "d.css": ".d{}",
    })

    expect((await resolveFile("a.css")).output).toEqual(".d{}\n.d{}")
  })
  it("refuses imports outside the roots", async () => {
    root = await createFixture({
      "css/a.css": "@import url(../secret.css);",
      "secret.css": ".s{}",
    })

    await expect(
      resolveFile("css/a.css", { roots: [join(root, "css")] })
    ).rejects.toMatchObject({ kind: "AccessDenied" })
  })
  it("rewrites urls of imported files relative to the root", async () => {
    root = await createFixture({
      "css/a.css": "@import url(parts/b.css);",
      "css/parts/b.css": ".b{background:url(img/x.png)}",
    })

    expect(
      (await resolveFile("css/a.css", { rewriteUrls: true })).output
    ).toEqual(".b{background:url(/css/parts/img/x.png)}")
  })
})

describe("less and sass imports", () => {
  it("finds extension-less less imports", async () => {
    root = await createFixture({
      "site.less": `@import "vars";\n.a{color:@c}`,
      "vars.less": "@c: red;",
    })

    expect((await resolveFile("site.less")).output).toEqual(
      "@c: red;\n.a{color:@c}"
    )
  })
  it("finds sass partials and import lists", async () => {
    root = await createFixture({
      "main.scss": `@import "mixins", "colors";\n.main{}`,
      "_mixins.scss": "@mixin m{}",
      "colors.scss": "$c: red;",
    })
    const { output, tracker } = await resolveFile("main.scss")

    expect(output).toEqual("@mixin m{}\n$c: red;\n.main{}")
    expect(tracker.has(join(root, "_mixins.scss"))).toBe(true)
  })
  it("leaves plain css imports of sass files to the compiler", async () => {
    const scss = "@import url(foo.css);\n@import 'theme.css';\n.main{}"
    root = await createFixture({ "main.scss": scss, "foo.css": ".f{}" })

    expect((await resolveFile("main.scss")).output).toEqual(scss)
  })
})

describe("javascript imports", () => {
  it("inlines side effect imports", async () => {
    root = await createFixture({
      "main.js": `import "./util.js";\nconsole.log(u)`,
      "util.js": "var u = 1;",
    })

    expect((await resolveFile("main.js", { kind: "js" })).output).toEqual(
      "var u = 1;\nconsole.log(u)"
    )
  })
  it("ignores imports in comments and strings", async () => {
    const js = `/*\nimport "./util.js";\n*/\nvar s = "import './util.js';"`
    root = await createFixture({ "main.js": js, "util.js": "var u = 1;" })

    expect((await resolveFile("main.js", { kind: "js" })).output).toEqual(js)
  })
})

describe("findImports", () => {
  it("picks the syntax from the extension", () => {
    const source = `@import "a.css";\n// @import "b.css";`

    expect(
      findImports(source, syntaxFor("x.less", "css")).map(s => s.targets)
    ).toEqual([["a.css"]])
    expect(
      findImports(source, syntaxFor("x.css", "css")).map(s => s.targets)
    ).toEqual([["a.css"], ["b.css"]])
  })
})
