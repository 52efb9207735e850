import { createSingleFlight, isBundleError } from "../src"
import { deferred } from "./helpers"

describe("single flight", () => {
  it("runs one build for concurrent callers of a key", async () => {
    const flights = createSingleFlight<string>()
    const gate = deferred<string>()
    const build = jest.fn(() => gate.promise)

    const calls = [1, 2, 3].map(() => flights.execute("k", build))
    expect(flights.isInFlight("k")).toBe(true)

    gate.resolve("done")

    expect(await Promise.all(calls)).toEqual(["done", "done", "done"])
    expect(build).toHaveBeenCalledTimes(1)
    expect(flights.size()).toBe(0)
  })
  it("shares a failure and forgets the key afterwards", async () => {
    const flights = createSingleFlight<string>()
    const build = jest.fn(async () => {
      throw new Error("boom")
    })

    const first = flights.execute("k", build)
    const second = flights.execute("k", build)

    await expect(first).rejects.toThrow("boom")
    await expect(second).rejects.toThrow("boom")
    expect(build).toHaveBeenCalledTimes(1)

    await expect(flights.execute("k", async () => "again")).resolves.toEqual(
      "again"
    )
    expect(build).toHaveBeenCalledTimes(1)
  })
  it("runs different keys independently", async () => {
    const flights = createSingleFlight<string>()
    const a = deferred<string>()
    const b = deferred<string>()

    const first = flights.execute("a", () => a.promise)
    const second = flights.execute("b", () => b.promise)
    expect(flights.size()).toBe(2)

    b.resolve("b")
    expect(await second).toEqual("b")
    expect(flights.isInFlight("a")).toBe(true)

    a.resolve("a")
    expect(await first).toEqual("a")
  })
  it("rejects a build that waits on itself", async () => {
    const flights = createSingleFlight<string>()

    const error = await flights
      .execute("a", () => flights.execute("b", () => flights.execute("a", async () => "x")))
      .catch((e: unknown) => e)

    expect(isBundleError(error, "ReentrantBuild")).toBe(true)
    expect(flights.size()).toBe(0)
  })
  it("allows nested builds of other keys", async () => {
    const flights = createSingleFlight<string>()

    await expect(
      flights.execute("a", async () => `a+${await flights.execute("b", async () => "b")}`)
    ).resolves.toEqual("a+b")
  })
  it("turns a synchronous throw into a rejection", async () => {
    const flights = createSingleFlight<string>()

    await expect(
      flights.execute("k", () => {
        throw new Error("sync")
      })
    ).rejects.toThrow("sync")
    expect(flights.isInFlight("k")).toBe(false)
  })
})
