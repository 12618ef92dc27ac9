import { mkdtemp, rm } from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { cacheKey, createJsonCache } from "../cache"

describe("createJsonCache", () => {
  let rootDir: string

  beforeEach(async () => {
    rootDir = await mkdtemp(path.join(os.tmpdir(), "json-cache-"))
  })

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true })
  })

  it("round-trips values per scope", async () => {
    const cache = createJsonCache(rootDir)
    const key = cacheKey("reverse-geocode:v1:ja:35.68124,139.76713")

    await cache.write("geocode", key, { formatted_address: "Tokyo" })

    await expect(cache.read("geocode", key)).resolves.toEqual({ formatted_address: "Tokyo" })
    await expect(cache.read("autocomplete", key)).resolves.toBeNull()
  })

  it("treats a missing entry as a miss", async () => {
    await expect(createJsonCache(rootDir).read("geocode", cacheKey("absent"))).resolves.toBeNull()
  })
})

describe("cacheKey", () => {
  it("is a stable hex digest", () => {
    expect(cacheKey("a")).toBe(cacheKey("a"))
    expect(cacheKey("a")).not.toBe(cacheKey("b"))
    expect(cacheKey("a")).toMatch(/^[0-9a-f]{64}$/)
  })
})
