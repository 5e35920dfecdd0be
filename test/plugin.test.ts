import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import * as fs from "fs/promises"
import * as path from "path"
import { StaticSiteCompiler } from "../src/plugin"
import { listFiles, post, writeSite } from "./helpers"

const Site = {
  "config.yaml": "site-url: https://example.com\n",
  "templates/default.html": "$content$",
  "posts/2023-01-01-first.md": post("First", "Hello"),
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe("StaticSiteCompiler", () => {
  it("compiles the site into vite's public directory", async () => {
    const root = await writeSite(Site)
    const publicDir = path.join(root, "public")
    const plugin = StaticSiteCompiler({ root })

    plugin.configResolved({ publicDir })
    await plugin.buildStart()

    expect(await listFiles(publicDir)).toContain("2023/01/01/first/index.html")
  })

  it("prefers an explicit output directory", async () => {
    const root = await writeSite(Site)
    const plugin = StaticSiteCompiler({ root, outDir: path.join(root, "dist") })

    plugin.configResolved({ publicDir: path.join(root, "public") })
    await plugin.buildStart()

    expect(await listFiles(path.join(root, "dist"))).toContain("sitemap.xml")
    await expect(fs.access(path.join(root, "public"))).rejects.toThrow()
  })
})
