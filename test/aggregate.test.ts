import { describe, expect, it } from "vitest"
import { buildArchiveIndex, buildPages, buildTagIndex, chunk, postsForMonth } from "../src/aggregate"
import * as pages from "../src/pages"
import type { ContentUnit, Metadata } from "../src/shared"
import { postURL } from "../src/url"

function unit(path: string, metadata: Metadata): ContentUnit {
  return { path, kind: "posts", metadata, body: async () => "" }
}

const url = (file: string) => postURL(file, "")

describe("buildTagIndex", () => {
  const posts = [
    unit("posts/2023-01-01-a.md", { title: "A", tags: "b a" }),
    unit("posts/2023-01-02-b.md", { title: "B" }),
    unit("posts/2023-02-01-c.md", { title: "C", tags: "a" }),
  ]

  it("groups posts under every tag they declare", () => {
    const index = buildTagIndex(posts, url)
    expect(index.get("a")).toEqual([
      { url: "/2023/01/01/a/", title: "A" },
      { url: "/2023/02/01/c/", title: "C" },
    ])
    expect(index.get("b")).toEqual([{ url: "/2023/01/01/a/", title: "A" }])
  })

  it("skips posts without tags", () => {
    const index = buildTagIndex(posts, url)
    const titles = [...index.values()].flat().map(entry => entry.title)
    expect(titles).not.toContain("B")
  })

  it("orders tags lexicographically", () => {
    const index = buildTagIndex([
      unit("posts/2023-01-01-a.md", { title: "A", tags: "zebra apple Zed" }),
    ], url)
    expect([...index.keys()]).toEqual(["Zed", "apple", "zebra"])
  })

  it("accepts tag lists", () => {
    const index = buildTagIndex([unit("posts/2023-01-01-a.md", { title: "A", tags: ["x", "y"] })], url)
    expect([...index.keys()]).toEqual(["x", "y"])
  })
})

describe("buildArchiveIndex", () => {
  const files = [
    "posts/2022-12-31-eve.md",
    "posts/2023-01-01-a.md",
    "posts/2023-01-15-b.md",
    "posts/2023-03-02-c.md",
  ]

  it("counts posts per month, newest month first", () => {
    expect([...buildArchiveIndex(files)]).toEqual([
      ["2023-03", 1],
      ["2023-01", 2],
      ["2022-12", 1],
    ])
  })

  it("lists a month's posts newest first", () => {
    expect(postsForMonth(files, "2023-01", file => file)).toEqual([
      "posts/2023-01-15-b.md",
      "posts/2023-01-01-a.md",
    ])
  })
})

describe("buildPages", () => {
  it("gives the oldest window index 0", () => {
    const paged = buildPages(["2023-01-02", "2023-01-01"], 1)
    expect(paged).toEqual([
      { index: 0, posts: ["2023-01-01"], hasOlder: false, hasNewer: true },
      { index: 1, posts: ["2023-01-02"], hasOlder: true, hasNewer: false },
    ])
  })

  it("links both ways from middle pages and leaves the last window short", () => {
    const paged = buildPages([5, 4, 3, 2, 1], 2)
    expect(paged.map(p => p.posts)).toEqual([[1], [3, 2], [5, 4]])
    expect(paged[1]).toMatchObject({ hasOlder: true, hasNewer: true })
  })

  it("omits navigation when everything fits on one page", () => {
    expect(buildPages([2, 1], 2)).toEqual([{ index: 0, posts: [2, 1], hasOlder: false, hasNewer: false }])
    expect(buildPages([2, 1], 5)).toEqual([{ index: 0, posts: [2, 1], hasOlder: false, hasNewer: false }])
  })

  it("returns no pages for no posts", () => {
    expect(buildPages([], 3)).toEqual([])
  })

  it("rejects a page size below one", () => {
    expect(() => buildPages([1], 0)).toThrow(RangeError)
  })

  it("chunks in order", () => {
    expect(chunk([1, 2, 3], 2)).toEqual([[1, 2], [3]])
  })
})

describe("pager", () => {
  it("links the oldest page only to newer entries", () => {
    const [first] = buildPages(["b", "a"], 1)
    expect(first && pages.pager(first).map(String)).toEqual([
      "<div class=\"pager-right\"><a href=\"/latest-posts/1/\">Newer Entries &raquo;</a></div>",
    ])
  })

  it("links the newest page only to older entries", () => {
    const newest = buildPages(["c", "b", "a"], 1)[2]
    expect(newest && pages.pager(newest).map(String)).toEqual([
      "<div class=\"pager-left\"><a href=\"/latest-posts/1/\">&laquo; Older Entries</a></div>",
    ])
  })
})

describe("pages", () => {
  it("renders the archive list", () => {
    const html = pages.archivesPage(new Map([["2023-01", 2]])).html
    expect(html).toBe("<h2>Archives</h2><ul><li><a href=\"/archives/2023/01/\">January 2023</a> (2)</li></ul>")
  })

  it("renders a snippet", () => {
    const html = pages.snippet({ path: "2023-01-01-a.md", url: "/2023/01/01/a/", title: "A", body: "hi" }).html
    expect(html).toBe("<div><h2><a href=\"/2023/01/01/a/\">A</a></h2><p class=\"publish_date\">01 Jan 2023</p><p>hi</p></div>")
  })

  it("maps month keys to archive paths", () => {
    expect(pages.monthPath("2023-01")).toBe("archives/2023/01/index.html")
    expect(pages.latestPostsPath(3)).toBe("latest-posts/3/index.html")
  })
})
