import { tagsOf, titleOf } from "./content"
import { baseName, monthKey } from "./url"
import type { ContentUnit, Page, TagEntry } from "./shared"

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

// {tag => [(url, title) ...]}, 标签升序, 同一标签内保持文章顺序(旧的在前)
export function buildTagIndex(posts: ContentUnit[], urlOf: (file: string) => string): Map<string, TagEntry[]> {
  const tags: Map<string, TagEntry[]> = new Map()

  posts.forEach(post => {
    if (post.metadata["tags"] === undefined) {
      return
    }
    const entry: TagEntry = { url: urlOf(post.path), title: titleOf(post.metadata) }
    tagsOf(post.metadata).forEach(tag => {
      const list = tags.get(tag)
      if (list === undefined) {
        tags.set(tag, [entry])
      }
      else {
        list.push(entry)
      }
    })
  })

  return new Map([...tags.entries()].sort(([a], [b]) => compareKeys(a, b)))
}

// {yyyy-MM => count}, 最近的月份在前
export function buildArchiveIndex(files: string[]): Map<string, number> {
  const counts: Map<string, number> = new Map()
  files.forEach(file => {
    const key = monthKey(file)
    counts.set(key, (counts.get(key) ?? 0) + 1)
  })
  return new Map([...counts.entries()].sort(([a], [b]) => compareKeys(b, a)))
}

// 某个月份的文章, 新的在前
export function postsForMonth<T>(posts: T[], key: string, pathOf: (post: T) => string): T[] {
  return posts.filter(post => baseName(pathOf(post)).startsWith(key)).reverse()
}

// 按固定大小切分
export function chunk<T>(items: T[], size: number): T[][] {
  const windows: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    windows.push(items.slice(i, i + size))
  }
  return windows
}

// newestFirst 切分成窗口, 编号反过来: 0 是最旧的窗口
export function buildPages<T>(newestFirst: T[], pageSize: number): Page<T>[] {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError("page size must be a positive integer")
  }

  const windows = chunk(newestFirst, pageSize).reverse()
  const paginated = newestFirst.length > pageSize
  const max = windows.length - 1

  return windows.map((posts, index) => ({
    index,
    posts,
    hasOlder: paginated && index != 0,
    hasNewer: paginated && index != max,
  }))
}
