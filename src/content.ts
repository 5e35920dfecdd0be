import * as yaml from "js-yaml"
import { marked } from "marked"
import { glob } from "glob"
import * as fs from "fs/promises"
import * as path from "path"
import { ContentParseError } from "./errors"
import * as shared from "./shared"

// 内容来源
export interface ContentStore {
  // 按文件名升序
  listContentUnits(kind: shared.ContentKind): Promise<string[]>
  readUnit(file: string): Promise<shared.ContentUnit>
  // 相对 kind 目录的路径
  relativePath(file: string): string
}

const MarkdownExtensions = new Set([".md", ".markdown"])

// 把yaml的值转换成元数据的值
function toMetadataValue(value: unknown): shared.MetadataValue {
  if (value === undefined || value === null) {
    return null
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value
  }
  // yaml 中的日期
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10)
  }
  if (Array.isArray(value)) {
    return value.map(toMetadataValue)
  }
  if (typeof value === "object") {
    const out: { [key: string]: shared.MetadataValue } = {}
    for (const [k, v] of Object.entries(value)) {
      out[k] = toMetadataValue(v)
    }
    return out
  }
  return String(value)
}

export interface ParsedDocument {
  metadata: shared.Metadata,
  body: string
}

// <!--
// yaml
// -->
// 正文
export function parseDocument(file: string, source: string): ParsedDocument {
  const lines = source.replace(/\r\n/g, "\n").split("\n")
  if (lines.length == 0 || lines[0]?.trim() != "<!--") {
    throw new ContentParseError(file, "not found heading")
  }

  let index = 1
  const headers: string[] = []
  while (index < lines.length && lines[index]?.trim() != "-->") {
    headers.push(lines[index] ?? "")
    index++
  }
  if (index >= lines.length) {
    throw new ContentParseError(file, "not found heading ending")
  }

  let infos: unknown
  try {
    infos = yaml.load(headers.join("\n"))
  }
  catch (err) {
    throw new ContentParseError(file, "heading is not valid yaml", { cause: err })
  }

  if (infos === null || infos === undefined) {
    throw new ContentParseError(file, "the heading is empty")
  }
  const metadata = toMetadataValue(infos)
  if (typeof metadata !== "object" || metadata === null || Array.isArray(metadata)) {
    throw new ContentParseError(file, "the heading must be a mapping")
  }
  const title = metadata["title"]
  if (typeof title === "number" || typeof title === "boolean") {
    // title: 1984
    metadata["title"] = String(title)
  }
  else if (typeof title !== "string") {
    throw new ContentParseError(file, "the heading has no title")
  }

  return { metadata, body: lines.slice(index + 1).join("\n") }
}

// 标签: 空白分隔的字符串或者列表
export function tagsOf(metadata: shared.Metadata): string[] {
  const tags = metadata["tags"]
  if (typeof tags === "string") {
    return tags.split(/\s+/).filter(t => t != "")
  }
  if (Array.isArray(tags)) {
    return tags.filter((t): t is string | number => typeof t === "string" || typeof t === "number").map(String)
  }
  return []
}

export function titleOf(metadata: shared.Metadata): string {
  const title = metadata["title"]
  return typeof title === "string" ? title : ""
}

// 惰性求值, 只计算一次
export function lazy<T>(compute: () => Promise<T>): () => Promise<T> {
  let value: Promise<T> | undefined
  return () => {
    if (value === undefined) {
      value = compute()
    }
    return value
  }
}

// 文件系统上的内容: {root}/posts, {root}/pages
export class FileContentStore implements ContentStore {
  readonly root: string

  // 解析过的文件
  private parsed: Map<string, Promise<shared.ContentUnit>> = new Map()

  constructor(root: string) {
    this.root = path.resolve(root)
  }

  dirOf(kind: shared.ContentKind): string {
    return path.join(this.root, kind == "posts" ? shared.PostsDir : shared.PagesDir)
  }

  relativePath(file: string): string {
    const rel = path.relative(this.dirOf("posts"), file)
    if (!rel.startsWith("..")) {
      return rel
    }
    return path.relative(this.dirOf("pages"), file)
  }

  async listContentUnits(kind: shared.ContentKind): Promise<string[]> {
    const dir = this.dirOf(kind)
    const files = await glob(kind == "posts" ? "*" : "**/*", { cwd: dir, nodir: true, dot: false, posix: true })
    files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    return files.map(file => path.join(dir, file))
  }

  readUnit(file: string): Promise<shared.ContentUnit> {
    let unit = this.parsed.get(file)
    if (unit === undefined) {
      unit = this.load(file)
      this.parsed.set(file, unit)
    }
    return unit
  }

  private async load(file: string): Promise<shared.ContentUnit> {
    let source: string
    try {
      source = await fs.readFile(file, "utf8")
    }
    catch (err) {
      throw new ContentParseError(file, "cannot read file", { cause: err })
    }

    const document = parseDocument(file, source)
    const kind: shared.ContentKind = path.relative(this.dirOf("posts"), file).startsWith("..") ? "pages" : "posts"

    return {
      path: file,
      kind,
      metadata: document.metadata,
      body: lazy(async () => {
        if (MarkdownExtensions.has(path.extname(file).toLowerCase())) {
          return await marked.parse(document.body)
        }
        return document.body
      }),
    }
  }
}
