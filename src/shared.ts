
// 默认模板
export const DefaultTemplate = "default.html"

// 哨兵模板: 把内容本身当作模板
export const NoneTemplate = "none"

// RSS 中的文章数量
export const FeedSize = 10

// 输入目录
export const PostsDir = "posts"
export const PagesDir = "pages"
export const TemplatesDir = "templates"

export const ConfigFileName = "config.yaml"

// 元数据的值(经过yaml解析)
export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue }

// 文章或页面的头部
export interface Metadata {
  [key: string]: MetadataValue
}

export type ContentKind = "posts" | "pages"

// 每个输入文件
export interface ContentUnit {
  path: string,
  kind: ContentKind,
  metadata: Metadata,
  // 惰性读取, 最多读取一次
  body: () => Promise<string>
}

// 站点配置
export interface SiteConfig {
  // 站点根目录(绝对路径)
  root: string,
  siteTitle: string,
  siteDescription: string,
  siteUrl: string,
  defaultTemplate: string,
  postsPerPage: number,
  postOutSubdir: string,
  blogAsIndex: boolean,
  outDir: string,
  workers: number
}

// 标签索引项
export interface TagEntry {
  url: string,
  title: string
}

// 分页
export interface Page<T> {
  // 0 是最旧的一页
  index: number,
  posts: T[],
  hasOlder: boolean,
  hasNewer: boolean
}

export interface UnitFailure {
  path: string,
  error: unknown
}

export interface BuildReport {
  // 写出的文件(相对输出目录)
  written: string[]
}
