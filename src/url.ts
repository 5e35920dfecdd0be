import * as path from "path"
import * as luxon from "luxon"
import { DateParseError } from "./errors"

// 文件名中的日期格式
const DateTokenFormat = "yyyy-MM-dd"

export const RssDateFormat = "EEE, d MMM yyyy HH:mm:ss ZZZ"
export const SnippetDateFormat = "dd MMM yyyy"
export const MonthLabelFormat = "MMMM yyyy"

export interface PostName {
  year: string,
  month: string,
  day: string,
  slug: string,
  date: luxon.DateTime
}

// 去掉目录和扩展名
export function baseName(file: string): string {
  return path.basename(file, path.extname(file))
}

// 按 "-" 切割, 最多4段, 第4段保留剩下的连字符
function splitName(name: string): string[] {
  const parts: string[] = []
  let rest = name
  while (parts.length < 3) {
    const at = rest.indexOf("-")
    if (at < 0) {
      break
    }
    parts.push(rest.slice(0, at))
    rest = rest.slice(at + 1)
  }
  parts.push(rest)
  return parts
}

export function parseDate(token: string, format: string): luxon.DateTime | null {
  const date = luxon.DateTime.fromFormat(token, format, { zone: "utc", locale: "en-US" })
  return date.isValid ? date : null
}

// yyyy-MM-dd-slug.ext
export function parsePostName(file: string): PostName {
  const parts = splitName(baseName(file))
  if (parts.length < 4) {
    throw new DateParseError(file, "expected yyyy-MM-dd-slug")
  }
  const [year, month, day, slug] = parts
  if (slug == "") {
    throw new DateParseError(file, "empty slug")
  }

  const date = parseDate(`${year}-${month}-${day}`, DateTokenFormat)
  if (date == null) {
    throw new DateParseError(file, `invalid date ${year}-${month}-${day}`)
  }

  return { year, month, day, slug, date }
}

// 文章的URL: /[subdir/]yyyy/MM/dd/slug/
export function postURL(file: string, subdir: string): string {
  const name = parsePostName(file)
  const url = `/${name.year}/${name.month}/${name.day}/${name.slug}/`
  if (subdir == "") {
    return url
  }
  return "/" + subdir + url
}

// 页面的输出路径(以 / 分隔), 扩展名替换为 extension
export function siteURL(relative: string, extension?: string): string {
  const ext = path.posix.extname(relative)
  return relative.slice(0, relative.length - ext.length) + (extension ?? ".html")
}

// yyyy-MM
export function monthKey(file: string): string {
  return baseName(file).slice(0, 7)
}

export function formatPostDate(file: string, format: string): string {
  return parsePostName(file).date.toFormat(format)
}

export function formatMonth(key: string): string {
  const date = parseDate(key, "yyyy-MM")
  if (date == null) {
    throw new DateParseError(key, "invalid month")
  }
  return date.toFormat(MonthLabelFormat)
}
