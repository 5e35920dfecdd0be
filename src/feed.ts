import { escapeHtml, h, html, Markup, doctype, xmlDeclaration } from "./markup"
import { formatPostDate, RssDateFormat } from "./url"
import { FeedSize } from "./shared"

export interface FeedChannel {
  title: string,
  link: string,
  description: string
}

export interface FeedItem {
  path: string,
  title: string,
  url: string,
  body: string
}

// 最新的 FeedSize 篇文章, 按存储顺序反转后截取
export function feedPosts<T>(posts: T[]): T[] {
  return [...posts].reverse().slice(0, FeedSize)
}

export function absoluteURL(base: string, url: string): string {
  return new URL(url, base).toString()
}

export function rssItem(channel: FeedChannel, item: FeedItem): Markup {
  return h("item",
    h("title", escapeHtml(item.title)),
    h("link", escapeHtml(absoluteURL(channel.link, item.url))),
    h("pubDate", formatPostDate(item.path, RssDateFormat)),
    h("description", escapeHtml(item.body)))
}

// items 已经按新到旧排列
export function rssFeed(channel: FeedChannel, items: Markup[]): string {
  return html(
    xmlDeclaration("UTF-8"),
    doctype("xhtml-strict"),
    h("rss", { version: "2.0" },
      h("channel",
        h("title", escapeHtml(channel.title)),
        h("link", escapeHtml(channel.link)),
        h("description", escapeHtml(channel.description)),
        items))).html
}

// 首页, 文章, 页面
export function sitemap(base: string, postURLs: string[], pageURLs: string[]): string {
  return html(
    xmlDeclaration("UTF-8"),
    h("urlset", { xmlns: "http://www.sitemaps.org/schemas/sitemap/0.9" },
      h("url", h("loc", escapeHtml(base))),
      postURLs.map(url => h("url", h("loc", escapeHtml(base + url)))),
      pageURLs.map(url => h("url", h("loc", escapeHtml(base + "/" + url)))))).html
}
