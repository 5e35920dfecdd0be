import { h, html, linkTo, Markup } from "./markup"
import { formatMonth, formatPostDate, SnippetDateFormat } from "./url"
import type { Page, TagEntry } from "./shared"

// 索引页中展示的一篇文章
export interface Snippet {
  path: string,
  url: string,
  title: string,
  body: string
}

export function latestPostsURL(index: number): string {
  return `/latest-posts/${index}/`
}

export function latestPostsPath(index: number): string {
  return `latest-posts/${index}/index.html`
}

// 2023-01 --> archives/2023/01/
export function monthURL(key: string): string {
  return `/archives/${key.replace("-", "/")}/`
}

export function monthPath(key: string): string {
  return `archives/${key.replace("-", "/")}/index.html`
}

export function snippet(post: Snippet): Markup {
  return h("div",
    h("h2", linkTo(post.url, post.title)),
    h("p", { class: "publish_date" }, formatPostDate(post.path, SnippetDateFormat)),
    h("p", post.body))
}

// 上一页, 下一页
export function pager<T>(page: Page<T>): Markup[] {
  const links: Markup[] = []
  if (page.hasOlder) {
    links.push(h("div", { class: "pager-left" },
      linkTo(latestPostsURL(page.index - 1), "&laquo; Older Entries")))
  }
  if (page.hasNewer) {
    links.push(h("div", { class: "pager-right" },
      linkTo(latestPostsURL(page.index + 1), "Newer Entries &raquo;")))
  }
  return links
}

export function latestPostsPage(page: Page<Snippet>): Markup {
  return html(page.posts.map(snippet), pager(page))
}

export function tagsPage(tags: Map<string, TagEntry[]>): Markup {
  return html(
    h("h2", "Tags"),
    [...tags].map(([tag, posts]) => [
      h("h4", h("a", { name: tag }, tag)),
      h("ul", posts.map(post => h("li", linkTo(post.url, post.title)))),
    ]))
}

export function archivesPage(counts: Map<string, number>): Markup {
  return html(
    h("h2", "Archives"),
    h("ul", [...counts].map(([key, count]) =>
      h("li", linkTo(monthURL(key), formatMonth(key)), ` (${count})`))))
}

export function monthPage(posts: Snippet[]): Markup {
  return html(posts.map(snippet))
}
