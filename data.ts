import * as path from "path"
import { normalizePath } from "vite"
import { buildArchiveIndex, buildPages, buildTagIndex, postsForMonth } from "./src/aggregate"
import { loadConfig } from "./src/config"
import { FileContentStore, titleOf, type ContentStore } from "./src/content"
import { BuildFailedError, describeError } from "./src/errors"
import { feedPosts, rssFeed, rssItem, sitemap, type FeedChannel } from "./src/feed"
import type { Markup } from "./src/markup"
import { OutputWriter } from "./src/output"
import * as pages from "./src/pages"
import { parallelMap, settle } from "./src/pool"
import * as shared from "./src/shared"
import { TemplateEngine, TemplateStore } from "./src/template"
import { parsePostName, postURL, siteURL } from "./src/url"

// 计时
export async function logTimeElapsed<T>(msg: string, run: () => Promise<T>): Promise<T> {
  const start = performance.now()
  const ret = await run()
  console.log(`${msg} ${((performance.now() - start) / 1000).toFixed(3)} secs`)
  return ret
}

// 编译运行
// 每次构建都从头计算整个站点, 不保留任何状态
export class CompileRun {
  readonly config: shared.SiteConfig

  readonly store: ContentStore

  readonly templates: TemplateStore

  readonly writer: OutputWriter

  readonly engine: TemplateEngine

  // 解析成功的文章和页面, 按文件名升序
  posts: shared.ContentUnit[] = []
  sitePages: shared.ContentUnit[] = []

  failures: shared.UnitFailure[] = []

  written: string[] = []

  constructor(config: shared.SiteConfig, store: ContentStore, templates: TemplateStore, writer: OutputWriter) {
    this.config = config
    this.store = store
    this.templates = templates
    this.writer = writer
    this.engine = new TemplateEngine(config.defaultTemplate)
  }

  // 获取文章的url
  getUrlOfPoster(file: string): string {
    return postURL(file, this.config.postOutSubdir)
  }

  // 页面的输出路径
  getPathOfPage(unit: shared.ContentUnit): string {
    const extension = unit.metadata["extension"]
    return siteURL(normalizePath(this.store.relativePath(unit.path)), typeof extension === "string" ? extension : undefined)
  }

  private fail(file: string, error: unknown) {
    console.error(`failed to process ${file}: ${describeError(error)}`)
    this.failures.push({ path: file, error })
  }

  private async write(relative: string, content: string) {
    await this.writer.writeOutput(relative, content)
    this.written.push(relative)
    console.log("generate " + relative)
  }

  // 读取所有文章和页面, 加载用到的模板
  async parse() {
    const load = async (kind: shared.ContentKind) => {
      const files = await this.store.listContentUnits(kind)
      const outcomes = await parallelMap(files, this.config.workers, file => settle(async () => {
        const unit = await this.store.readUnit(file)
        if (kind == "posts") {
          parsePostName(file)
        }
        return unit
      }))

      const units: shared.ContentUnit[] = []
      outcomes.forEach((outcome, index) => {
        if (outcome.ok) {
          units.push(outcome.value)
        }
        else {
          this.fail(files[index] ?? "", outcome.error)
        }
      })
      return units
    }

    this.posts = await load("posts")
    this.sitePages = await load("pages")

    const ids = [...this.posts, ...this.sitePages]
      .map(unit => unit.metadata["template"])
      .filter((id): id is string => typeof id === "string" && id != "")
    await this.engine.prepare(this.templates, ids)
  }

  // 渲染单个文章或页面, 失败时记录下来
  private async renderUnit(unit: shared.ContentUnit, type: string, output: () => string) {
    const outcome = await settle(async () => {
      const content = await unit.body()
      if (content.trim() == "") {
        console.warn("Empty Content: " + unit.path)
      }
      return { file: output(), html: this.engine.render({ ...unit.metadata, type }, content) }
    })

    if (!outcome.ok) {
      this.fail(unit.path, outcome.error)
      return
    }
    await this.write(outcome.value.file, outcome.value.html)
  }

  async processPosts() {
    await parallelMap(this.posts, this.config.workers, async post => {
      const url = this.getUrlOfPoster(post.path)
      console.log("compile " + post.path + " --> " + url)
      await this.renderUnit(post, "post", () => url.replace(/^\//, "") + "index.html")
    })
  }

  async processSite() {
    await parallelMap(this.sitePages, this.config.workers, async page => {
      await this.renderUnit(page, "site", () => this.getPathOfPage(page))
    })
  }

  // 使用默认模板渲染生成的页面
  private renderGenerated(title: string, content: Markup, extra: shared.Metadata = {}): string {
    return this.engine.render({ ...extra, title, template: this.config.defaultTemplate }, content.html)
  }

  private async snippetOf(post: shared.ContentUnit): Promise<pages.Snippet> {
    return {
      path: post.path,
      url: this.getUrlOfPoster(post.path),
      title: titleOf(post.metadata),
      body: await post.body(),
    }
  }

  private async snippets(posts: shared.ContentUnit[]): Promise<pages.Snippet[]> {
    return await parallelMap(posts, this.config.workers, post => this.snippetOf(post))
  }

  async createTags() {
    const index = buildTagIndex(this.posts, file => this.getUrlOfPoster(file))
    await this.write("tags/index.html", this.renderGenerated("Tags", pages.tagsPage(index)))
  }

  async createArchives() {
    const counts = buildArchiveIndex(this.posts.map(post => post.path))
    await this.write("archives/index.html", this.renderGenerated("Archives", pages.archivesPage(counts)))

    // 同一个月的摘要顺序生成
    await parallelMap([...counts.keys()], this.config.workers, async key => {
      const posts: pages.Snippet[] = []
      for (const post of postsForMonth(this.posts, key, post => post.path)) {
        posts.push(await this.snippetOf(post))
      }
      await this.write(pages.monthPath(key), this.renderGenerated("Archives", pages.monthPage(posts)))
    })
  }

  async createLatestPosts() {
    const newestFirst = await this.snippets([...this.posts].reverse())
    const paged = buildPages(newestFirst, this.config.postsPerPage)
    const metadata = { description: this.config.siteDescription }

    await parallelMap(paged, this.config.workers, async page => {
      const rendered = this.renderGenerated(this.config.siteTitle, pages.latestPostsPage(page), metadata)
      await this.write(pages.latestPostsPath(page.index), rendered)
      // 最新的一页作为首页
      if (this.config.blogAsIndex && page.index == paged.length - 1) {
        await this.write("index.html", rendered)
      }
    })
  }

  channel(): FeedChannel {
    return {
      title: this.config.siteTitle,
      link: this.config.siteUrl,
      description: this.config.siteDescription,
    }
  }

  async createRss() {
    const channel = this.channel()
    const items = await parallelMap(feedPosts(this.posts), this.config.workers, async post => rssItem(channel, {
      path: post.path,
      title: titleOf(post.metadata),
      url: this.getUrlOfPoster(post.path),
      body: await post.body(),
    }))
    await this.write("rss-feed", rssFeed(channel, items))
  }

  async createSitemap() {
    await this.write("sitemap.xml", sitemap(
      this.config.siteUrl,
      this.posts.map(post => this.getUrlOfPoster(post.path)),
      this.sitePages.map(page => this.getPathOfPage(page))))
  }

  // 整个构建过程
  async build(): Promise<shared.BuildReport> {
    await logTimeElapsed("Parsed content", () => this.parse())

    await this.writer.clean()

    await logTimeElapsed("Processed posts", () => this.processPosts())
    await logTimeElapsed("Processed pages", () => this.processSite())
    await logTimeElapsed("Created tags", () => this.createTags())
    await logTimeElapsed("Created archives", () => this.createArchives())
    await logTimeElapsed("Created latest posts", () => this.createLatestPosts())
    await logTimeElapsed("Created RSS", () => this.createRss())
    await logTimeElapsed("Created sitemap", () => this.createSitemap())

    if (this.failures.length > 0) {
      throw new BuildFailedError([...this.failures].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)))
    }

    return { written: [...this.written].sort() }
  }
}

// 编译站点根目录下的内容, outDir 默认为配置中的 out-dir
export async function compileSite(root: string, outDir?: string): Promise<shared.BuildReport> {
  const config = loadConfig(root)
  const run = new CompileRun(
    config,
    new FileContentStore(config.root),
    new TemplateStore(path.join(config.root, shared.TemplatesDir)),
    new OutputWriter(outDir ?? path.resolve(config.root, config.outDir)))
  return await run.build()
}
