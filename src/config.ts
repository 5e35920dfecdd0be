import * as yaml from "js-yaml"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { ConfigurationError } from "./errors"
import * as shared from "./shared"

// 配置文件中的键 --> SiteConfig 的字段
const StringKeys = {
  "site-title": "siteTitle",
  "site-description": "siteDescription",
  "site-url": "siteUrl",
  "default-template": "defaultTemplate",
  "post-out-subdir": "postOutSubdir",
  "out-dir": "outDir",
} as const

const IntegerKeys = {
  "posts-per-page": "postsPerPage",
  "workers": "workers",
} as const

function defaults(root: string): Omit<shared.SiteConfig, "siteUrl"> {
  return {
    root: root,
    siteTitle: "A Static Blog",
    siteDescription: "Default blog description",
    defaultTemplate: shared.DefaultTemplate,
    postsPerPage: 2,
    postOutSubdir: "",
    blogAsIndex: true,
    outDir: "html",
    workers: os.availableParallelism(),
  }
}

// 解析已经读取的配置
export function parseConfig(root: string, source: string): shared.SiteConfig {
  let raw: unknown
  try {
    raw = yaml.load(source)
  }
  catch (err) {
    throw new ConfigurationError("config file is not valid yaml", { cause: err })
  }

  // 空文件等同于空映射
  const data = raw ?? {}
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigurationError("config file must be a mapping")
  }
  const infos = new Map<string, unknown>(Object.entries(data))

  const config = { ...defaults(root), siteUrl: "" }

  for (const [key, field] of Object.entries(StringKeys)) {
    const value = infos.get(key)
    if (value === undefined || value === null) {
      continue
    }
    if (typeof value !== "string") {
      throw new ConfigurationError(`config key ${key} must be a string`)
    }
    config[field] = value
  }

  for (const [key, field] of Object.entries(IntegerKeys)) {
    const value = infos.get(key)
    if (value === undefined || value === null) {
      continue
    }
    if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
      throw new ConfigurationError(`config key ${key} must be a positive integer`)
    }
    config[field] = value
  }

  const asIndex = infos.get("blog-as-index")
  if (asIndex !== undefined && asIndex !== null) {
    if (typeof asIndex !== "boolean") {
      throw new ConfigurationError("config key blog-as-index must be true or false")
    }
    config.blogAsIndex = asIndex
  }

  if (config.siteUrl.trim() == "") {
    throw new ConfigurationError("config key site-url is required")
  }
  config.siteUrl = config.siteUrl.trim().replace(/\/+$/, "")
  config.postOutSubdir = config.postOutSubdir.replace(/^\/+|\/+$/g, "")

  return config
}

// 读取站点根目录下的 config.yaml
export function loadConfig(root: string): shared.SiteConfig {
  root = path.resolve(root)
  const file = path.join(root, shared.ConfigFileName)

  let source: string
  try {
    source = fs.readFileSync(file, "utf8")
  }
  catch (err) {
    throw new ConfigurationError("cannot read config file " + file, { cause: err })
  }

  return parseConfig(root, source)
}
