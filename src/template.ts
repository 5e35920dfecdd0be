import * as fs from "fs/promises"
import * as path from "path"
import { ConfigurationError, TemplateError } from "./errors"
import * as expression from "./expression"
import * as shared from "./shared"

// 模板的两种模式
export type Template =
  | { mode: "expression", id: string, program: expression.Program }
  | { mode: "substitution", id: string, source: string }
  | { mode: "none", id: string }

export type TemplateMode = Template["mode"]

// 从文件扩展名判断模式
export function templateMode(id: string): TemplateMode {
  if (id == shared.NoneTemplate) {
    return "none"
  }
  switch (path.extname(id)) {
    case ".code":
      return "expression"
    case ".html":
    case ".htm":
    case ".txt":
      return "substitution"
  }
  throw new ConfigurationError(`unknown template type: ${id}`)
}

export function compileTemplate(id: string, source: string): Template {
  const mode = templateMode(id)
  if (mode == "none") {
    return { mode, id }
  }
  if (mode == "substitution") {
    return { mode, id, source }
  }
  try {
    return { mode, id, program: expression.parse(source) }
  }
  catch (err) {
    throw new ConfigurationError(`syntax error in template ${id}`, { cause: err })
  }
}

// 读取 templates/ 目录下的模板, 每个模板只读取一次
export class TemplateStore {
  readonly dir: string

  private loaded: Map<string, Promise<Template>> = new Map()

  constructor(dir: string) {
    this.dir = dir
  }

  async readTemplate(id: string): Promise<{ mode: TemplateMode, source: string }> {
    const mode = templateMode(id)
    if (mode == "none") {
      return { mode, source: "" }
    }
    const file = path.resolve(this.dir, id)
    if (path.relative(this.dir, file).startsWith("..")) {
      throw new ConfigurationError(`template ${id} is outside ${this.dir}`)
    }
    try {
      return { mode, source: await fs.readFile(file, "utf8") }
    }
    catch (err) {
      throw new ConfigurationError(`cannot read template ${id}`, { cause: err })
    }
  }

  load(id: string): Promise<Template> {
    let template = this.loaded.get(id)
    if (template === undefined) {
      template = this.readTemplate(id).then(({ source }) => compileTemplate(id, source))
      this.loaded.set(id, template)
    }
    return template
  }
}

// 把元数据拍平成字符串
function flatten(value: shared.MetadataValue): string {
  if (value === null) {
    return ""
  }
  if (Array.isArray(value)) {
    return value.map(flatten).join(" ")
  }
  if (typeof value === "object") {
    return JSON.stringify(value)
  }
  return String(value)
}

const Placeholder = /\$\$|\$([A-Za-z_][A-Za-z0-9_-]*)\$/g

export class TemplateEngine {
  readonly defaultTemplate: string

  private templates: Map<string, Template> = new Map()

  // 每个模板的每个缺失的键只警告一次
  private warned: Set<string> = new Set()

  constructor(defaultTemplate: string) {
    this.defaultTemplate = defaultTemplate
  }

  // 所有用到的模板必须在渲染之前加载
  async prepare(store: TemplateStore, ids: Iterable<string>): Promise<void> {
    const unique = [...new Set([this.defaultTemplate, ...ids])]
    const templates = await Promise.all(unique.map(id => store.load(id)))
    templates.forEach(template => this.templates.set(template.id, template))
  }

  add(template: Template) {
    this.templates.set(template.id, template)
  }

  resolve(metadata: shared.Metadata): Template {
    const requested = metadata["template"]
    const id = typeof requested === "string" && requested != "" ? requested : this.defaultTemplate
    if (id == shared.NoneTemplate) {
      return { mode: "none", id }
    }
    const template = this.templates.get(id)
    if (template === undefined) {
      throw new ConfigurationError(`template ${id} is not loaded`)
    }
    return template
  }

  render(metadata: shared.Metadata, content: string): string {
    const template = this.resolve(metadata)

    switch (template.mode) {
      case "substitution":
        return this.substitute(template, metadata, content)
      case "expression":
        return this.evaluate(template.program, metadata, content)
      case "none": {
        let program: expression.Program
        try {
          program = expression.parse(content)
        }
        catch (err) {
          throw new TemplateError("content is not a valid expression template", { cause: err })
        }
        return this.evaluate(program, metadata, content)
      }
    }
  }

  private evaluate(program: expression.Program, metadata: shared.Metadata, content: string): string {
    try {
      return expression.run(program, { metadata, content })
    }
    catch (err) {
      if (err instanceof TemplateError) {
        throw err
      }
      throw new TemplateError("failed to evaluate template", { cause: err })
    }
  }

  private substitute(template: Template & { mode: "substitution" }, metadata: shared.Metadata, content: string): string {
    const values = new Map<string, string>()
    for (const [key, value] of Object.entries(metadata)) {
      values.set(key, flatten(value))
    }
    values.set("content", content)

    return template.source.replace(Placeholder, (match: string, key: string | undefined) => {
      if (key === undefined) {
        return "$"
      }
      const value = values.get(key)
      if (value !== undefined) {
        return value
      }
      const warning = template.id + "/" + key
      if (!this.warned.has(warning)) {
        this.warned.add(warning)
        console.warn(`template ${template.id}: no value for $${key}$`)
      }
      return ""
    })
  }
}
