
// 已经生成好的html, 插入时不再转义
export class Markup {
  readonly html: string

  constructor(html: string) {
    this.html = html
  }

  toString(): string {
    return this.html
  }
}

export type Child = string | number | boolean | null | undefined | Markup | Child[]

export type AttributeValue = string | number | boolean | null | undefined

export interface Attributes {
  [name: string]: AttributeValue
}

const VoidElements = new Set([
  "area", "base", "br", "col", "embed", "hr", "img", "input",
  "link", "meta", "param", "source", "track", "wbr",
])

const Doctypes: Record<string, string> = {
  "html5": "<!DOCTYPE html>\n",
  "xhtml-strict": "<!DOCTYPE html PUBLIC \"-//W3C//DTD XHTML 1.0 Strict//EN\" \"http://www.w3.org/TR/xhtml1/DTD/xhtml1-strict.dtd\">\n",
  "xhtml-transitional": "<!DOCTYPE html PUBLIC \"-//W3C//DTD XHTML 1.0 Transitional//EN\" \"http://www.w3.org/TR/xhtml1/DTD/xhtml1-transitional.dtd\">\n",
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
}

export function isAttributes(value: unknown): value is Attributes {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Markup)
}

function renderAttributes(attrs: Attributes): string {
  let out = ""
  // 保持书写顺序
  for (const [name, value] of Object.entries(attrs)) {
    if (value === undefined || value === null || value === false) {
      continue
    }
    const text = value === true ? name : String(value)
    out += ` ${name}="${escapeHtml(text)}"`
  }
  return out
}

// 字符串原样输出
export function render(child: Child): string {
  if (child === undefined || child === null) {
    return ""
  }
  if (child instanceof Markup) {
    return child.html
  }
  if (Array.isArray(child)) {
    return child.map(render).join("")
  }
  return String(child)
}

export function h(name: string, attrs?: Attributes | Child, ...children: Child[]): Markup {
  if (!isAttributes(attrs)) {
    children = [attrs, ...children]
    attrs = {}
  }

  const open = `<${name}${renderAttributes(attrs)}`
  const inner = render(children)
  if (inner == "" && VoidElements.has(name)) {
    return new Markup(open + " />")
  }
  return new Markup(`${open}>${inner}</${name}>`)
}

export function html(...children: Child[]): Markup {
  return new Markup(render(children))
}

export function raw(text: string): Markup {
  return new Markup(text)
}

export function linkTo(href: string, ...children: Child[]): Markup {
  return h("a", { href }, ...children)
}

export function xmlDeclaration(encoding: string): Markup {
  return new Markup(`<?xml version="1.0" encoding="${encoding}"?>\n`)
}

export function doctype(kind: string): Markup {
  const text = Object.prototype.hasOwnProperty.call(Doctypes, kind) ? Doctypes[kind] : undefined
  if (text === undefined) {
    throw new Error("unknown doctype " + kind)
  }
  return new Markup(text)
}

export function includeCss(href: string): Markup {
  return h("link", { type: "text/css", href, rel: "stylesheet" })
}

export function includeJs(src: string): Markup {
  return h("script", { type: "text/javascript", src })
}
