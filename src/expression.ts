import * as markup from "./markup"
import { Markup } from "./markup"
import { TemplateError } from "./errors"
import { parseDate } from "./url"
import type { Metadata } from "./shared"

// 表达式模板:
// 一串表达式, 每个表达式求值后渲染, 结果拼接起来.
// 只能访问 metadata 和 content 两个绑定, 以及下面固定的内置函数.

export type Value =
  | string
  | number
  | boolean
  | null
  | Markup
  | Value[]
  | { [key: string]: Value }

export interface Environment {
  metadata: Metadata,
  content: string
}

type Literal = string | number | boolean | null

type TokenKind = "string" | "number" | "name" | "punct" | "eof"

interface Token {
  kind: TokenKind,
  text: string,
  // 字符串和数字的值
  value: Literal,
  line: number,
  column: number
}

type BinaryOp = "+" | "==" | "!=" | "&&" | "||"

export type Node =
  | { kind: "literal", value: Literal }
  | { kind: "name", name: string, at: string }
  | { kind: "array", items: Node[] }
  | { kind: "object", entries: [string, Node][] }
  | { kind: "member", target: Node, key: Node, at: string }
  | { kind: "call", callee: string, args: Node[], at: string }
  | { kind: "not", operand: Node }
  | { kind: "binary", op: BinaryOp, left: Node, right: Node }
  | { kind: "conditional", test: Node, then: Node, otherwise: Node }

export interface Program {
  body: Node[]
}

const Punctuation = ["==", "!=", "&&", "||", "(", ")", "[", "]", "{", "}", ",", ".", ":", "?", "!", "+"]

const Escapes: Record<string, string> = { n: "\n", t: "\t", r: "\r", "\\": "\\", "\"": "\"", "'": "'" }

function tokenize(source: string): Token[] {
  const tokens: Token[] = []
  let pos = 0
  let line = 1
  let lineStart = 0

  function fail(message: string): never {
    throw new TemplateError(`${message} at ${line}:${pos - lineStart + 1}`)
  }

  while (pos < source.length) {
    const ch = source.charAt(pos)

    if (ch == "\n") {
      pos++
      line++
      lineStart = pos
      continue
    }
    if (/\s/.test(ch)) {
      pos++
      continue
    }
    // 注释
    if (source.startsWith("//", pos)) {
      while (pos < source.length && source.charAt(pos) != "\n") {
        pos++
      }
      continue
    }

    const start = { line, column: pos - lineStart + 1 }

    if (ch == "\"" || ch == "'") {
      let text = ""
      pos++
      while (true) {
        if (pos >= source.length) {
          fail("unterminated string")
        }
        const c = source.charAt(pos)
        if (c == ch) {
          pos++
          break
        }
        if (c == "\n") {
          line++
          lineStart = pos + 1
        }
        if (c == "\\") {
          const escaped = Escapes[source.charAt(pos + 1)]
          if (escaped === undefined) {
            fail("bad escape")
          }
          text += escaped
          pos += 2
          continue
        }
        text += c
        pos++
      }
      tokens.push({ kind: "string", text, value: text, ...start })
      continue
    }

    const number = /^\d+(\.\d+)?/.exec(source.slice(pos))
    if (number) {
      tokens.push({ kind: "number", text: number[0], value: Number(number[0]), ...start })
      pos += number[0].length
      continue
    }

    const name = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(pos))
    if (name) {
      tokens.push({ kind: "name", text: name[0], value: null, ...start })
      pos += name[0].length
      continue
    }

    const punct = Punctuation.find(p => source.startsWith(p, pos))
    if (punct === undefined) {
      fail(`unexpected character ${JSON.stringify(ch)}`)
    }
    else {
      tokens.push({ kind: "punct", text: punct, value: null, ...start })
      pos += punct.length
    }
  }

  tokens.push({ kind: "eof", text: "", value: null, line, column: pos - lineStart + 1 })
  return tokens
}

class Parser {
  private tokens: Token[]
  private index = 0

  constructor(source: string) {
    this.tokens = tokenize(source)
  }

  private peek(): Token {
    const token = this.tokens[this.index]
    if (token === undefined) {
      throw new TemplateError("unexpected end of template")
    }
    return token
  }

  private next(): Token {
    const token = this.peek()
    if (token.kind != "eof") {
      this.index++
    }
    return token
  }

  private at(token: Token): string {
    return `${token.line}:${token.column}`
  }

  private isPunct(text: string): boolean {
    const token = this.peek()
    return token.kind == "punct" && token.text == text
  }

  private expect(text: string): Token {
    const token = this.next()
    if (token.kind != "punct" || token.text != text) {
      throw new TemplateError(`expected "${text}" but found "${token.text || "end of template"}" at ${this.at(token)}`)
    }
    return token
  }

  parseProgram(): Program {
    const body: Node[] = []
    while (this.peek().kind != "eof") {
      body.push(this.parseExpression())
    }
    return { body }
  }

  private parseExpression(): Node {
    const test = this.parseBinary(0)
    if (!this.isPunct("?")) {
      return test
    }
    this.next()
    const then = this.parseExpression()
    this.expect(":")
    const otherwise = this.parseExpression()
    return { kind: "conditional", test, then, otherwise }
  }

  // 优先级从低到高
  private static Levels: BinaryOp[][] = [["||"], ["&&"], ["==", "!="], ["+"]]

  private parseBinary(level: number): Node {
    const ops = Parser.Levels[level]
    if (ops === undefined) {
      return this.parseUnary()
    }
    let left = this.parseBinary(level + 1)
    while (true) {
      const token = this.peek()
      const op = ops.find(o => token.kind == "punct" && token.text == o)
      if (op === undefined) {
        return left
      }
      this.next()
      const right = this.parseBinary(level + 1)
      left = { kind: "binary", op, left, right }
    }
  }

  private parseUnary(): Node {
    if (this.isPunct("!")) {
      this.next()
      return { kind: "not", operand: this.parseUnary() }
    }
    return this.parsePostfix(this.parsePrimary())
  }

  private parsePostfix(target: Node): Node {
    while (true) {
      if (this.isPunct(".")) {
        const dot = this.next()
        const name = this.next()
        if (name.kind != "name") {
          throw new TemplateError(`expected property name at ${this.at(name)}`)
        }
        target = { kind: "member", target, key: { kind: "literal", value: name.text }, at: this.at(dot) }
      }
      else if (this.isPunct("[")) {
        const open = this.next()
        const key = this.parseExpression()
        this.expect("]")
        target = { kind: "member", target, key, at: this.at(open) }
      }
      else {
        return target
      }
    }
  }

  private parseList(close: string): Node[] {
    const items: Node[] = []
    while (!this.isPunct(close)) {
      items.push(this.parseExpression())
      if (!this.isPunct(close)) {
        this.expect(",")
      }
    }
    this.expect(close)
    return items
  }

  private parsePrimary(): Node {
    const token = this.next()

    switch (token.kind) {
      case "string":
      case "number":
        return { kind: "literal", value: token.value }
      case "name":
        if (token.text == "true" || token.text == "false") {
          return { kind: "literal", value: token.text == "true" }
        }
        if (token.text == "null") {
          return { kind: "literal", value: null }
        }
        if (this.isPunct("(")) {
          this.next()
          return { kind: "call", callee: token.text, args: this.parseList(")"), at: this.at(token) }
        }
        return { kind: "name", name: token.text, at: this.at(token) }
      case "punct":
        if (token.text == "(") {
          const inner = this.parseExpression()
          this.expect(")")
          return inner
        }
        if (token.text == "[") {
          return { kind: "array", items: this.parseList("]") }
        }
        if (token.text == "{") {
          return { kind: "object", entries: this.parseEntries() }
        }
        break
      case "eof":
        throw new TemplateError("unexpected end of template")
    }
    throw new TemplateError(`unexpected "${token.text}" at ${this.at(token)}`)
  }

  private parseEntries(): [string, Node][] {
    const entries: [string, Node][] = []
    while (!this.isPunct("}")) {
      const key = this.next()
      if (key.kind != "name" && key.kind != "string") {
        throw new TemplateError(`expected key at ${this.at(key)}`)
      }
      this.expect(":")
      entries.push([key.kind == "string" ? String(key.value) : key.text, this.parseExpression()])
      if (!this.isPunct("}")) {
        this.expect(",")
      }
    }
    this.expect("}")
    return entries
  }
}

export function parse(source: string): Program {
  return new Parser(source).parseProgram()
}

// =========================================================
// 求值
// =========================================================

function isRecord(value: Value): value is { [key: string]: Value } {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Markup)
}

function truthy(value: Value): boolean {
  if (Array.isArray(value)) {
    return value.length > 0
  }
  if (value instanceof Markup) {
    return value.html != ""
  }
  return Boolean(value)
}

function toChild(value: Value): markup.Child {
  if (isRecord(value)) {
    throw new TemplateError("cannot render an object")
  }
  if (Array.isArray(value)) {
    return value.map(toChild)
  }
  return value
}

function toAttributes(value: { [key: string]: Value }): markup.Attributes {
  const attrs: markup.Attributes = {}
  for (const [name, v] of Object.entries(value)) {
    if (typeof v === "object" && v !== null) {
      attrs[name] = markup.render(toChild(v))
    }
    else {
      attrs[name] = v
    }
  }
  return attrs
}

export function text(value: Value): string {
  return markup.render(toChild(value))
}

function expectString(value: Value | undefined, fn: string): string {
  if (typeof value !== "string") {
    throw new TemplateError(`${fn}: expected a string`)
  }
  return value
}

type Builtin = (args: Value[]) => Value

function tagCall(name: Value | undefined, rest: Value[]): Markup {
  const tagName = expectString(name, "tag")
  const [first, ...others] = rest
  if (first !== undefined && isRecord(first)) {
    return markup.h(tagName, toAttributes(first), ...others.map(toChild))
  }
  return markup.h(tagName, {}, ...rest.map(toChild))
}

const Builtins: Record<string, Builtin> = {
  tag: ([name, ...rest]) => tagCall(name, rest),
  link: ([href, ...children]) => markup.linkTo(expectString(href, "link"), ...children.map(toChild)),
  escape: ([value]) => markup.escapeHtml(text(value ?? null)),
  join: ([list, sep]) => {
    if (!Array.isArray(list)) {
      throw new TemplateError("join: expected a list")
    }
    return list.map(text).join(sep === undefined ? "" : text(sep))
  },
  split: ([value, sep]) => {
    if (Array.isArray(value)) {
      return value.map(text)
    }
    const source = text(value ?? null)
    if (sep === undefined) {
      return source.split(/\s+/).filter(s => s != "")
    }
    return source.split(expectString(sep, "split"))
  },
  // 每一项包一层标签
  wrap: ([list, name, attrs]) => {
    if (!Array.isArray(list)) {
      throw new TemplateError("wrap: expected a list")
    }
    return list.map(item => tagCall(name, attrs === undefined ? [item] : [attrs, item]))
  },
  doctype: ([kind]) => {
    try {
      return markup.doctype(expectString(kind, "doctype"))
    }
    catch (err) {
      throw new TemplateError("doctype: " + text(kind ?? null), { cause: err })
    }
  },
  css: ([href]) => markup.includeCss(expectString(href, "css")),
  js: ([src]) => markup.includeJs(expectString(src, "js")),
  // date(value, 输入格式, 输出格式)
  date: ([value, input, output]) => {
    const date = parseDate(text(value ?? null), expectString(input, "date"))
    if (date == null) {
      throw new TemplateError(`date: cannot parse ${text(value ?? null)}`)
    }
    return date.toFormat(expectString(output, "date"))
  },
}

function lookup(target: Value, key: Value, at: string): Value {
  if (Array.isArray(target) || typeof target === "string") {
    if (key === "length") {
      return target.length
    }
    if (typeof key === "number") {
      return target[key] ?? null
    }
    throw new TemplateError(`bad index ${text(key)} at ${at}`)
  }
  if (isRecord(target) && typeof key === "string") {
    // 只读取自身属性
    return Object.prototype.hasOwnProperty.call(target, key) ? target[key] ?? null : null
  }
  if (target === null) {
    return null
  }
  throw new TemplateError(`cannot read ${text(key)} at ${at}`)
}

function evaluate(node: Node, env: Map<string, Value>): Value {
  switch (node.kind) {
    case "literal":
      return node.value
    case "name": {
      const value = env.get(node.name)
      if (value === undefined) {
        throw new TemplateError(`unknown name ${node.name} at ${node.at}`)
      }
      return value
    }
    case "array":
      return node.items.map(item => evaluate(item, env))
    case "object": {
      const obj: { [key: string]: Value } = {}
      for (const [key, value] of node.entries) {
        obj[key] = evaluate(value, env)
      }
      return obj
    }
    case "member":
      return lookup(evaluate(node.target, env), evaluate(node.key, env), node.at)
    case "call": {
      const fn = Object.prototype.hasOwnProperty.call(Builtins, node.callee) ? Builtins[node.callee] : undefined
      if (fn === undefined) {
        throw new TemplateError(`unknown function ${node.callee} at ${node.at}`)
      }
      return fn(node.args.map(arg => evaluate(arg, env)))
    }
    case "not":
      return !truthy(evaluate(node.operand, env))
    case "conditional":
      return truthy(evaluate(node.test, env)) ? evaluate(node.then, env) : evaluate(node.otherwise, env)
    case "binary": {
      const left = evaluate(node.left, env)
      switch (node.op) {
        case "&&":
          return truthy(left) ? evaluate(node.right, env) : left
        case "||":
          return truthy(left) ? left : evaluate(node.right, env)
      }
      const right = evaluate(node.right, env)
      if (node.op == "+") {
        if (typeof left === "number" && typeof right === "number") {
          return left + right
        }
        return text(left) + text(right)
      }
      return node.op == "==" ? equals(left, right) : !equals(left, right)
    }
  }
}

function equals(a: Value, b: Value): boolean {
  if (a instanceof Markup && b instanceof Markup) {
    return a.html == b.html
  }
  return a === b
}

// 渲染整个程序
export function run(program: Program, env: Environment): string {
  const bindings = new Map<string, Value>([
    ["metadata", env.metadata],
    ["content", env.content],
  ])
  return program.body.map(node => text(evaluate(node, bindings))).join("")
}
