import { afterEach, describe, expect, it, vi } from "vitest"
import { ConfigurationError, TemplateError } from "../src/errors"
import { compileTemplate, TemplateEngine, templateMode, TemplateStore } from "../src/template"
import { writeSite } from "./helpers"
import * as path from "path"

function engineWith(templates: Record<string, string>, defaultTemplate = "page.html"): TemplateEngine {
  const engine = new TemplateEngine(defaultTemplate)
  for (const [id, source] of Object.entries(templates)) {
    engine.add(compileTemplate(id, source))
  }
  return engine
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe("templateMode", () => {
  it("picks the mode from the extension", () => {
    expect(templateMode("default.html")).toBe("substitution")
    expect(templateMode("post.code")).toBe("expression")
    expect(templateMode("none")).toBe("none")
  })

  it("rejects unknown template types", () => {
    expect(() => templateMode("layout.jade")).toThrow(ConfigurationError)
  })

  it("reports syntax errors as configuration errors", () => {
    expect(() => compileTemplate("bad.code", "tag(")).toThrow(ConfigurationError)
  })
})

describe("substitution templates", () => {
  it("replaces placeholders with metadata and content", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    const engine = engineWith({ "page.html": "<h1>$title$</h1>$content$ $$5 $missing$" })

    expect(engine.render({ title: "Hi" }, "<p>x</p>")).toBe("<h1>Hi</h1><p>x</p> $5 ")
    expect(engine.render({ title: "Again" }, "")).toBe("<h1>Again</h1> $5 ")
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith("template page.html: no value for $missing$")
  })

  it("flattens metadata values to strings", () => {
    const engine = engineWith({ "page.html": "$tags$|$count$|$draft$|$nothing$" })
    expect(engine.render({ tags: ["a", "b"], count: 3, draft: true, nothing: null }, "")).toBe("a b|3|true|")
  })
})

describe("TemplateEngine", () => {
  it("uses the template named in metadata before the default", () => {
    const engine = engineWith({ "page.html": "default:$content$", "other.html": "other:$content$" })
    expect(engine.render({ template: "other.html" }, "x")).toBe("other:x")
    expect(engine.render({}, "x")).toBe("default:x")
  })

  it("renders expression templates", () => {
    const engine = engineWith({ "page.code": "tag(\"h1\", metadata.title) content" }, "page.code")
    expect(engine.render({ title: "Hi" }, "<p>x</p>")).toBe("<h1>Hi</h1><p>x</p>")
  })

  it("binds content the same way in both modes", () => {
    const engine = engineWith({ "a.html": "[$content$]", "b.code": "\"[\" content \"]\"" })
    const body = "<p>Body & \"more\"</p>"
    const substituted = engine.render({ template: "a.html" }, body)
    const evaluated = engine.render({ template: "b.code" }, body)
    expect(substituted).toBe("[" + body + "]")
    expect(evaluated).toBe(substituted)
  })

  it("treats the content as the template for none", () => {
    const engine = engineWith({ "page.html": "$content$" })
    expect(engine.render({ template: "none", title: "T" }, "tag(\"b\", metadata.title)")).toBe("<b>T</b>")
    expect(() => engine.render({ template: "none" }, "tag(")).toThrow(TemplateError)
  })

  it("fails for templates that were never loaded", () => {
    const engine = engineWith({ "page.html": "$content$" })
    expect(() => engine.render({ template: "missing.html" }, "")).toThrow(ConfigurationError)
  })

  it("wraps evaluation errors", () => {
    const engine = engineWith({ "page.code": "doctype(\"html6\")" }, "page.code")
    expect(() => engine.render({}, "")).toThrow(TemplateError)
  })

  it("only knows its own doctypes", () => {
    const engine = engineWith({ "page.code": "doctype(\"constructor\")" }, "page.code")
    expect(() => engine.render({}, "")).toThrow(TemplateError)
  })
})

describe("TemplateStore", () => {
  it("loads templates from the templates directory", async () => {
    const root = await writeSite({ "templates/default.html": "<main>$content$</main>" })
    const store = new TemplateStore(path.join(root, "templates"))
    const engine = new TemplateEngine("default.html")
    await engine.prepare(store, [])

    expect(engine.render({}, "hi")).toBe("<main>hi</main>")
    expect(store.load("default.html")).toBe(store.load("default.html"))
  })

  it("reports missing templates as configuration errors", async () => {
    const root = await writeSite({ "templates/default.html": "" })
    const store = new TemplateStore(path.join(root, "templates"))
    await expect(store.load("missing.html")).rejects.toThrow(ConfigurationError)
    await expect(store.load("../config.html")).rejects.toThrow(/outside/)
  })
})
