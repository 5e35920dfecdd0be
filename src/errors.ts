import type { UnitFailure } from "./shared"

// 配置错误, 在写出任何文件之前终止构建
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "ConfigurationError"
  }
}

export class ContentParseError extends Error {
  readonly path: string

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`failed to parse ${path}: ${reason}`, options)
    this.name = "ContentParseError"
    this.path = path
  }
}

// 文件名缺少 yyyy-MM-dd 日期
export class DateParseError extends Error {
  readonly path: string

  constructor(path: string, reason: string) {
    super(`bad post file name ${path}: ${reason}`)
    this.name = "DateParseError"
    this.path = path
  }
}

export class TemplateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "TemplateError"
  }
}

export class OutputError extends Error {
  readonly path: string

  constructor(path: string, options?: { cause?: unknown }) {
    super(`failed to write ${path}`, options)
    this.name = "OutputError"
    this.path = path
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  return String(err)
}

export class BuildFailedError extends Error {
  readonly failures: UnitFailure[]

  constructor(failures: UnitFailure[]) {
    const lines = failures.map(f => `  ${f.path}: ${describeError(f.error)}`)
    super(`build failed for ${failures.length} unit(s):\n${lines.join("\n")}`)
    this.name = "BuildFailedError"
    this.failures = failures
  }
}
