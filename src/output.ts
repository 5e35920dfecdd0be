import * as fs from "fs/promises"
import * as path from "path"
import { OutputError } from "./errors"

// 写出到输出目录, 自动创建父目录, 覆盖已有文件
export class OutputWriter {
  readonly root: string

  constructor(root: string) {
    this.root = path.resolve(root)
  }

  resolve(relative: string): string {
    const file = path.resolve(this.root, relative.replace(/^\/+/, ""))
    if (path.relative(this.root, file).startsWith("..")) {
      throw new OutputError(relative, { cause: new Error("path escapes the output directory") })
    }
    return file
  }

  async writeOutput(relative: string, content: string | Uint8Array): Promise<void> {
    const file = this.resolve(relative)
    try {
      await fs.mkdir(path.dirname(file), { recursive: true })
      await fs.writeFile(file, content)
    }
    catch (err) {
      throw new OutputError(relative, { cause: err })
    }
  }

  // 清理输出目录
  async clean(): Promise<void> {
    try {
      await fs.rm(this.root, { recursive: true, force: true })
      await fs.mkdir(this.root, { recursive: true })
    }
    catch (err) {
      throw new OutputError(this.root, { cause: err })
    }
  }
}
