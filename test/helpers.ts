import { glob } from "glob"
import * as fs from "fs/promises"
import * as os from "os"
import * as path from "path"

// 在临时目录中写入一个站点
export async function writeSite(files: Record<string, string>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "inkpress-"))
  for (const [name, content] of Object.entries(files)) {
    const file = path.join(root, name)
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(file, content)
  }
  return root
}

export async function readOut(dir: string, relative: string): Promise<string> {
  return await fs.readFile(path.join(dir, relative), "utf8")
}

// 目录下所有文件(相对路径, 排序)
export async function listFiles(dir: string): Promise<string[]> {
  const files = await glob("**/*", { cwd: dir, nodir: true, posix: true })
  return files.sort()
}

export function post(title: string, body: string, extra = ""): string {
  return `<!--\ntitle: ${title}\n${extra}-->\n${body}`
}
