import { normalizePath, type ResolvedConfig } from "vite"
import * as path from "path"
import { compileSite } from "../data"
import type { BuildReport } from "./shared"

export interface StaticSiteOptions {
  // 站点根目录, 包含 config.yaml
  root: string,
  // 默认写到 vite 的 publicDir
  outDir?: string
}

// 转换器插件
export function StaticSiteCompiler(options: StaticSiteOptions) {
  const root = normalizePath(path.resolve(options.root))
  let outDir = options.outDir

  return {
    name: "static-site-compiler",

    configResolved(resolvedConfig: Pick<ResolvedConfig, "publicDir">) {
      if (outDir === undefined) {
        outDir = resolvedConfig.publicDir
      }
    },

    async buildStart(): Promise<void> {
      console.log("compile site " + root)
      const report: BuildReport = await compileSite(root, outDir)
      console.log(`generated ${report.written.length} files`)
    },
  }
}
