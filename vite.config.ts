import { fileURLToPath, URL } from 'node:url'

import { defineConfig } from 'vite'
import { StaticSiteCompiler } from './src/plugin'

// 生成的站点写入 publicDir, 由 vite 提供预览
export default defineConfig({
  publicDir: fileURLToPath(new URL('./site/html', import.meta.url)),
  plugins: [StaticSiteCompiler({ root: fileURLToPath(new URL('./site', import.meta.url)) })],
})
