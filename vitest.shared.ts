import { fileURLToPath } from "node:url"

import type { ViteUserConfig } from "vitest/config"

const packageDir = (dir: string, sub: string) => fileURLToPath(new URL(`./packages/${dir}/${sub}`, import.meta.url))

const alias = (dir: string, name: string) => ({
  [`${name}/test`]: packageDir(dir, "test"),
  [`${name}`]: packageDir(dir, "src")
})

const config: ViteUserConfig = {
  test: {
    alias: {
      ...alias("firehose", "firehose-client")
    },
    watch: false,
    environment: "node",
    include: ["test/**/*.{test,spec}.ts"],
    reporters: ["default"],
    coverage: {
      reportsDirectory: "./test-output/vitest/coverage",
      provider: "v8" as const
    }
  }
}

export default config
