import { defineConfig, defineProject } from "vitest/config"
import path from "node:path"
import { fileURLToPath } from "node:url"

const root = path.dirname(fileURLToPath(import.meta.url))

const alias = {
  "@handoff/core": path.resolve(root, `./packages/core/src`),
}

export default defineConfig({
  test: {
    projects: [
      defineProject({
        test: {
          name: `core`,
          include: [`packages/core/**/*.test.ts`],
        },
        resolve: { alias },
      }),
      defineProject({
        test: {
          name: `cli`,
          include: [`packages/cli/**/*.test.ts`],
        },
        resolve: { alias },
      }),
    ],
    coverage: {
      provider: `v8`,
      reporter: [`text`, `json`, `html`],
    },
  },
})
