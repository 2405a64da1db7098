import { defineConfig, defineProject } from "vitest/config"
import path from "node:path"
import { fileURLToPath } from "node:url"

const root = path.dirname(fileURLToPath(import.meta.url))

const alias = {
  "@aplus/scheduler": path.resolve(root, `./packages/scheduler/src/index.ts`),
  "@aplus/promise": path.resolve(root, `./packages/promise/src/index.ts`),
}

export default defineConfig({
  test: {
    projects: [
      defineProject({
        test: {
          name: `scheduler`,
          include: [`packages/scheduler/**/*.test.ts`],
        },
        resolve: { alias },
      }),
      defineProject({
        test: {
          name: `promise`,
          include: [`packages/promise/**/*.test.ts`],
        },
        resolve: { alias },
      }),
    ],
  },
})
