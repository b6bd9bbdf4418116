import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    name: `@termcmp/tracing`,
    include: [`tests/**/*.test.ts`],
    environment: `node`,
  },
})
