import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    name: `@termcmp/interpreter`,
    include: [`tests/**/*.test.ts`],
    environment: `node`,
  },
})
