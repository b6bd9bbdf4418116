import { defineWorkspace } from "vitest/config"

export default defineWorkspace([`packages/tracing`, `packages/interpreter`])
