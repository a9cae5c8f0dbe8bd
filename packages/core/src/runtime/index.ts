export { createRuntime } from './runtime.js'
export type { RuntimeOptions, CaseKBRuntime } from './runtime.js'
