import { createProgram } from './program.js'

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error('[cli] Fatal:', err)
    process.exitCode = 1
  })
