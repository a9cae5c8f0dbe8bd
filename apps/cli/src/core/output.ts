/**
 * Line-oriented output for commands. `data` prints strings as-is and
 * everything else as indented JSON, so `--json` callers get parseable stdout.
 */

export interface Writer {
  write(chunk: string): unknown
}

export type TableColumn = string | { key: string; label?: string }
export type TableRow = Record<string, unknown>

export interface OutputFormatter {
  data(value: unknown): void
  table(rows: TableRow[], columns?: TableColumn[]): void
  message(text: string): void
  warn(text: string): void
  error(text: string): void
}

export interface OutputFormatterConfig {
  stdout: Writer
  stderr: Writer
}

const writeLine = (stream: Writer, line: string): void => {
  stream.write(`${line}\n`)
}

const valueToCell = (value: unknown): string => {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return JSON.stringify(value)
}

const normalizeColumns = (columns: TableColumn[] | undefined, rows: TableRow[]): { key: string; label: string }[] => {
  if (columns && columns.length > 0) {
    return columns.map((column) =>
      typeof column === 'string' ? { key: column, label: column } : { key: column.key, label: column.label ?? column.key },
    )
  }
  const first = rows[0]
  if (!first) return []
  return Object.keys(first).map((key) => ({ key, label: key }))
}

export const renderTable = (rows: TableRow[], columns?: TableColumn[]): string[] => {
  const normalized = normalizeColumns(columns, rows)
  if (normalized.length === 0) return []

  const widths = normalized.map((column) => column.label.length)
  for (const row of rows) {
    normalized.forEach((column, index) => {
      widths[index] = Math.max(widths[index] ?? 0, valueToCell(row[column.key]).length)
    })
  }

  const line = (cells: string[]): string =>
    cells
      .map((cell, index) => cell.padEnd(widths[index] ?? 0, ' '))
      .join('  ')
      .trimEnd()

  return [
    line(normalized.map((column) => column.label)),
    ...rows.map((row) => line(normalized.map((column) => valueToCell(row[column.key])))),
  ]
}

export const createOutputFormatter = (config: OutputFormatterConfig): OutputFormatter => ({
  data(value) {
    writeLine(config.stdout, typeof value === 'string' ? value : JSON.stringify(value, null, 2))
  },
  table(rows, columns) {
    for (const line of renderTable(rows, columns)) writeLine(config.stdout, line)
  },
  message(text) {
    writeLine(config.stdout, text)
  },
  warn(text) {
    writeLine(config.stderr, `warning: ${text}`)
  },
  error(text) {
    writeLine(config.stderr, `error: ${text}`)
  },
})
