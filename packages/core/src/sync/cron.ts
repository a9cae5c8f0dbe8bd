/**
 * 5-field cron expressions for the sync schedule.
 * Fields: minute (0-59), hour (0-23), day of month (1-31), month (1-12), day of week (0-6, 0=Sunday).
 * Supports *, numbers, lists, ranges and steps. Evaluated in local time.
 */

interface FieldSpec {
  name: string
  min: number
  max: number
}

const FIELDS: readonly FieldSpec[] = [
  { name: 'minute', min: 0, max: 59 },
  { name: 'hour', min: 0, max: 23 },
  { name: 'day of month', min: 1, max: 31 },
  { name: 'month', min: 1, max: 12 },
  { name: 'day of week', min: 0, max: 6 },
]

export interface CronSchedule {
  expression: string
  minutes: ReadonlySet<number>
  hours: ReadonlySet<number>
  daysOfMonth: ReadonlySet<number>
  months: ReadonlySet<number>
  daysOfWeek: ReadonlySet<number>
}

function parseInteger(token: string): number | null {
  return /^\d+$/.test(token) ? parseInt(token, 10) : null
}

function expandField(token: string, field: FieldSpec): Set<number> | string {
  const values = new Set<number>()

  for (const part of token.split(',')) {
    const [rangePart, stepPart, extra] = part.split('/')
    if (extra !== undefined || rangePart === undefined || rangePart === '') return `malformed term: ${part}`

    let step = 1
    if (stepPart !== undefined) {
      const parsedStep = parseInteger(stepPart)
      if (parsedStep === null || parsedStep < 1) return `invalid step value: ${stepPart}`
      step = parsedStep
    }

    let low = field.min
    let high = field.max
    if (rangePart !== '*') {
      const bounds = rangePart.split('-')
      if (bounds.length > 2) return `invalid range: ${rangePart}`
      const from = parseInteger(bounds[0] ?? '')
      const to = bounds.length === 2 ? parseInteger(bounds[1] ?? '') : from
      if (from === null || to === null) return `invalid value: ${rangePart}`
      if (from > to) return `invalid range: ${rangePart}`
      low = from
      high = stepPart !== undefined && bounds.length === 1 ? field.max : to
    }

    if (low < field.min || high > field.max) return `value out of range (${field.min}-${field.max}): ${part}`
    for (let v = low; v <= high; v += step) values.add(v)
  }

  return values
}

/** Parse an expression, or return the reason it is invalid. */
export function parseCron(expression: string): CronSchedule | string {
  const tokens = expression.trim().split(/\s+/)
  if (tokens.length !== 5) return `expected 5 fields, got ${tokens.length}`

  const sets: Set<number>[] = []
  for (let i = 0; i < FIELDS.length; i++) {
    const field = expandField(tokens[i], FIELDS[i])
    if (typeof field === 'string') return `${FIELDS[i].name}: ${field}`
    sets.push(field)
  }

  return {
    expression: tokens.join(' '),
    minutes: sets[0],
    hours: sets[1],
    daysOfMonth: sets[2],
    months: sets[3],
    daysOfWeek: sets[4],
  }
}

/** Error message for an invalid expression, or null. */
export function validateCron(expression: string): string | null {
  const parsed = parseCron(expression)
  return typeof parsed === 'string' ? parsed : null
}

function scheduleMatches(schedule: CronSchedule, date: Date): boolean {
  return (
    schedule.minutes.has(date.getMinutes()) &&
    schedule.hours.has(date.getHours()) &&
    schedule.daysOfMonth.has(date.getDate()) &&
    schedule.months.has(date.getMonth() + 1) &&
    schedule.daysOfWeek.has(date.getDay())
  )
}

export function matchesCron(expression: string, date: Date): boolean {
  const schedule = parseCron(expression)
  return typeof schedule !== 'string' && scheduleMatches(schedule, date)
}

const SEARCH_LIMIT_MINUTES = 366 * 24 * 60

/** First matching minute strictly after `after`, searching up to a year ahead. */
export function nextCronMatch(expression: string, after: Date): Date | null {
  const schedule = parseCron(expression)
  if (typeof schedule === 'string') return null

  const cursor = new Date(after)
  cursor.setSeconds(0, 0)
  for (let i = 0; i < SEARCH_LIMIT_MINUTES; i++) {
    cursor.setTime(cursor.getTime() + 60_000)
    if (scheduleMatches(schedule, cursor)) return new Date(cursor)
  }
  return null
}

/** Local-time minute key used to fire at most once per matching minute. */
export function minuteKey(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}T${pad(date.getHours())}:${pad(date.getMinutes())}`
}

function uniformStep(values: readonly number[], field: FieldSpec): number | null {
  if (values.length < 2 || values[0] !== field.min) return null
  const step = values[1] - values[0]
  const expected = Math.floor((field.max - field.min) / step) + 1
  if (values.length !== expected) return null
  return values.every((v, i) => v === field.min + i * step) ? step : null
}

function clock(hour: number, minute: number): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`
}

/** Short English description; unusual expressions fall back to the raw form. */
export function describeCron(expression: string): string {
  const schedule = parseCron(expression)
  if (typeof schedule === 'string') return `Invalid: ${schedule}`

  const minutes = [...schedule.minutes].sort((a, b) => a - b)
  const hours = [...schedule.hours].sort((a, b) => a - b)
  const everyHour = hours.length === 24
  const everyDay = schedule.daysOfMonth.size === 31 && schedule.months.size === 12 && schedule.daysOfWeek.size === 7

  if (!everyDay) return `Cron: ${schedule.expression}`
  if (minutes.length === 60 && everyHour) return 'Every minute'

  const minuteStep = uniformStep(minutes, FIELDS[0])
  if (everyHour && minuteStep !== null) return `Every ${minuteStep} minutes`
  if (everyHour && minutes.length === 1) return `Every hour at minute ${minutes[0]}`

  if (minutes.length === 1) {
    const hourStep = uniformStep(hours, FIELDS[1])
    if (hourStep !== null) return `Every ${hourStep} hours at minute ${minutes[0]}`
    if (hours.length === 1) return `Every day at ${clock(hours[0], minutes[0])}`
  }

  return `Cron: ${schedule.expression}`
}
