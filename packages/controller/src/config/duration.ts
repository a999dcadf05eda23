/** Milliseconds per duration unit */
const DURATION_UNITS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
}

const SEGMENT = /(\d+(?:\.\d+)?)(ns|us|µs|ms|s|m|h)/y

/**
 * Parse an interval such as `30s`, `1m`, `1h30m` or `500ms` into milliseconds.
 * A bare integer is taken as milliseconds. Returns undefined when the text
 * is not a duration.
 */
export const parseDuration = (value: string): number | undefined => {
  const input = value.trim()
  if (input === '') {
    return undefined
  }
  if (/^\d+$/.test(input)) {
    return Number(input)
  }

  let total = 0
  let offset = 0
  while (offset < input.length) {
    SEGMENT.lastIndex = offset
    const match = SEGMENT.exec(input)
    const amount = match?.[1]
    const unit = match?.[2]
    const perUnit = unit === undefined ? undefined : DURATION_UNITS[unit]
    if (amount === undefined || perUnit === undefined) {
      return undefined
    }
    total += Number(amount) * perUnit
    offset = SEGMENT.lastIndex
  }

  return Math.round(total)
}
