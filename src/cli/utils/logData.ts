import {green, red} from './colors.ts'

function formatValue(value: unknown): string {
  if (value === true) return green(String(value))
  if (value === false) return red(String(value))
  return String(value)
}

/**
 * Write structured data as either JSON (--json) or colored `key: value` lines.
 * Nested objects are written as an indented block under their key.
 */
export function logData(
  data: Record<string, unknown>,
  json: boolean | undefined,
  out: NodeJS.WritableStream = process.stdout,
): void {
  if (json) {
    out.write(JSON.stringify(data, null, 2) + '\n')
    return
  }

  const writeEntries = (entries: [string, unknown][], indent: string) => {
    for (const [key, value] of entries) {
      if (value === undefined || typeof value === 'function') continue
      if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
        out.write(`${indent}${green(key)}:\n`)
        writeEntries(Object.entries(value), indent + '  ')
      } else if (Array.isArray(value)) {
        if (value.length === 0) continue
        out.write(`${indent}${green(key)}: ${value.map(formatValue).join(', ')}\n`)
      } else {
        out.write(`${indent}${green(key)}: ${formatValue(value)}\n`)
      }
    }
  }

  writeEntries(Object.entries(data), '')
}
