const UNITS = ['Bytes', 'KB', 'MB', 'GB', 'TB']

/**
 * Human-readable byte count, e.g. `1.5 KB`
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 Bytes'

  const k = 1024
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), UNITS.length - 1)

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${UNITS[i]}`
}
