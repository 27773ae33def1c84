import {cyan, magenta, dim, green, yellow, red, blue} from './colors.ts'
import log from './log.ts'
import type {LogTransport} from './log.ts'

/**
 * Structured prefix logger (npm-style).
 * Every line starts with the CLI name and level, followed by the context
 * segments collected through `prefix()`.
 *
 * Usage:
 *   const l = createPrefixLog('untar-s3', 'deploy')
 *   l.info('Bucket: assets')                   // untar-s3 info deploy Bucket: assets
 *   l.prefix('archive').verbose('Skipping a/') // untar-s3 verbose deploy archive Skipping a/
 */
export interface PrefixLog {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
  verbose(message: string): void
  http(message: string): void
  prefix(segment: string): PrefixLog
}

type Level = 'info' | 'warn' | 'error' | 'verbose' | 'http'

function formatSegments(segments: string[]): string {
  return segments
    .map((segment, i) => {
      // command name stands out, phases are dimmed
      if (i === 0) return magenta(segment)
      return dim(segment)
    })
    .join(' ')
}

function levelColor(level: Level): string {
  switch (level) {
    case 'info':
      return green(level)
    case 'warn':
      return yellow(level)
    case 'error':
      return red(level)
    case 'verbose':
      return dim(level)
    case 'http':
      return blue(level)
  }
}

function createLogger(cliName: string, segments: string[]): PrefixLog {
  function emit(level: Level, message: string): void {
    const context = segments.length > 0 ? ` ${formatSegments(segments)}` : ''
    const line = `${cyan(cliName)} ${levelColor(level)}${context} ${message}`
    const transport: LogTransport = level
    log[transport](line)
  }

  return {
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
    verbose: message => emit('verbose', message),
    http: message => emit('http', message),
    prefix: segment => createLogger(cliName, [...segments, segment]),
  }
}

export function createPrefixLog(cliName: string, ...segments: string[]): PrefixLog {
  return createLogger(cliName, segments)
}
