/**
 * CLI logging through proc-log.
 *
 * proc-log emits `log` events on `process`. Nothing is printed unless a
 * listener is attached, which `program()` does once it knows the log level.
 * Tests can listen for the same events to capture output.
 */

// proc-log v4+ exposes its levels under `log`; @types/proc-log still describes
// the v3 flat exports, so the module is narrowed to the shape used here.
import procLogModule from 'proc-log'

interface ProcLog {
  log: {
    error: (...args: unknown[]) => void
    warn: (...args: unknown[]) => void
    http: (...args: unknown[]) => void
    info: (...args: unknown[]) => void
    verbose: (...args: unknown[]) => void
  }
}

const procLog = procLogModule as unknown as ProcLog

export type LogTransport = keyof ProcLog['log']

export default {
  error: (...args: unknown[]) => procLog.log.error(...args),
  warn: (...args: unknown[]) => procLog.log.warn(...args),
  // S3 requests
  http: (...args: unknown[]) => procLog.log.http(...args),
  info: (...args: unknown[]) => procLog.log.info(...args),
  // --debug / --log-level verbose
  verbose: (...args: unknown[]) => procLog.log.verbose(...args),
}
