/**
 * CLI context passed to all command handlers
 */
export interface CliContext {
  /** The CLI name (e.g., 'untar-s3') */
  cliName: string
  /** The current working directory */
  cwd: string
  /** Where command results (not log lines) are written */
  stdout: NodeJS.WritableStream
  /** Suppress all proc-log output (--silent) */
  silent?: boolean
  /** Output as JSON (--json) */
  json?: boolean
}

/**
 * Type for CLI command functions
 * All commands receive CliContext as first argument and return Promise<void>
 */
export type CliCommand<Args extends unknown[] = []> = (ctx: CliContext, ...args: Args) => Promise<void>
