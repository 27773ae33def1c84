import {Command, CommanderError, InvalidArgumentError, Option} from 'commander'
import {ObjectCannedACL} from '@aws-sdk/client-s3'
import {DEFAULT_CACHE_CONTROL} from '../../operations/uploadObject.ts'
import {deploy} from '../commands/deploy.ts'
import {CliExitError} from './CliExitError.ts'
import {getCliName, getCliVersion} from './cliName.ts'
import {red, cyan} from './colors.ts'
import type {CliContext} from './types.ts'

type RunCliOptions = {
  stdout?: NodeJS.WritableStream
  stderr?: NodeJS.WritableStream
}

interface ProgramOptions {
  bucket: string
  prefix: string
  region: string
  concurrency: number
  stripComponents: number
  compress: boolean
  acl: string
  cacheControl: string
  endpoint?: string
  forcePathStyle?: boolean
  dryRun?: boolean
  debug?: boolean
  silent?: boolean
  json?: boolean
  logLevel: string
}

const LEVEL_OPTIONS = {
  silent: 0,
  error: 1,
  warn: 2,
  notice: 3,
  http: 4,
  info: 5,
  verbose: 6,
  silly: 7,
}

type LogLevel = keyof typeof LEVEL_OPTIONS

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_OPTIONS, value)
}

type LogListener = (level: string, ...args: unknown[]) => void

function parsePositiveInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.')
  }
  return parsed
}

/**
 * proc-log listener writing lines up to `maxLevel`. Errors and warnings go to
 * stderr; with --json everything does, so stdout carries only the JSON result.
 */
function createLogListener(
  maxLevel: LogLevel,
  streams: {stdout: NodeJS.WritableStream; stderr: NodeJS.WritableStream; json?: boolean},
): LogListener {
  return (level, ...args) => {
    if (!isLogLevel(level) || LEVEL_OPTIONS[level] > LEVEL_OPTIONS[maxLevel]) return

    const message = args.map(arg => (typeof arg === 'string' ? arg : JSON.stringify(arg))).join(' ')
    const toStderr = streams.json || level === 'error' || level === 'warn'
    ;(toStderr ? streams.stderr : streams.stdout).write(message + '\n')
  }
}

function createProgram(streams: {stdout: NodeJS.WritableStream; stderr: NodeJS.WritableStream}, listeners: LogListener[]) {
  const program = new Command()
  const cliName = getCliName()

  program
    .name(cliName)
    .description('Unpack a tar archive (.tar, .tar.gz) from the local filesystem into an S3 bucket.')
    .version(getCliVersion())
    .argument('<archive>', 'Archive to unpack ("-" reads stdin)')
    .requiredOption('-b, --bucket <name>', 'Name of the S3 bucket to unpack to')
    .option('-p, --prefix <prefix>', 'Prefix this to the key of every uploaded file', '')
    .addOption(new Option('-r, --region <region>', 'Region of the S3 bucket').env('AWS_REGION').default('us-west-2'))
    .option('-c, --concurrency <n>', 'Number of concurrent uploads', parsePositiveInteger, 50)
    .option('--strip-components <n>', 'Strip N leading path components from entry names', parseNonNegativeInteger, 0)
    .option('--no-compress', 'Disable gzip compression of known text file types')
    .addOption(
      new Option('--acl <acl>', 'Canned ACL applied to every object')
        .choices(Object.values(ObjectCannedACL))
        .default('public-read'),
    )
    .option('--cache-control <value>', 'Cache-Control header for every object', DEFAULT_CACHE_CONTROL)
    .addOption(new Option('--endpoint <url>', 'S3-compatible endpoint URL').env('AWS_ENDPOINT_URL_S3'))
    .option('--force-path-style', 'Use path-style bucket addressing')
    .option('--dry-run', 'Show what would be uploaded without uploading')
    .option('--debug', 'Show verbose debug output (same as --log-level verbose)')
    .option('-s, --silent', 'Suppress all output')
    .option('--json', 'Output the summary as JSON')
    .addOption(new Option('--log-level <level>', 'Set log level').choices(Object.keys(LEVEL_OPTIONS)).default('info'))

  // Attach the proc-log listener before the command runs, using Commander-parsed options
  program.hook('preAction', () => {
    const opts = program.opts<ProgramOptions>()
    const requested = opts.silent ? 'silent' : opts.debug ? 'verbose' : opts.logLevel
    const maxLevel = isLogLevel(requested) ? requested : 'info'
    if (LEVEL_OPTIONS[maxLevel] <= 0) return

    const listener = createLogListener(maxLevel, {...streams, json: opts.json})
    listeners.push(listener)
    process.on('log', listener)
  })

  program.action(async (archive: string, options: ProgramOptions) => {
    const ctx: CliContext = {
      cliName,
      cwd: process.cwd(),
      stdout: streams.stdout,
      silent: options.silent,
      json: options.json,
    }
    await deploy(ctx, archive, options)
  })

  return program
}

export async function program(args: string[], options: RunCliOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout
  const stderr = options.stderr ?? process.stderr
  const listeners: LogListener[] = []

  const program = createProgram({stdout, stderr}, listeners)

  program.configureOutput({
    writeOut: str => {
      stdout.write(str)
    },
    writeErr: str => {
      stderr.write(str)
    },
  })

  program.exitOverride()

  try {
    await program.parseAsync(args, {from: 'user'})
    return 0
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }

    const err = error instanceof Error ? error : new Error(String(error))
    const opts = program.opts<ProgramOptions>()

    // a failed deploy has already written its JSON summary
    if (opts.json && !(err instanceof CliExitError)) {
      stdout.write(JSON.stringify({error: err.message}) + '\n')
    } else {
      const isVerbose = opts.debug || opts.logLevel === 'verbose' || opts.logLevel === 'silly'
      const text = isVerbose && err.stack && !(err instanceof CliExitError) ? err.stack : err.message
      for (const line of text.split('\n')) {
        stderr.write(`${cyan(program.name())} ${red('error')} ${line}\n`)
      }
    }

    return err instanceof CliExitError ? err.exitCode : 1
  } finally {
    for (const listener of listeners) {
      process.removeListener('log', listener)
    }
  }
}
