import {createReadStream} from 'node:fs'
import {stat} from 'node:fs/promises'
import {resolve} from 'node:path'
import type {Readable} from 'node:stream'
import {ObjectCannedACL} from '@aws-sdk/client-s3'
import {deployArchive} from '../../operations/deployArchive.ts'
import {createDryRunObjectStore, createS3ObjectStore} from '../../storage/index.ts'
import type {ObjectStore} from '../../storage/index.ts'
import {formatBytes} from '../../utils/formatBytes.ts'
import {CliExitError} from '../utils/CliExitError.ts'
import {formatSuccess, formatWarning} from '../utils/formatMessage.ts'
import {logData} from '../utils/logData.ts'
import {createPrefixLog} from '../utils/prefixLog.ts'
import type {PrefixLog} from '../utils/prefixLog.ts'
import type {CliCommand, CliContext} from '../utils/types.ts'

export interface DeployOptions {
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
}

const CANNED_ACLS: readonly string[] = Object.values(ObjectCannedACL)

function isCannedAcl(value: string): value is ObjectCannedACL {
  return CANNED_ACLS.includes(value)
}

/**
 * Open the archive as a stream; `-` reads stdin
 */
async function openArchive(cwd: string, archive: string): Promise<Readable> {
  if (archive === '-') return process.stdin

  const path = resolve(cwd, archive)
  const stats = await stat(path).catch((error: NodeJS.ErrnoException) => {
    if (error.code === 'ENOENT') throw new Error(`Archive not found: ${archive}`)
    throw error
  })
  if (!stats.isFile()) {
    throw new Error(`Archive is not a file: ${archive}`)
  }
  return createReadStream(path)
}

export type CreateObjectStore = (options: DeployOptions, log: PrefixLog) => ObjectStore

const createObjectStore: CreateObjectStore = (options, log) =>
  options.dryRun
    ? createDryRunObjectStore(log)
    : createS3ObjectStore({region: options.region, endpoint: options.endpoint, forcePathStyle: options.forcePathStyle}, log)

/**
 * Deploy command - unpack an archive into an S3 bucket
 */
export function createDeployCommand(createStore: CreateObjectStore = createObjectStore): CliCommand<[string, DeployOptions]> {
  return (ctx, archive, options) => runDeploy(ctx, archive, options, createStore)
}

export const deploy = createDeployCommand()

async function runDeploy(
  ctx: CliContext,
  archive: string,
  options: DeployOptions,
  createStore: CreateObjectStore,
): Promise<void> {
  const log = createPrefixLog(ctx.cliName, options.dryRun ? 'dry-run' : 'deploy')

  const {acl} = options
  if (!isCannedAcl(acl)) {
    throw new Error(`Invalid --acl value: "${acl}". Must be one of: ${CANNED_ACLS.join(', ')}.`)
  }

  const input = await openArchive(ctx.cwd, archive)
  const store = createStore(options, log)

  const destination = `s3://${options.bucket}/${options.prefix}`
  log.verbose(`Source: ${archive === '-' ? 'stdin' : archive}`)
  log.verbose(`Destination: ${destination} (${options.region})`)
  log.verbose(`Concurrency: ${options.concurrency}`)

  const controller = new AbortController()
  const onSigint = () => {
    log.warn('Cancelling upload...')
    controller.abort()
  }
  process.once('SIGINT', onSigint)

  try {
    const summary = await deployArchive(store, input, {
      bucket: options.bucket,
      prefix: options.prefix,
      stripComponents: options.stripComponents,
      acl,
      cacheControl: options.cacheControl,
      compress: options.compress,
      concurrency: options.concurrency,
      log,
      signal: controller.signal,
    })

    if (ctx.json) {
      logData({bucket: options.bucket, prefix: options.prefix, dryRun: Boolean(options.dryRun), ...summary}, true, ctx.stdout)
    } else if (!ctx.silent) {
      logData(
        {
          destination,
          files: summary.files,
          uploaded: summary.uploaded,
          failed: summary.failed,
          skipped: summary.skipped,
          size: formatBytes(summary.bytes),
          duration: `${(summary.durationMs / 1000).toFixed(1)}s`,
        },
        false,
        ctx.stdout,
      )
    }

    if (summary.cancelled) {
      throw new CliExitError('Upload cancelled', 130)
    }
    if (summary.failed > 0) {
      throw new CliExitError(`${summary.failed} of ${summary.files} uploads failed`, 1)
    }

    log.info(formatSuccess(`Unpacked ${summary.uploaded} files into ${destination}`))
    if (summary.skipped > 0) {
      log.verbose(formatWarning(`${summary.skipped} entries skipped`))
    }
  } finally {
    process.removeListener('SIGINT', onSigint)
    if (input !== process.stdin) input.destroy()
    store.close()
  }
}
