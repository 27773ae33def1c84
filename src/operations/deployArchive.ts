import type {Readable} from 'node:stream'
import type {ObjectStore} from '../storage/index.ts'
import type {ArchiveReadResult, DeploySummary, ReadArchiveOptions, UploadResult, UploadSettings} from './types.ts'
import {readArchive} from './readArchive.ts'
import {uploadObject} from './uploadObject.ts'
import {UploadPool} from './uploadPool.ts'

export interface DeployArchiveOptions extends ReadArchiveOptions, UploadSettings {
  concurrency: number
}

function summarize(read: ArchiveReadResult, results: PromiseSettledResult<UploadResult>[], startedAt: number): DeploySummary {
  let uploaded = 0
  let failed = 0
  let bytes = 0

  for (const result of results) {
    if (result.status === 'fulfilled' && result.value.status === 'uploaded') {
      uploaded++
      bytes += result.value.bytes
    } else {
      failed++
    }
  }

  return {
    files: read.files,
    uploaded,
    failed,
    skipped: read.skipped,
    bytes,
    cancelled: read.cancelled,
    durationMs: Date.now() - startedAt,
  }
}

/**
 * Unpack an archive stream into a bucket: every regular file becomes one
 * object, uploaded through a pool of `concurrency` parallel puts.
 *
 * Uploads already in flight are always waited for, including when reading
 * fails or is cancelled.
 */
export async function deployArchive(
  store: ObjectStore,
  input: Readable,
  options: DeployArchiveOptions,
): Promise<DeploySummary> {
  const startedAt = Date.now()
  const {log, bucket, acl, cacheControl, compress} = options
  const settings: UploadSettings = {bucket, acl, cacheControl, compress}

  const pool = new UploadPool<UploadResult>(options.concurrency)
  await store.verifyBucket(bucket)

  const uploadLog = log.prefix('upload')
  let read: ArchiveReadResult = {entries: 0, files: 0, skipped: 0, cancelled: false}
  let results: PromiseSettledResult<UploadResult>[] = []

  try {
    read = await readArchive(input, {...options, log: log.prefix('archive')}, file =>
      pool.submit(() => uploadObject(store, file, settings, uploadLog)),
    )
  } finally {
    results = await pool.drain()
    // every submitted file, failed ones included
    log.info(`Uploaded ${results.length} files`)
  }

  const summary = summarize(read, results, startedAt)
  if (summary.failed > 0) {
    log.warn(`${summary.failed} of ${summary.files} uploads failed`)
  }
  return summary
}
