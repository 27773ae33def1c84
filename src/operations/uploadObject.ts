import {promisify} from 'node:util'
import {gzip, constants as zlibConstants} from 'node:zlib'
import type {PutObjectCommandInput} from '@aws-sdk/client-s3'
import type {PrefixLog} from '../cli/utils/prefixLog.ts'
import type {ObjectStore} from '../storage/index.ts'
import type {ArchiveFile, UploadResult, UploadSettings} from './types.ts'
import {DEFAULT_CONTENT_TYPE, isCompressible, lookupContentType} from './utils/contentType.ts'

const gzipAsync = promisify(gzip)

export const DEFAULT_CACHE_CONTROL = 'public, max-age=31536000'

/**
 * Build the put request for one archive file, gzipping the body when its
 * content type is compressible and compression is enabled.
 */
export async function buildPutObject(file: ArchiveFile, settings: UploadSettings): Promise<PutObjectCommandInput> {
  const type = lookupContentType(file.key)
  const compressed = settings.compress && isCompressible(type)
  const body = compressed ? await gzipAsync(file.data, {level: zlibConstants.Z_BEST_COMPRESSION}) : file.data

  const input: PutObjectCommandInput = {
    Bucket: settings.bucket,
    Key: file.key,
    Body: body,
    ContentType: type ?? DEFAULT_CONTENT_TYPE,
    CacheControl: settings.cacheControl,
    ContentLength: body.length,
    ACL: settings.acl,
  }
  if (compressed) {
    input.ContentEncoding = 'gzip'
  }
  return input
}

/**
 * Upload a single archive file. Failures are logged and reported in the
 * result; this never rejects.
 */
export async function uploadObject(
  store: ObjectStore,
  file: ArchiveFile,
  settings: UploadSettings,
  log: PrefixLog,
): Promise<UploadResult> {
  try {
    const input = await buildPutObject(file, settings)
    const bytes = input.ContentLength ?? file.size
    log.verbose(`Uploading ${file.key} (${bytes} bytes)`)

    await store.putObject(input)
    return {status: 'uploaded', key: file.key, bytes, compressed: input.ContentEncoding === 'gzip'}
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error))
    log.error(`Failed to upload ${file.key}: ${err.message}`)
    if (err.stack) {
      log.verbose(err.stack)
    }
    return {status: 'failed', key: file.key, bytes: 0, error: err}
  }
}
