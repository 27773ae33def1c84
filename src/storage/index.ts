import {HeadBucketCommand, PutObjectCommand, S3Client} from '@aws-sdk/client-s3'
import type {PutObjectCommandInput} from '@aws-sdk/client-s3'
import type {PrefixLog} from '../cli/utils/prefixLog.ts'
import {formatBytes} from '../utils/formatBytes.ts'

/**
 * Destination for uploaded objects
 */
export interface ObjectStore {
  putObject(input: PutObjectCommandInput): Promise<void>
  /** Fails when the bucket is missing or not accessible */
  verifyBucket(bucket: string): Promise<void>
  close(): void
}

export interface S3StoreConfig {
  region: string
  /** S3-compatible endpoint (MinIO, R2, ...) */
  endpoint?: string
  forcePathStyle?: boolean
}

/**
 * Credentials come from the SDK's default provider chain
 * (environment, shared config files, instance metadata).
 */
export function createS3Client(config: S3StoreConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle ?? false,
  })
}

export function createS3ObjectStore(
  config: S3StoreConfig,
  log: PrefixLog,
  client: S3Client = createS3Client(config),
): ObjectStore {
  return {
    async putObject(input) {
      await client.send(new PutObjectCommand(input))
      log.http(`PUT s3://${input.Bucket}/${input.Key}`)
    },

    async verifyBucket(bucket) {
      try {
        await client.send(new HeadBucketCommand({Bucket: bucket}))
        log.http(`HEAD s3://${bucket}`)
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        log.verbose(`HeadBucket failed: ${message}`)
        throw new Error(`S3 bucket ${bucket} does not exist or is not accessible in region ${config.region}`)
      }
    },

    close() {
      client.destroy()
    },
  }
}

/**
 * Store that only logs what would be uploaded (--dry-run)
 */
export function createDryRunObjectStore(log: PrefixLog): ObjectStore {
  return {
    async putObject(input) {
      const details = [input.ContentType, input.ContentEncoding, formatBytes(input.ContentLength ?? 0)]
      log.info(`${input.Key} (${details.filter(Boolean).join(', ')})`)
    },

    async verifyBucket(bucket) {
      log.verbose(`Not checking bucket ${bucket}`)
    },

    close() {},
  }
}
