import type {ObjectCannedACL} from '@aws-sdk/client-s3'
import type {PrefixLog} from '../cli/utils/prefixLog.ts'

/**
 * A regular file read out of the archive, ready to upload
 */
export interface ArchiveFile {
  /** Entry name as stored in the archive */
  name: string
  /** Object key after stripping components and applying the prefix */
  key: string
  size: number
  data: Buffer
}

export type ArchiveCompression = 'gzip' | 'bzip2' | 'xz' | 'none'

export interface ReadArchiveOptions {
  /** Key prefix for every uploaded file */
  prefix: string
  /** Leading path segments dropped from entry names */
  stripComponents: number
  log: PrefixLog
  /** Stops reading after the current entry when aborted */
  signal?: AbortSignal
}

export interface ArchiveReadResult {
  entries: number
  files: number
  skipped: number
  cancelled: boolean
}

export interface UploadSettings {
  bucket: string
  acl: ObjectCannedACL
  cacheControl: string
  /** Gzip compressible content types before upload */
  compress: boolean
}

export type UploadResult =
  | {status: 'uploaded'; key: string; bytes: number; compressed: boolean}
  | {status: 'failed'; key: string; bytes: 0; error: Error}

export interface DeploySummary {
  files: number
  uploaded: number
  failed: number
  skipped: number
  /** Bytes sent, after compression */
  bytes: number
  cancelled: boolean
  durationMs: number
}
