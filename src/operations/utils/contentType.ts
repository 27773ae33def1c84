import {lookup} from 'mime-types'

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream'

// Types worth gzipping before upload: text formats, fonts without built-in
// compression, and explicit binary blobs.
export const COMPRESSIBLE_TYPES: ReadonlySet<string> = new Set([
  'text/plain',
  'text/html',
  'text/javascript',
  'text/css',
  'text/xml',
  'text/x-component',
  'application/javascript',
  'application/x-javascript',
  'application/xml',
  'application/json',
  'application/xhtml+xml',
  'application/rss+xml',
  'application/atom+xml',
  'application/vnd.ms-fontobject',
  'image/svg+xml',
  'application/x-font-ttf',
  'font/ttf',
  'font/opentype',
  'font/otf',
  'application/octet-stream',
])

/**
 * Content type from the file extension, or null when it is not known
 */
export function lookupContentType(path: string): string | null {
  const type = lookup(path)
  return type === false ? null : type
}

export function isCompressible(type: string | null): boolean {
  return type !== null && COMPRESSIBLE_TYPES.has(type)
}
