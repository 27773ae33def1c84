import {Readable} from 'node:stream'
import {createGunzip} from 'node:zlib'
import {extract as tarExtract} from 'tar-stream'
import type {Headers} from 'tar-stream'
import type {ArchiveCompression, ArchiveFile, ArchiveReadResult, ReadArchiveOptions} from './types.ts'
import {hasParentSegment, objectKey, stripComponents} from './utils/objectKey.ts'

// Longest magic number we look for (xz)
const SNIFF_BYTES = 6

const REGULAR_FILE_TYPES = new Set<Headers['type']>(['file', 'contiguous-file'])

/**
 * Identify the compression wrapper from the first bytes of a stream
 */
export function detectCompression(head: Buffer): ArchiveCompression {
  if (head.length >= 2 && head[0] === 0x1f && head[1] === 0x8b) return 'gzip'
  if (head.length >= 3 && head.subarray(0, 3).toString('latin1') === 'BZh') return 'bzip2'
  if (head.length >= 6 && head.subarray(0, 6).equals(Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]))) return 'xz'
  return 'none'
}

async function* replay(head: Buffer, rest: AsyncIterator<Buffer>): AsyncGenerator<Buffer> {
  if (head.length > 0) yield head
  for (;;) {
    const chunk = await rest.next()
    if (chunk.done) return
    yield chunk.value
  }
}

/**
 * Peek at the start of `input` to find its compression, then hand back a
 * stream that still yields every byte.
 */
export async function sniffCompression(
  input: Readable,
): Promise<{compression: ArchiveCompression; stream: Readable}> {
  const iterator: AsyncIterator<Buffer> = input[Symbol.asyncIterator]()
  const head: Buffer[] = []
  let length = 0

  while (length < SNIFF_BYTES) {
    const chunk = await iterator.next()
    if (chunk.done) break
    head.push(chunk.value)
    length += chunk.value.length
  }

  const buffered = Buffer.concat(head)
  return {
    compression: detectCompression(buffered),
    stream: Readable.from(replay(buffered, iterator), {objectMode: false}),
  }
}

function readEntry(stream: Readable): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    stream.on('data', (chunk: Buffer) => chunks.push(chunk))
    stream.on('end', () => resolve(Buffer.concat(chunks)))
    stream.on('error', reject)
  })
}

/**
 * Read a tar archive (plain or gzip) and hand each regular file to `onFile`,
 * in archive order.
 *
 * The next entry is not parsed until `onFile` resolves, so a caller that
 * waits for capacity before resolving throttles the whole read. On abort, a
 * file already handed to `onFile` is waited for and no further file is.
 *
 * @throws Error when the archive cannot be parsed or uses an unsupported compression
 */
export async function readArchive(
  input: Readable,
  options: ReadArchiveOptions,
  onFile: (file: ArchiveFile) => Promise<void>,
): Promise<ArchiveReadResult> {
  const {prefix, stripComponents: strip, log, signal} = options
  const result: ArchiveReadResult = {entries: 0, files: 0, skipped: 0, cancelled: false}
  // file currently handed to onFile; an abort waits for it before returning
  let handing: Promise<void> | null = null

  if (signal?.aborted) {
    input.destroy()
    return {...result, cancelled: true}
  }

  const handleEntry = async (header: Headers, stream: Readable): Promise<void> => {
    if (signal?.aborted) {
      stream.resume()
      return
    }

    if (!REGULAR_FILE_TYPES.has(header.type)) {
      log.verbose(`Skipping ${header.name} (${header.type ?? 'unknown'})`)
      result.skipped++
      stream.resume()
      return
    }

    const data = await readEntry(stream)
    const path = stripComponents(header.name, strip)
    if (path === null) {
      log.verbose(`Skipping ${header.name} (empty after stripping ${strip} components)`)
      result.skipped++
      return
    }
    if (hasParentSegment(path)) {
      log.warn(`Skipping ${header.name} (path escapes the archive root)`)
      result.skipped++
      return
    }

    if (signal?.aborted) return

    result.files++
    const file: ArchiveFile = {name: header.name, key: objectKey(prefix, path), size: data.length, data}
    // assigned before onFile runs, so an abort raised from inside it still waits
    handing = Promise.resolve().then(() => onFile(file))
    try {
      await handing
    } finally {
      handing = null
    }
  }

  try {
    const {compression, stream: source} = await sniffCompression(input)
    if (compression === 'bzip2' || compression === 'xz') {
      source.destroy()
      throw new Error(`Unsupported archive compression: ${compression}`)
    }
    log.verbose(`Archive compression: ${compression}`)

    const extract = tarExtract()
    extract.on('entry', (header, stream, next) => {
      result.entries++
      handleEntry(header, stream).then(() => next(), next)
    })

    await new Promise<void>((resolve, reject) => {
      const gunzip = compression === 'gzip' ? createGunzip() : null

      const onAbort = () => {
        result.cancelled = true
        source.unpipe()
        gunzip?.unpipe()
        extract.destroy()
        input.destroy()
        const current: Promise<void> = handing ?? Promise.resolve()
        current.then(() => resolve(), reject)
      }
      signal?.addEventListener('abort', onAbort, {once: true})

      const settle = (error?: unknown) => {
        signal?.removeEventListener('abort', onAbort)
        if (error) reject(error)
        else resolve()
      }

      extract.on('finish', () => settle())
      extract.on('error', settle)
      source.on('error', settle)

      if (gunzip) {
        gunzip.on('error', settle)
        source.pipe(gunzip).pipe(extract)
      } else {
        source.pipe(extract)
      }
    })
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Unable to read archive: ${message}`)
  }

  return result
}
