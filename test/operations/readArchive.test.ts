import {describe, it} from 'node:test'
import assert from 'node:assert/strict'
import {Readable} from 'node:stream'
import {detectCompression, readArchive, sniffCompression} from '../../src/operations/readArchive.ts'
import type {ArchiveFile} from '../../src/operations/types.ts'
import {createTarball} from '../helpers/archive.ts'
import type {TarEntry} from '../helpers/archive.ts'
import {createMemoryLog} from '../helpers/log.ts'

const SITE: TarEntry[] = [
  {name: 'site/', type: 'directory'},
  {name: 'site/index.html', content: '<h1>hi</h1>'},
  {name: 'site/css/app.css', content: 'body{}'},
  {name: 'site/latest', type: 'symlink', linkname: 'index.html'},
]

async function collect(input: Buffer, options: {prefix?: string; stripComponents?: number} = {}) {
  const {log, messages} = createMemoryLog()
  const files: ArchiveFile[] = []
  const result = await readArchive(
    Readable.from(input),
    {prefix: options.prefix ?? '', stripComponents: options.stripComponents ?? 0, log},
    async file => {
      files.push(file)
    },
  )
  return {result, files, messages}
}

describe('detectCompression', () => {
  it('recognizes magic numbers', () => {
    assert.equal(detectCompression(Buffer.from([0x1f, 0x8b, 0x08])), 'gzip')
    assert.equal(detectCompression(Buffer.from('BZh91AY')), 'bzip2')
    assert.equal(detectCompression(Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00])), 'xz')
  })

  it('falls back to none', () => {
    assert.equal(detectCompression(Buffer.from('site/index.html')), 'none')
    assert.equal(detectCompression(Buffer.alloc(0)), 'none')
    assert.equal(detectCompression(Buffer.from([0x1f])), 'none')
  })
})

describe('sniffCompression', () => {
  it('replays every byte after peeking', async () => {
    const input = Readable.from([Buffer.from([0x1f]), Buffer.from([0x8b, 0x01]), Buffer.from('rest')])
    const {compression, stream} = await sniffCompression(input)

    const chunks: Buffer[] = []
    for await (const chunk of stream) chunks.push(Buffer.from(chunk))

    assert.equal(compression, 'gzip')
    assert.deepEqual(Buffer.concat(chunks), Buffer.concat([Buffer.from([0x1f, 0x8b, 0x01]), Buffer.from('rest')]))
  })
})

describe('readArchive', () => {
  it('yields regular files in archive order', async () => {
    const {result, files} = await collect(await createTarball(SITE))

    assert.deepEqual(
      files.map(file => [file.name, file.key, file.size]),
      [
        ['site/index.html', 'site/index.html', 11],
        ['site/css/app.css', 'site/css/app.css', 6],
      ],
    )
    assert.equal(files[0].data.toString(), '<h1>hi</h1>')
    assert.deepEqual(result, {entries: 4, files: 2, skipped: 2, cancelled: false})
  })

  it('reads gzipped archives', async () => {
    const {result, files, messages} = await collect(await createTarball(SITE, {gzip: true}))

    assert.deepEqual(
      files.map(file => file.key),
      ['site/index.html', 'site/css/app.css'],
    )
    assert.equal(result.files, 2)
    assert.ok(messages('verbose').includes('Archive compression: gzip'))
  })

  it('strips components and applies the prefix', async () => {
    const {files} = await collect(await createTarball(SITE), {prefix: 'v1/', stripComponents: 1})
    assert.deepEqual(
      files.map(file => file.key),
      ['v1/index.html', 'v1/css/app.css'],
    )
  })

  it('skips files left empty after stripping', async () => {
    const tarball = await createTarball([
      {name: 'README', content: 'top level'},
      {name: 'site/index.html', content: 'x'},
    ])
    const {result, files, messages} = await collect(tarball, {stripComponents: 1})

    assert.deepEqual(
      files.map(file => file.key),
      ['index.html'],
    )
    assert.equal(result.skipped, 1)
    assert.ok(messages('verbose').includes('Skipping README (empty after stripping 1 components)'))
  })

  it('skips entries that climb out of the archive root', async () => {
    const tarball = await createTarball([
      {name: 'site/../../etc/passwd', content: 'root'},
      {name: 'site/ok.txt', content: 'ok'},
    ])
    const {result, files, messages} = await collect(tarball, {stripComponents: 1})

    assert.deepEqual(
      files.map(file => file.key),
      ['ok.txt'],
    )
    assert.equal(result.skipped, 1)
    assert.deepEqual(messages('warn'), ['Skipping site/../../etc/passwd (path escapes the archive root)'])
  })

  it('logs skipped non-file entries', async () => {
    const {messages} = await collect(await createTarball(SITE))
    assert.ok(messages('verbose').includes('Skipping site/ (directory)'))
    assert.ok(messages('verbose').includes('Skipping site/latest (symlink)'))
  })

  it('reads an empty stream as an empty archive', async () => {
    const {result, files} = await collect(Buffer.alloc(0))
    assert.equal(files.length, 0)
    assert.deepEqual(result, {entries: 0, files: 0, skipped: 0, cancelled: false})
  })

  it('waits for onFile before reading the next entry', async () => {
    const {log} = createMemoryLog()
    const events: string[] = []

    await readArchive(Readable.from(await createTarball(SITE)), {prefix: '', stripComponents: 0, log}, async file => {
      events.push(`start ${file.key}`)
      await new Promise(resolve => setTimeout(resolve, 5))
      events.push(`end ${file.key}`)
    })

    assert.deepEqual(events, ['start site/index.html', 'end site/index.html', 'start site/css/app.css', 'end site/css/app.css'])
  })

  it('stops after the current entry when aborted', async () => {
    const {log} = createMemoryLog()
    const controller = new AbortController()
    const keys: string[] = []

    const result = await readArchive(
      Readable.from(await createTarball(SITE)),
      {prefix: '', stripComponents: 0, log, signal: controller.signal},
      async file => {
        keys.push(file.key)
        controller.abort()
      },
    )

    assert.deepEqual(keys, ['site/index.html'])
    assert.equal(result.cancelled, true)
    assert.equal(result.files, 1)
  })

  it('waits for the file being handed over when aborted', async () => {
    const {log} = createMemoryLog()
    const controller = new AbortController()
    const handed: string[] = []

    const result = await readArchive(
      Readable.from(await createTarball(SITE)),
      {prefix: '', stripComponents: 0, log, signal: controller.signal},
      async file => {
        controller.abort()
        await new Promise(resolve => setTimeout(resolve, 20))
        handed.push(file.key)
      },
    )

    assert.deepEqual(handed, ['site/index.html'])
    assert.equal(result.cancelled, true)
    assert.equal(result.files, 1)
  })

  it('returns immediately when already aborted', async () => {
    const {log} = createMemoryLog()
    const controller = new AbortController()
    controller.abort()

    const result = await readArchive(
      Readable.from(await createTarball(SITE)),
      {prefix: '', stripComponents: 0, log, signal: controller.signal},
      async () => {
        assert.fail('onFile should not be called')
      },
    )

    assert.deepEqual(result, {entries: 0, files: 0, skipped: 0, cancelled: true})
  })

  it('rejects bzip2 and xz archives', async () => {
    await assert.rejects(collect(Buffer.from('BZh91AY&SY')), {
      message: 'Unable to read archive: Unsupported archive compression: bzip2',
    })
    await assert.rejects(collect(Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00, 0x00])), {
      message: 'Unable to read archive: Unsupported archive compression: xz',
    })
  })

  it('rejects truncated archives', async () => {
    const tarball = await createTarball(SITE)
    await assert.rejects(collect(tarball.subarray(0, 700)), /^Error: Unable to read archive: /)
  })

  it('rejects corrupt gzip data', async () => {
    const corrupt = Buffer.concat([Buffer.from([0x1f, 0x8b]), Buffer.from('definitely not deflate data')])
    await assert.rejects(collect(corrupt), /^Error: Unable to read archive: /)
  })

  it('rethrows onFile failures as read errors', async () => {
    const {log} = createMemoryLog()
    await assert.rejects(
      readArchive(Readable.from(await createTarball(SITE)), {prefix: '', stripComponents: 0, log}, async () => {
        throw new Error('store unavailable')
      }),
      {message: 'Unable to read archive: store unavailable'},
    )
  })
})
