import {describe, it, beforeEach, afterEach} from 'node:test'
import assert from 'node:assert/strict'
import log from '../../../src/cli/utils/log.ts'

describe('log', () => {
  let capturedLogs: Array<{level: string; args: unknown[]}>
  const logHandler = (level: string, ...args: unknown[]) => {
    capturedLogs.push({level, args})
  }

  beforeEach(() => {
    capturedLogs = []
    process.on('log', logHandler)
  })

  afterEach(() => {
    process.removeListener('log', logHandler)
  })

  it('info emits log event with info level', () => {
    log.info('hello world')
    assert.deepEqual(capturedLogs, [{level: 'info', args: ['hello world']}])
  })

  it('warn emits log event with warn level', () => {
    log.warn('be careful')
    assert.deepEqual(capturedLogs, [{level: 'warn', args: ['be careful']}])
  })

  it('error emits log event with error level', () => {
    log.error('something broke')
    assert.deepEqual(capturedLogs, [{level: 'error', args: ['something broke']}])
  })

  it('http emits log event with http level', () => {
    log.http('PUT s3://assets/index.html')
    assert.deepEqual(capturedLogs, [{level: 'http', args: ['PUT s3://assets/index.html']}])
  })

  it('verbose emits log event with verbose level', () => {
    log.verbose('debug detail')
    assert.deepEqual(capturedLogs, [{level: 'verbose', args: ['debug detail']}])
  })

  it('supports multiple arguments', () => {
    log.info('count:', 42, 'done')
    assert.deepEqual(capturedLogs[0].args, ['count:', 42, 'done'])
  })
})
