import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { isDevelopment, resolveLogFile, resolveLogLevel } from '@shared/utils/environment'

describe('environment', () => {
  it('detects development mode from NODE_ENV', () => {
    expect(isDevelopment({ NODE_ENV: 'development' })).toBe(true)
    expect(isDevelopment({ NODE_ENV: 'production' })).toBe(false)
    expect(isDevelopment({})).toBe(false)
  })

  it('defaults the log level by mode', () => {
    expect(resolveLogLevel({})).toBe('info')
    expect(resolveLogLevel({ NODE_ENV: 'development' })).toBe('debug')
  })

  it('honours a valid requested log level', () => {
    expect(resolveLogLevel({ NETDASH_LOG_LEVEL: ' Trace ' })).toBe('trace')
    expect(resolveLogLevel({ NETDASH_LOG_LEVEL: 'verbose' })).toBe('info')
  })

  it('writes logs to the temp directory unless told otherwise', () => {
    expect(resolveLogFile({})).toBe(join(tmpdir(), 'netdash.log'))
    expect(resolveLogFile({ NETDASH_LOG_FILE: '/var/log/netdash-test.log' })).toBe(
      '/var/log/netdash-test.log'
    )
    expect(resolveLogFile({ NETDASH_LOG_FILE: '   ' })).toBe(join(tmpdir(), 'netdash.log'))
  })
})
