import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  collectNetstatRows,
  parseEndpoint,
  parseNetstatOutput,
  resolveCommand,
  CONNECTION_COMMANDS
} from '@core/acquisition/netstat-runner'

type ExecFileCallback = (error: Error | null, stdout?: string, stderr?: string) => void

// promisify() runs when netstat-runner is imported, so the custom hook must exist first
const { execFileMock } = vi.hoisted(() => {
  const execFileMock = vi.fn()
  const promisifyCustom = Symbol.for('nodejs.util.promisify.custom')

  ;(execFileMock as unknown as Record<symbol, unknown>)[promisifyCustom] = (
    cmd: string,
    args: string[] = [],
    options?: unknown
  ) =>
    new Promise<{ stdout: string; stderr: string }>((resolvePromise, rejectPromise) => {
      execFileMock(
        cmd,
        args,
        options ?? {},
        (error: Error | null, stdout: string = '', stderr: string = '') => {
          if (error) {
            rejectPromise(error)
          } else {
            resolvePromise({ stdout, stderr })
          }
        }
      )
    })

  return { execFileMock }
})

vi.mock('node:child_process', () => ({
  execFile: execFileMock,
  default: {
    execFile: execFileMock
  }
}))

const fixturesDir = resolve(process.cwd(), 'tests/fixtures/netstat')

type FixtureName = 'linux' | 'darwin' | 'windows'

function loadFixture(name: FixtureName): string {
  return readFileSync(resolve(fixturesDir, `${name}.txt`), 'utf8')
}

function mockExecWithOutput(stdout: string): void {
  execFileMock.mockImplementation(
    (_cmd: string, _args: string[], options: unknown, callback: ExecFileCallback) => {
      const cb = (typeof options === 'function' ? options : callback) as ExecFileCallback
      cb(null, stdout, '')
      return undefined
    }
  )
}

describe('collectNetstatRows', () => {
  afterEach(() => {
    execFileMock.mockReset()
  })

  it('runs netstat without a timeout and parses linux output', async () => {
    mockExecWithOutput(loadFixture('linux'))

    const rows = await collectNetstatRows('linux')

    expect(execFileMock).toHaveBeenCalledWith(
      'netstat',
      ['-apntu'],
      { encoding: 'utf8', maxBuffer: 10 * 1024 * 1024, windowsHide: true },
      expect.any(Function)
    )
    expect(rows).toEqual([
      {
        protocol: 'TCP',
        local: { address: '0.0.0.0', port: 22 },
        remote: { address: '0.0.0.0' },
        state: 'LISTEN',
        pid: 812
      },
      {
        protocol: 'TCP',
        local: { address: '127.0.0.1', port: 5432 },
        remote: { address: '0.0.0.0' },
        state: 'LISTEN',
        pid: undefined
      },
      {
        protocol: 'TCP',
        local: { address: '192.168.1.20', port: 22 },
        remote: { address: '192.168.1.5', port: 51514 },
        state: 'ESTABLISHED',
        pid: 2201
      },
      {
        protocol: 'TCP6',
        local: { address: '::', port: 22 },
        remote: { address: '::' },
        state: 'LISTEN',
        pid: 812
      },
      {
        protocol: 'UDP',
        local: { address: '0.0.0.0', port: 68 },
        remote: { address: '0.0.0.0' },
        state: undefined,
        pid: 640
      },
      {
        protocol: 'UDP6',
        local: { address: '::', port: 5353 },
        remote: { address: '::' },
        state: undefined,
        pid: undefined
      }
    ])
  })

  it('parses darwin output with the pid column', async () => {
    mockExecWithOutput(loadFixture('darwin'))

    const rows = await collectNetstatRows('darwin')

    expect(execFileMock).toHaveBeenCalledWith(
      'netstat',
      ['-vanl'],
      expect.objectContaining({ encoding: 'utf8' }),
      expect.any(Function)
    )
    expect(rows).toEqual([
      {
        protocol: 'TCP4',
        local: { address: '192.168.1.10', port: 52344 },
        remote: { address: '17.57.146.20', port: 5223 },
        state: 'ESTABLISHED',
        pid: 412
      },
      {
        protocol: 'TCP46',
        local: { address: '*', port: 8080 },
        remote: { address: '*' },
        state: 'LISTEN',
        pid: 5120
      },
      {
        protocol: 'UDP4',
        local: { address: '*', port: 5353 },
        remote: { address: '*' },
        state: undefined,
        pid: 301
      }
    ])
  })

  it('parses windows output including bracketed IPv6 endpoints', async () => {
    mockExecWithOutput(loadFixture('windows'))

    const rows = await collectNetstatRows('win32')

    expect(execFileMock).toHaveBeenCalledWith(
      'netstat.exe',
      ['-ano'],
      expect.objectContaining({ windowsHide: true }),
      expect.any(Function)
    )
    expect(rows).toHaveLength(4)
    expect(rows[1]).toEqual({
      protocol: 'TCP',
      local: { address: '::', port: 445 },
      remote: { address: '::', port: 0 },
      state: 'LISTENING',
      pid: 4
    })
    expect(rows[3]).toEqual({
      protocol: 'UDP',
      local: { address: '0.0.0.0', port: 123 },
      remote: { address: '*' },
      state: undefined,
      pid: 1620
    })
  })

  it('rejects when netstat cannot be executed', async () => {
    execFileMock.mockImplementation(
      (_cmd: string, _args: string[], _options: unknown, callback: ExecFileCallback) => {
        callback(new Error('spawn netstat ENOENT'))
        return undefined
      }
    )

    await expect(collectNetstatRows('linux')).rejects.toThrow('spawn netstat ENOENT')
  })
})

describe('parseNetstatOutput', () => {
  it('ignores rows outside an active connections section', () => {
    const output = [
      'Proto Recv-Q Send-Q Local Address Foreign Address State',
      'tcp 0 0 0.0.0.0:22 0.0.0.0:* LISTEN'
    ].join('\n')

    expect(parseNetstatOutput(output)).toEqual([])
  })
})

describe('parseEndpoint', () => {
  it.each([
    ['[::1]:8080', { address: '::1', port: 8080 }],
    ['*.*', { address: '*' }],
    ['*:*', { address: '*' }],
    ['10.0.0.1.443', { address: '10.0.0.1', port: 443 }],
    ['fe80::1%en0.5353', { address: 'fe80::1%en0', port: 5353 }],
    ['0.0.0.0:*', { address: '0.0.0.0' }]
  ])('parses %s', (raw, expected) => {
    expect(parseEndpoint(raw)).toEqual(expected)
  })
})

describe('resolveCommand', () => {
  it('falls back to the linux invocation for other unix platforms', () => {
    expect(resolveCommand(CONNECTION_COMMANDS, 'freebsd')).toEqual({
      cmd: 'netstat',
      args: ['-apntu']
    })
  })

  it('throws when no command is known', () => {
    expect(() => resolveCommand({}, 'aix')).toThrow('Unsupported platform for netstat: aix')
  })
})
