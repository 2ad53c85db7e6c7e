import { execFile } from 'node:child_process'
import { promisify } from 'node:util'
import { MAX_STDOUT_BUFFER } from '@config/constants'
import { logger } from '@infra/logging'

export type NetstatEndpoint = {
  address: string
  port?: number
}

export type NetstatRow = {
  protocol: string
  local: NetstatEndpoint
  remote: NetstatEndpoint
  state?: string
  pid?: number
}

export type NetstatCommand = {
  cmd: string
  args: string[]
}

const execFileAsync = promisify(execFile)

export const CONNECTION_COMMANDS: Partial<Record<NodeJS.Platform, NetstatCommand>> = {
  linux: { cmd: 'netstat', args: ['-apntu'] },
  darwin: { cmd: 'netstat', args: ['-vanl'] },
  win32: { cmd: 'netstat.exe', args: ['-ano'] }
}

export function resolveCommand(
  table: Partial<Record<NodeJS.Platform, NetstatCommand>>,
  platform: NodeJS.Platform = process.platform
): NetstatCommand {
  const command = table[platform] ?? table.linux
  if (!command) {
    throw new Error(`Unsupported platform for netstat: ${platform}`)
  }
  return command
}

/**
 * Runs a netstat invocation and returns its stdout. No timeout is applied, a
 * hung child holds only the pass that started it.
 */
export async function runNetstat(command: NetstatCommand): Promise<string> {
  try {
    const { stdout, stderr } = await execFileAsync(command.cmd, command.args, {
      encoding: 'utf8',
      maxBuffer: MAX_STDOUT_BUFFER,
      windowsHide: true
    })

    if (stderr.trim()) {
      logger.debug('netstat stderr output', { stderr: stderr.trim() })
    }

    return stdout
  } catch (error) {
    logger.debug('Failed to execute netstat command', {
      command: `${command.cmd} ${command.args.join(' ')}`,
      error
    })
    throw error
  }
}

export async function collectNetstatRows(
  platform: NodeJS.Platform = process.platform
): Promise<NetstatRow[]> {
  const stdout = await runNetstat(resolveCommand(CONNECTION_COMMANDS, platform))
  return parseNetstatOutput(stdout)
}

// multi-word header labels, rewritten so the header splits on whitespace
const HEADER_LABELS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\(state\)/g, 'state'],
  [/local address/g, 'local'],
  [/foreign address/g, 'remote'],
  [/pid\/program name/g, 'pid/program'],
  [/process name/g, 'process_name']
]

type PidReader = (columns: readonly string[], index: number) => number | undefined

interface ColumnMap {
  proto: number
  local: number
  remote: number
  state: number | null
  pid: { index: number; read: PidReader } | null
}

const readPlainPid: PidReader = (columns, index) => parsePid(columns[index])

// linux prints `812/sshd`
const readProgramPid: PidReader = (columns, index) => parsePid(columns[index]?.split('/')[0])

// darwin prints `name:pid`, and the name itself may contain spaces
const readTaggedPid: PidReader = (columns, index) => {
  const tagged = columns.slice(index).find((column) => /:\d+$/.test(column))
  return tagged ? parsePid(tagged.slice(tagged.lastIndexOf(':') + 1)) : undefined
}

function pidReaderFor(label: string): PidReader {
  if (label === 'pid/program') return readProgramPid
  if (label === 'process:pid') return readTaggedPid
  return readPlainPid
}

function readHeader(line: string): ColumnMap | null {
  const labels = HEADER_LABELS.reduce(
    (text, [pattern, label]) => text.replace(pattern, label),
    line.toLowerCase()
  )
    .trim()
    .split(/\s+/)

  const proto = labels.indexOf('proto')
  const local = labels.indexOf('local')
  const remote = labels.indexOf('remote')
  if (proto === -1 || local === -1 || remote === -1) return null

  const state = labels.indexOf('state')
  const pid = labels.findIndex((label) => label.includes('pid'))

  return {
    proto,
    local,
    remote,
    state: state === -1 ? null : state,
    pid: pid === -1 ? null : { index: pid, read: pidReaderFor(labels[pid]) }
  }
}

function looksLikeState(value: string | undefined): boolean {
  return value !== undefined && /^\(?[A-Z][A-Z0-9_]+\)?$/.test(value)
}

function readRow(line: string, map: ColumnMap): NetstatRow | null {
  const columns = line.split(/\s+/)
  const protocol = columns[map.proto]?.toUpperCase()
  if (!protocol || !/^(TCP|UDP)/.test(protocol)) return null

  // UDP rows leave the state column blank, shifting everything after it
  if (protocol.startsWith('UDP') && map.state !== null && !looksLikeState(columns[map.state])) {
    columns.splice(map.state, 0, '')
  }

  const local = columns[map.local]
  const remote = columns[map.remote]
  if (!local || !remote) return null

  const state = map.state === null ? '' : (columns[map.state] ?? '').replace(/[()]/g, '')

  return {
    protocol,
    local: parseEndpoint(local),
    remote: parseEndpoint(remote),
    state: state || undefined,
    pid: map.pid ? map.pid.read(columns, map.pid.index) : undefined
  }
}

function parsePid(value: string | undefined): number | undefined {
  return value !== undefined && /^\d+$/.test(value) ? Number.parseInt(value, 10) : undefined
}

/**
 * Reads the rows of every "Active ... connections" table in netstat output.
 * Column positions come from each table's header line.
 */
export function parseNetstatOutput(output: string): NetstatRow[] {
  const rows: NetstatRow[] = []
  let inTable = false
  let columns: ColumnMap | null = null

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!line) continue
    const lower = line.toLowerCase()

    if (lower.startsWith('active')) {
      inTable = lower.includes('connections')
      columns = null
    } else if (inTable && lower.startsWith('proto')) {
      columns = readHeader(line)
    } else if (inTable && columns && /^(tcp|udp)/.test(lower)) {
      const row = readRow(line, columns)
      if (row) rows.push(row)
    } else {
      // unix sockets and routing sections end the connection table
      inTable = false
      columns = null
    }
  }

  return rows
}

export function parseEndpoint(raw: string): NetstatEndpoint {
  if (raw === '*:*' || raw === '*.*' || raw === '*') return { address: '*' }

  if (raw.startsWith('[') && raw.includes(']')) {
    const closing = raw.indexOf(']')
    const address = raw.slice(1, closing)
    const match = raw.slice(closing + 1).match(/^[.:](\d+)$/)
    return match ? { address, port: Number.parseInt(match[1], 10) } : { address }
  }

  const portMatch = raw.match(/[.:](\d+)$/)
  if (portMatch) {
    const address = raw.slice(0, raw.length - portMatch[0].length)
    return { address, port: Number.parseInt(portMatch[1], 10) }
  }

  if (raw.endsWith(':*') || raw.endsWith('.*')) {
    return { address: raw.slice(0, -2) || '*' }
  }

  return { address: raw }
}
