import { readFile } from 'node:fs/promises'
import type { RawIoCounter } from '@shared/interfaces/common'
import { runNetstat, type NetstatCommand } from './netstat-runner'

const PROC_NET_DEV = '/proc/net/dev'

const INTERFACE_BYTES_COMMANDS: Partial<Record<NodeJS.Platform, NetstatCommand>> = {
  darwin: { cmd: 'netstat', args: ['-ibn'] }
}

/**
 * Parses the Linux `/proc/net/dev` table. Receive bytes are the first field
 * after the colon, transmit bytes the ninth.
 */
export function parseProcNetDev(content: string): RawIoCounter[] {
  const counters: RawIoCounter[] = []

  for (const line of content.split('\n')) {
    const separator = line.indexOf(':')
    if (separator === -1 || line.includes('|')) continue

    const name = line.slice(0, separator).trim()
    const fields = line
      .slice(separator + 1)
      .trim()
      .split(/\s+/)
    if (!name || fields.length < 9) continue

    counters.push({
      name,
      bytesRecv: toCount(fields[0]),
      bytesSent: toCount(fields[8])
    })
  }

  return counters
}

/**
 * Parses `netstat -ibn` (macOS). Only the `<Link#n>` row of each interface
 * carries the totals; the address column may be blank, so byte columns are
 * read from the end of the row.
 */
export function parseNetstatInterfaceBytes(output: string): RawIoCounter[] {
  const counters: RawIoCounter[] = []
  const seen = new Set<string>()

  for (const line of output.split(/\r?\n/)) {
    const columns = line.trim().split(/\s+/)
    if (columns.length < 8 || !columns[2]?.startsWith('<Link#')) continue

    const name = columns[0]
    if (seen.has(name)) continue
    seen.add(name)

    const last = columns.length - 1
    counters.push({
      name,
      bytesRecv: toCount(columns[last - 4]),
      bytesSent: toCount(columns[last - 1])
    })
  }

  return counters
}

function toCount(value: string | undefined): number {
  const parsed = Number(value)
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : 0
}

export async function collectIoCounters(
  platform: NodeJS.Platform = process.platform
): Promise<RawIoCounter[]> {
  if (platform === 'linux') {
    return parseProcNetDev(await readFile(PROC_NET_DEV, 'utf8'))
  }

  const command = INTERFACE_BYTES_COMMANDS[platform]
  if (!command) {
    throw new Error(`Interface counters are not available on ${platform}`)
  }
  return parseNetstatInterfaceBytes(await runNetstat(command))
}
