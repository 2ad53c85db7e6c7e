import {
  AF_INET,
  AF_INET6,
  LISTEN_STATE,
  SOCK_DGRAM,
  SOCK_STREAM,
  WILDCARD_ADDRESS
} from '@config/constants'
import type {
  NetworkAcquisition,
  ProcessNameLookup,
  RawConnection,
  RawInterface,
  RawIoCounter
} from '@shared/interfaces/common'
import { collectInterfaces } from './host-interfaces'
import { collectIoCounters } from './io-counters'
import { collectNetstatRows, type NetstatRow } from './netstat-runner'
import { createProcessLookup } from './process-lookup'

// Windows and some BSDs report the listening state under a longer label
const STATE_ALIASES: Record<string, string> = {
  LISTENING: LISTEN_STATE
}

// UDP sockets carry no state; the kernel reports them as NONE
const UDP_STATE = 'NONE'

function toAddress(raw: string): string {
  return raw === WILDCARD_ADDRESS ? '' : raw
}

export function toRawConnection(row: NetstatRow): RawConnection {
  const isUdp = row.protocol.startsWith('UDP')
  const isIpv6 =
    row.protocol.endsWith('6') || row.local.address.includes(':') || row.remote.address.includes(':')
  const state = row.state ? (STATE_ALIASES[row.state] ?? row.state) : isUdp ? UDP_STATE : ''

  return {
    type: isUdp ? SOCK_DGRAM : SOCK_STREAM,
    family: isIpv6 ? AF_INET6 : AF_INET,
    localAddress: toAddress(row.local.address),
    localPort: row.local.port ?? 0,
    remoteAddress: toAddress(row.remote.address),
    remotePort: row.remote.port ?? 0,
    status: state,
    pid: row.pid ?? 0
  }
}

/**
 * Reads connections, process names, interfaces and byte counters from the
 * local host.
 */
export class HostAcquisition implements NetworkAcquisition {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  async listConnections(): Promise<RawConnection[]> {
    const rows = await collectNetstatRows(this.platform)
    return rows.map(toRawConnection)
  }

  openProcessLookup(): ProcessNameLookup {
    return createProcessLookup(this.platform)
  }

  listInterfaces(): Promise<RawInterface[]> {
    return collectInterfaces(this.platform)
  }

  listIoCounters(): Promise<RawIoCounter[]> {
    return collectIoCounters(this.platform)
  }
}
