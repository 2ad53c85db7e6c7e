import {
  IPV6_FAMILIES,
  LISTEN_STATE,
  SOCK_DGRAM,
  WILDCARD_ADDRESS,
  WILDCARD_BIND_ADDRESSES
} from '@config/constants'
import { logger } from '@infra/logging'
import type {
  ConnectionRecord,
  DashboardData,
  InterfaceRecord,
  NetworkAcquisition,
  PortRecord,
  RawConnection,
  RawInterface,
  RawIoCounter,
  TransportLabel
} from '@shared/interfaces/common'

export type ProcessNameResolver = (pid: number) => Promise<string>

export function protoLabel(type: number, family: number): TransportLabel {
  const base = type === SOCK_DGRAM ? 'udp' : 'tcp'
  if (IPV6_FAMILIES.has(family)) {
    return base === 'udp' ? 'udp6' : 'tcp6'
  }
  return base
}

export function formatEndpoint(address: string, port: number): string {
  return `${address || WILDCARD_ADDRESS}:${port}`
}

export function normalizeBindAddress(address: string): string {
  return WILDCARD_BIND_ADDRESSES.has(address) ? WILDCARD_ADDRESS : address
}

/**
 * Builds a pid → name resolver whose cache and host lookup live only as long
 * as the returned function. Failed lookups resolve to '' and are cached as well.
 */
export function createProcessNameResolver(acquisition: NetworkAcquisition): ProcessNameResolver {
  const lookup = acquisition.openProcessLookup()
  const cache = new Map<number, Promise<string>>()

  return (pid) => {
    const cached = cache.get(pid)
    if (cached) return cached

    const pending = lookup(pid).catch((error: unknown) => {
      logger.debug('Process name lookup failed', { pid, error })
      return ''
    })
    cache.set(pid, pending)
    return pending
  }
}

function resolveName(pid: number, resolve: ProcessNameResolver): Promise<string> {
  return pid > 0 ? resolve(pid) : Promise.resolve('')
}

export async function buildConnections(
  raw: readonly RawConnection[],
  resolve: ProcessNameResolver
): Promise<ConnectionRecord[]> {
  const usable = raw.filter((conn) => conn.status !== '')

  return Promise.all(
    usable.map(async (conn) =>
      Object.freeze({
        proto: protoLabel(conn.type, conn.family),
        local: formatEndpoint(conn.localAddress, conn.localPort),
        remote: formatEndpoint(conn.remoteAddress, conn.remotePort),
        state: conn.status,
        pid: conn.pid,
        process: await resolveName(conn.pid, resolve)
      })
    )
  )
}

export async function buildPorts(
  raw: readonly RawConnection[],
  resolve: ProcessNameResolver
): Promise<PortRecord[]> {
  const seen = new Set<string>()
  const listeners: RawConnection[] = []

  for (const conn of raw) {
    if (conn.status !== LISTEN_STATE) continue

    const key = `${conn.localPort}-${protoLabel(conn.type, conn.family)}`
    if (seen.has(key)) continue
    seen.add(key)
    listeners.push(conn)
  }

  const ports = await Promise.all(
    listeners.map(async (conn) =>
      Object.freeze({
        port: conn.localPort,
        proto: protoLabel(conn.type, conn.family),
        address: normalizeBindAddress(conn.localAddress),
        pid: conn.pid,
        process: await resolveName(conn.pid, resolve)
      })
    )
  )

  // Array.prototype.sort is stable, so equal ports keep enumeration order
  return ports.sort((a, b) => a.port - b.port)
}

export function buildInterfaces(
  raw: readonly RawInterface[],
  counters: readonly RawIoCounter[]
): InterfaceRecord[] {
  const countersByName = new Map(counters.map((counter) => [counter.name, counter]))

  return raw
    .filter((iface) => !iface.loopback)
    .map((iface) => {
      const io = countersByName.get(iface.name)
      return Object.freeze({
        name: iface.name,
        up: iface.up,
        addresses: Object.freeze([...iface.addresses]),
        rxBytes: io?.bytesRecv ?? 0,
        txBytes: io?.bytesSent ?? 0
      })
    })
}

function settledOrEmpty<T>(result: PromiseSettledResult<T[]>, source: string): T[] {
  if (result.status === 'fulfilled') return result.value
  logger.debug(`${source} unavailable for this pass`, { error: result.reason })
  return []
}

/**
 * Runs one acquisition pass and turns it into the three display lists. A
 * failing source empties only the lists derived from it.
 */
export async function normalizeSnapshot(
  acquisition: NetworkAcquisition,
  now: () => Date = () => new Date()
): Promise<DashboardData> {
  const [connResult, ifaceResult, counterResult] = await Promise.allSettled([
    acquisition.listConnections(),
    acquisition.listInterfaces(),
    acquisition.listIoCounters()
  ])

  const rawConnections = settledOrEmpty(connResult, 'Connection enumeration')
  const rawInterfaces = settledOrEmpty(ifaceResult, 'Interface enumeration')
  const rawCounters = settledOrEmpty(counterResult, 'Interface counters')

  const resolve = createProcessNameResolver(acquisition)
  const [connections, ports] = await Promise.all([
    buildConnections(rawConnections, resolve),
    buildPorts(rawConnections, resolve)
  ])

  return Object.freeze({
    connections: Object.freeze(connections),
    ports: Object.freeze(ports),
    interfaces: Object.freeze(buildInterfaces(rawInterfaces, rawCounters)),
    refreshedAt: now()
  })
}
