export interface RawConnection {
  type: number
  family: number
  localAddress: string
  localPort: number
  remoteAddress: string
  remotePort: number
  status: string
  pid: number
}

export interface RawInterface {
  name: string
  up: boolean
  loopback: boolean
  addresses: string[]
}

export interface RawIoCounter {
  name: string
  bytesRecv: number
  bytesSent: number
}

export type ProcessNameLookup = (pid: number) => Promise<string>

/**
 * Host capability the normalizer reads from. Every method may reject; the
 * caller decides how a failure degrades.
 */
export interface NetworkAcquisition {
  listConnections(): Promise<RawConnection[]>
  /** Lookup scoped to one pass; it may share a process-table read across calls. */
  openProcessLookup(): ProcessNameLookup
  listInterfaces(): Promise<RawInterface[]>
  listIoCounters(): Promise<RawIoCounter[]>
}

export type TransportLabel = 'tcp' | 'udp' | 'tcp6' | 'udp6'

export interface ConnectionRecord {
  readonly proto: TransportLabel
  readonly local: string
  readonly remote: string
  readonly state: string
  readonly pid: number
  readonly process: string
}

export interface PortRecord {
  readonly port: number
  readonly proto: TransportLabel
  readonly address: string
  readonly pid: number
  readonly process: string
}

export interface InterfaceRecord {
  readonly name: string
  readonly up: boolean
  readonly addresses: readonly string[]
  readonly rxBytes: number
  readonly txBytes: number
}

export interface DashboardData {
  readonly connections: readonly ConnectionRecord[]
  readonly ports: readonly PortRecord[]
  readonly interfaces: readonly InterfaceRecord[]
  readonly refreshedAt: Date | null
}

export const EMPTY_DASHBOARD_DATA: DashboardData = Object.freeze({
  connections: Object.freeze([]),
  ports: Object.freeze([]),
  interfaces: Object.freeze([]),
  refreshedAt: null
})
