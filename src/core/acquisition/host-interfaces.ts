import { readdir, readFile } from 'node:fs/promises'
import { networkInterfaces, type NetworkInterfaceInfo } from 'node:os'
import { join } from 'node:path'
import { IFF_LOOPBACK, IFF_UP } from '@config/constants'
import { logger } from '@infra/logging'
import type { RawInterface } from '@shared/interfaces/common'

const SYS_CLASS_NET = '/sys/class/net'

type AddressTable = NodeJS.Dict<NetworkInterfaceInfo[]>

function isInternalOnly(infos: NetworkInterfaceInfo[] | undefined): boolean {
  return infos !== undefined && infos.length > 0 && infos.every((info) => info.internal)
}

function formatAddresses(infos: NetworkInterfaceInfo[] | undefined): string[] {
  return (infos ?? []).map((info) => info.cidr ?? info.address)
}

export function parseInterfaceFlags(raw: string): { up: boolean; loopback: boolean } | null {
  const flags = Number.parseInt(raw.trim(), 16)
  if (Number.isNaN(flags)) return null
  return {
    up: (flags & IFF_UP) !== 0,
    loopback: (flags & IFF_LOOPBACK) !== 0
  }
}

// sysfs lists interfaces that are down or have no address, which os.networkInterfaces() omits
async function collectLinuxInterfaces(addresses: AddressTable): Promise<RawInterface[]> {
  const names = await readdir(SYS_CLASS_NET)
  const result: RawInterface[] = []

  for (const name of names.sort()) {
    let flags: { up: boolean; loopback: boolean } | null = null
    try {
      flags = parseInterfaceFlags(await readFile(join(SYS_CLASS_NET, name, 'flags'), 'utf8'))
    } catch (error) {
      logger.debug('Unable to read interface flags', { name, error })
    }

    const infos = addresses[name]
    result.push({
      name,
      up: flags?.up ?? (infos !== undefined && infos.length > 0),
      loopback: flags?.loopback ?? isInternalOnly(infos),
      addresses: formatAddresses(infos)
    })
  }

  return result
}

function collectPortableInterfaces(addresses: AddressTable): RawInterface[] {
  return Object.entries(addresses).map(([name, infos]) => ({
    name,
    up: true,
    loopback: isInternalOnly(infos),
    addresses: formatAddresses(infos)
  }))
}

export async function collectInterfaces(
  platform: NodeJS.Platform = process.platform
): Promise<RawInterface[]> {
  const addresses = networkInterfaces()
  if (platform === 'linux') {
    return collectLinuxInterfaces(addresses)
  }
  return collectPortableInterfaces(addresses)
}
