import { readFile } from 'node:fs/promises'
import psList from 'ps-list'
import type { ProcessNameLookup } from '@shared/interfaces/common'

function assertValidPid(pid: number): void {
  if (!Number.isInteger(pid) || pid <= 0) {
    throw new Error(`Invalid process id: ${pid}`)
  }
}

async function readComm(pid: number): Promise<string> {
  const name = (await readFile(`/proc/${pid}/comm`, 'utf8')).trim()
  if (!name) throw new Error(`Process ${pid} has no name`)
  return name
}

async function readProcessTable(): Promise<Map<number, string>> {
  const processes = await psList()
  return new Map(processes.map((descriptor) => [descriptor.pid, descriptor.name]))
}

/**
 * Opens a pid → name lookup. On Linux each pid reads the kernel's `comm`
 * entry; elsewhere the ps-list table is read on first use and shared by every
 * later call on the same lookup. Lookups reject when the process is gone or
 * not visible to the current user.
 */
export function createProcessLookup(
  platform: NodeJS.Platform = process.platform
): ProcessNameLookup {
  let table: Promise<Map<number, string>> | null = null

  return async (pid) => {
    assertValidPid(pid)
    if (platform === 'linux') return readComm(pid)

    if (!table) table = readProcessTable()
    const name = (await table).get(pid)
    if (name === undefined) {
      throw new Error(`Process ${pid} not found`)
    }
    return name
  }
}
