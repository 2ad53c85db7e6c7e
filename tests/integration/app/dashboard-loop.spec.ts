import { describe, expect, it, vi } from 'vitest'
import { runDashboard } from '@app/dashboard-loop'
import { EventChannel } from '@app/event-channel'
import type { DashboardEvent } from '@core/navigation/state'
import { normalizeSnapshot } from '@core/network/normalizer'
import { DataPoller } from '@core/network/poller'
import { PLAIN_THEME } from '@core/render/theme'
import type { RawConnection } from '@shared/interfaces/common'
import {
  FakeAcquisition,
  deferred,
  flushPromises,
  rawConnection,
  rawInterface
} from '../../helpers/fake-acquisition'
import { makeData } from '../../helpers/records'

const QUIT: DashboardEvent = { type: 'command', command: { kind: 'quit' } }

class RecordingView {
  readonly frames: string[] = []

  draw(frame: string): void {
    this.frames.push(frame)
  }

  get lastLines(): string[] {
    return (this.frames[this.frames.length - 1] ?? '').split('\n')
  }
}

function setup() {
  const channel = new EventChannel<DashboardEvent>()
  const view = new RecordingView()
  const onRefresh = vi.fn()
  const run = () => runDashboard({ channel, view, theme: PLAIN_THEME, onRefresh })
  return { channel, view, onRefresh, run }
}

describe('runDashboard', () => {
  it('renders an empty host end to end and stops on quit', async () => {
    const { channel, view, run } = setup()
    const data = await normalizeSnapshot(new FakeAcquisition())

    channel.push({ type: 'resize', width: 80, height: 24 })
    channel.push({ type: 'data', data })
    channel.push(QUIT)
    const model = await run()

    expect(view.frames).toHaveLength(3)
    expect(view.frames[0]).toBe('loading...')
    expect(view.lastLines[5]).toBe('0 connections')
    expect(model.nav.cursor).toBe(0)
    expect(channel.isClosed).toBe(true)
  })

  it('keeps showing interfaces when connection enumeration fails', async () => {
    const { channel, view, run } = setup()
    const acquisition = new FakeAcquisition()
    acquisition.connections = new Error('permission denied')
    acquisition.interfaces = [rawInterface()]
    const data = await normalizeSnapshot(acquisition)

    channel.push({ type: 'resize', width: 80, height: 24 })
    channel.push({ type: 'data', data })
    channel.push({ type: 'command', command: { kind: 'select-tab', tab: 'interfaces' } })
    channel.push(QUIT)
    const model = await run()

    expect(model.data.connections).toEqual([])
    expect(view.lastLines[4].startsWith('eth0')).toBe(true)
    expect(view.lastLines[6]).toBe('1 interfaces')
  })

  it('reaches the same frame whichever of size and data arrives first', async () => {
    const data = makeData({ connections: 20 })
    const resize: DashboardEvent = { type: 'resize', width: 80, height: 12 }
    const refresh: DashboardEvent = { type: 'data', data }
    const jumpEnd: DashboardEvent = { type: 'command', command: { kind: 'jump-end' } }

    const outcomes = []
    for (const order of [
      [resize, refresh],
      [refresh, resize]
    ]) {
      const { channel, view, run } = setup()
      for (const event of [...order, jumpEnd, QUIT]) channel.push(event)
      const model = await run()
      outcomes.push({ nav: model.nav, frame: view.frames[view.frames.length - 1] })
    }

    expect(outcomes[0].nav).toMatchObject({ cursor: 19, offset: 15 })
    expect(outcomes[1]).toEqual(outcomes[0])
  })

  it('keeps handling keys while a poll pass hangs', async () => {
    const { channel, view, run } = setup()
    const hung = deferred<RawConnection[]>()
    const acquisition = new FakeAcquisition()
    acquisition.connections = () => hung.promise
    const poller = new DataPoller(acquisition, (data) => channel.push({ type: 'data', data }), 60_000)

    try {
      poller.start()
      const finished = run()

      channel.push({ type: 'resize', width: 80, height: 24 })
      channel.push({ type: 'command', command: { kind: 'select-tab', tab: 'ports' } })
      await flushPromises()

      expect(view.frames).toHaveLength(3)
      expect(view.lastLines[5]).toBe('0 listening ports')

      hung.resolve([rawConnection({ status: 'LISTEN', localAddress: '0.0.0.0', localPort: 22 })])
      await flushPromises()

      expect(view.frames).toHaveLength(4)
      expect(view.lastLines[6]).toBe('1 listening ports')

      channel.push(QUIT)
      const model = await finished
      expect(model.nav.tab).toBe('ports')
    } finally {
      poller.stop()
    }
  })

  it('asks for a poll pass on refresh and redraws', async () => {
    const { channel, view, onRefresh, run } = setup()

    channel.push({ type: 'command', command: { kind: 'refresh' } })
    channel.push(QUIT)
    await run()

    expect(onRefresh).toHaveBeenCalledTimes(1)
    expect(view.frames).toHaveLength(2)
  })

  it('drops events queued behind a quit', async () => {
    const { channel, view, run } = setup()

    channel.push(QUIT)
    channel.push({ type: 'resize', width: 80, height: 24 })
    await run()

    expect(view.frames).toEqual(['loading...'])
    expect(channel.size).toBe(0)
  })
})
