import type { Theme } from '@core/render/theme'
import type { DashboardEvent } from '@core/navigation/state'
import { DataPoller } from '@core/network/poller'
import { logger } from '@infra/logging'
import type { NetworkAcquisition } from '@shared/interfaces/common'
import { runDashboard, type DashboardView } from './dashboard-loop'
import { EventChannel } from './event-channel'
import { registerProcessSignalHandlers } from './lifecycle'

export interface AppDependencies {
  acquisition: NetworkAcquisition
  createView: () => DashboardView
  theme: Theme
  pollIntervalMs?: number
}

const QUIT_EVENT: DashboardEvent = { type: 'command', command: { kind: 'quit' } }

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function reportFatal(error: unknown): void {
  logger.error('Dashboard terminated with an error', error)
  process.stderr.write(`error: ${describeError(error)}\n`)
}

/**
 * Wires the poller, the view and the coordinator together and runs until
 * quit. Resolves with the process exit code.
 */
export async function startApp(deps: AppDependencies): Promise<number> {
  let view: DashboardView
  try {
    view = deps.createView()
  } catch (error) {
    reportFatal(error)
    return 1
  }

  const channel = new EventChannel<DashboardEvent>()
  const poller = new DataPoller(
    deps.acquisition,
    (data) => {
      channel.push({ type: 'data', data })
    },
    deps.pollIntervalMs
  )
  const disposeSignals = registerProcessSignalHandlers(() => {
    channel.push(QUIT_EVENT)
  })

  let failure: { error: unknown } | null = null
  try {
    view.attach((event) => {
      channel.push(event)
    })
    poller.start()
    await runDashboard({
      channel,
      view,
      theme: deps.theme,
      onRefresh: () => {
        poller.requestPass()
      }
    })
  } catch (error) {
    failure = { error }
  } finally {
    poller.stop()
    disposeSignals()
    view.destroy()
  }

  // the view is gone by now, so the diagnostic lands on the real terminal
  if (failure) {
    reportFatal(failure.error)
    return 1
  }
  return 0
}
