import {
  createInitialModel,
  update,
  type DashboardEvent,
  type DashboardModel
} from '@core/navigation/state'
import { renderFrame } from '@core/render/frame'
import type { Theme } from '@core/render/theme'
import { logger } from '@infra/logging'
import type { EventChannel } from './event-channel'

export interface DashboardView {
  /** Starts delivering key and resize events; emits the current size once. */
  attach(push: (event: DashboardEvent) => void): void
  draw(frame: string): void
  destroy(): void
}

export interface DashboardLoopOptions {
  channel: EventChannel<DashboardEvent>
  view: Pick<DashboardView, 'draw'>
  theme: Theme
  onRefresh: () => void
  model?: DashboardModel
}

/**
 * The coordinator. It is the only owner of the dashboard model: events are
 * taken from the channel one at a time, applied, and followed by exactly one
 * redraw. Resolves with the final model once a quit effect is seen or the
 * channel closes.
 */
export async function runDashboard(options: DashboardLoopOptions): Promise<DashboardModel> {
  const { channel, view, theme, onRefresh } = options
  let model = options.model ?? createInitialModel()

  view.draw(renderFrame(model.nav, model.data, theme))

  for await (const event of channel) {
    const transition = update(model, event)
    model = transition.model

    if (transition.effects.includes('quit')) {
      logger.info('Quit requested')
      channel.close()
      break
    }

    for (const effect of transition.effects) {
      if (effect === 'refresh') onRefresh()
    }

    view.draw(renderFrame(model.nav, model.data, theme))
  }

  return model
}
