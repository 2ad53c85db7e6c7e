import { POLL_INTERVAL_MS } from '@config/constants'
import { logger } from '@infra/logging'
import type { DashboardData, NetworkAcquisition } from '@shared/interfaces/common'
import { normalizeSnapshot } from './normalizer'

/**
 * Runs a normalization pass at startup, on every interval and on request.
 * At most one pass is outstanding: a trigger that arrives while a pass is
 * still running is dropped, not queued. Passes have no timeout.
 */
export class DataPoller {
  private pollingTimer: NodeJS.Timeout | null = null
  private passInFlight = false
  private isStopping = true
  private skippedPasses = 0

  constructor(
    private readonly acquisition: NetworkAcquisition,
    private readonly onData: (data: DashboardData) => void,
    private readonly intervalMs: number = POLL_INTERVAL_MS
  ) {}

  start(): void {
    if (this.pollingTimer) {
      logger.warn('Poller already running')
      return
    }

    this.isStopping = false
    this.requestPass()
    this.pollingTimer = setInterval(() => {
      this.requestPass()
    }, this.intervalMs)

    logger.info('Poller started', { intervalMs: this.intervalMs })
  }

  stop(): void {
    if (!this.pollingTimer) {
      return
    }

    this.isStopping = true
    clearInterval(this.pollingTimer)
    this.pollingTimer = null
    logger.info('Poller stopped', { skippedPasses: this.skippedPasses })
  }

  /** Returns false when the trigger was dropped. */
  requestPass(): boolean {
    if (this.isStopping) {
      return false
    }

    if (this.passInFlight) {
      this.skippedPasses += 1
      logger.debug('Previous pass still outstanding, skipping trigger', {
        skippedPasses: this.skippedPasses
      })
      return false
    }

    this.passInFlight = true
    void this.runPass()
    return true
  }

  private async runPass(): Promise<void> {
    try {
      const data = await normalizeSnapshot(this.acquisition)

      if (!this.isStopping) {
        this.onData(data)
      }
    } catch (error) {
      logger.error('Failed to complete poll pass:', error)
    } finally {
      this.passInFlight = false
    }
  }

  isRunning(): boolean {
    return this.pollingTimer !== null && !this.isStopping
  }

  isPassInFlight(): boolean {
    return this.passInFlight
  }

  getSkippedPasses(): number {
    return this.skippedPasses
  }
}
