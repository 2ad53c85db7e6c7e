import { logger } from '@infra/logging'

/**
 * Routes termination signals to `onSignal`. Returns a function removing the
 * handlers again.
 */
export function registerProcessSignalHandlers(onSignal: () => void): () => void {
  const handleSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`)
    onSignal()
  }

  process.on('SIGINT', handleSignal)
  process.on('SIGTERM', handleSignal)

  return () => {
    process.off('SIGINT', handleSignal)
    process.off('SIGTERM', handleSignal)
  }
}
