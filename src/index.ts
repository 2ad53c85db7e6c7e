import { startApp } from '@app/bootstrap'
import { BlessedTerminal } from '@app/terminal'
import { APP_NAME } from '@config/constants'
import { HostAcquisition } from '@core/acquisition/host-acquisition'
import { createTagTheme } from '@core/render/theme'
import { logger } from '@infra/logging'

startApp({
  acquisition: new HostAcquisition(),
  createView: () => new BlessedTerminal(APP_NAME),
  theme: createTagTheme()
})
  .then((exitCode) => {
    logger.flush(() => process.exit(exitCode))
  })
  .catch((error: unknown) => {
    logger.error('Failed to bootstrap dashboard', error)
    process.stderr.write(`error: ${error instanceof Error ? error.message : String(error)}\n`)
    process.exit(1)
  })
