import pino, { type LoggerOptions } from 'pino'
import { APP_NAME } from '@config/constants'
import { isDevelopment, resolveLogFile, resolveLogLevel } from '@shared/utils/environment'

const isDevMode = isDevelopment()
const logFile = resolveLogFile()

const baseOptions: LoggerOptions = {
  level: resolveLogLevel(),
  formatters: {
    level: (label) => {
      return { level: label }
    }
  },
  base: {
    pid: process.pid,
    app: APP_NAME
  }
}

// stdout belongs to the dashboard, so both modes write to the log file
const pinoLogger = isDevMode
  ? pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: logFile,
          mkdir: true,
          colorize: false,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname'
        }
      }
    })
  : pino(baseOptions, pino.destination({ dest: logFile, mkdir: true, sync: false }))

type LogLevelMethod = 'info' | 'warn' | 'error' | 'debug'

function toLogObject(value: unknown): object {
  if (value instanceof Error) return { err: value }
  if (value !== null && typeof value === 'object') return value
  return { data: value }
}

// Helper function to normalize logger arguments
// Supports both: logger.info(msg, obj) and logger.info(obj, msg)
function createLogMethod(level: LogLevelMethod) {
  return (msgOrObj: string | object, objOrMsg?: unknown): void => {
    if (typeof msgOrObj === 'string') {
      // Pattern: logger.info('message', { data }) or logger.info('message', error)
      if (objOrMsg !== undefined) {
        pinoLogger[level](toLogObject(objOrMsg), msgOrObj)
      } else {
        pinoLogger[level](msgOrObj)
      }
    } else {
      // Pattern: logger.info({ data }, 'message')
      if (typeof objOrMsg === 'string') {
        pinoLogger[level](toLogObject(msgOrObj), objOrMsg)
      } else {
        pinoLogger[level](toLogObject(msgOrObj))
      }
    }
  }
}

// Export wrapped logger that supports flexible argument patterns
export const logger = {
  info: createLogMethod('info'),
  warn: createLogMethod('warn'),
  error: createLogMethod('error'),
  debug: createLogMethod('debug'),
  // the destination is asynchronous; `done` runs once buffered lines are written
  flush: (done: () => void): void => {
    pinoLogger.flush(() => {
      done()
    })
  }
}
