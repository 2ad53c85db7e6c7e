import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { APP_NAME } from '@config/constants'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/**
 * Check if the dashboard is running in development mode (`NODE_ENV=development`).
 */
export function isDevelopment(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV === 'development'
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.NETDASH_LOG_LEVEL?.trim().toLowerCase()
  if (requested && isLogLevel(requested)) return requested
  return isDevelopment(env) ? 'debug' : 'info'
}

// The dashboard owns the terminal, so logs always go to a file.
export function resolveLogFile(env: NodeJS.ProcessEnv = process.env): string {
  const requested = env.NETDASH_LOG_FILE?.trim()
  return requested || join(tmpdir(), `${APP_NAME}.log`)
}
