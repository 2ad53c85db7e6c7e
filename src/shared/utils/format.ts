import { ELLIPSIS } from '@config/constants'

const BYTE_UNIT = 1024
const BYTE_PREFIXES = 'KMGTPE'

/**
 * Cuts `value` to `limit` display characters. Limits of 3 or less cut without
 * the ellipsis marker.
 */
export function truncate(value: string, limit: number): string {
  const chars = Array.from(value)
  if (chars.length <= limit) return value
  if (limit <= ELLIPSIS.length) return chars.slice(0, Math.max(limit, 0)).join('')
  return chars.slice(0, limit - ELLIPSIS.length).join('') + ELLIPSIS
}

export function displayWidth(value: string): number {
  return Array.from(value).length
}

// hard cut at the terminal edge, no ellipsis
export function clip(value: string, width: number): string {
  return Array.from(value).slice(0, Math.max(width, 0)).join('')
}

/**
 * Fits space-separated segments into `width` columns. Segments past the edge
 * are dropped and the one crossing it is cut.
 */
export function clipSegments(segments: readonly string[], width: number): string[] {
  const fitted: string[] = []
  let used = 0

  for (const segment of segments) {
    const separator = fitted.length > 0 ? 1 : 0
    const room = width - used - separator
    if (room <= 0) break

    const piece = clip(segment, room)
    fitted.push(piece)
    used += separator + displayWidth(piece)
    if (displayWidth(piece) < displayWidth(segment)) break
  }

  return fitted
}

export function padCell(value: string, width: number): string {
  const cut = truncate(value, width)
  return cut + ' '.repeat(Math.max(width - displayWidth(cut), 0))
}

export function formatBytes(bytes: number): string {
  if (bytes < BYTE_UNIT) return `${bytes} B`

  let divisor = BYTE_UNIT
  let exponent = 0
  let scaled = bytes / BYTE_UNIT
  while (scaled >= BYTE_UNIT && exponent < BYTE_PREFIXES.length - 1) {
    scaled /= BYTE_UNIT
    divisor *= BYTE_UNIT
    exponent += 1
  }
  return `${(bytes / divisor).toFixed(1)} ${BYTE_PREFIXES[exponent]}B`
}

export function formatClock(date: Date | null): string {
  if (!date) return '--:--:--'
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join(':')
}
