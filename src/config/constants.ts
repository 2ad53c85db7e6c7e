export const APP_NAME = 'netdash'

export const POLL_INTERVAL_MS = 2000

// header, tab bar, blank, column header, blank, count footer, help footer
export const FIXED_CHROME_ROWS = 7

export const LISTEN_STATE = 'LISTEN'
export const WILDCARD_ADDRESS = '*'
export const WILDCARD_BIND_ADDRESSES = new Set(['', '0.0.0.0', '::'])

// socket type and address family codes as reported by the host
export const SOCK_STREAM = 1
export const SOCK_DGRAM = 2
export const AF_INET = 2
export const AF_INET6 = 10
export const AF_INET6_WINDOWS = 23
export const IPV6_FAMILIES = new Set([AF_INET6, AF_INET6_WINDOWS])

// /sys/class/net/<iface>/flags bits
export const IFF_UP = 0x1
export const IFF_LOOPBACK = 0x8

export const MAX_STDOUT_BUFFER = 10 * 1024 * 1024

export const ELLIPSIS = '...'
export const PLACEHOLDER_FRAME = 'loading...'
export const HELP_TEXT = 'q quit • tab/1-3 switch • j/k navigate • g/G top/bottom • r refresh'
