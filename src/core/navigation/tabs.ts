export const TABS = ['connections', 'ports', 'interfaces'] as const

export type Tab = (typeof TABS)[number]

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`)
}

export function tabTitle(tab: Tab): string {
  switch (tab) {
    case 'connections':
      return 'Connections'
    case 'ports':
      return 'Ports'
    case 'interfaces':
      return 'Interfaces'
    default:
      return assertNever(tab)
  }
}

function shiftTab(tab: Tab, step: number): Tab {
  const index = TABS.indexOf(tab)
  return TABS[(index + step + TABS.length) % TABS.length]
}

export function nextTab(tab: Tab): Tab {
  return shiftTab(tab, 1)
}

export function previousTab(tab: Tab): Tab {
  return shiftTab(tab, -1)
}
