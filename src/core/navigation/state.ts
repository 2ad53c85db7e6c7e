import { FIXED_CHROME_ROWS } from '@config/constants'
import { EMPTY_DASHBOARD_DATA, type DashboardData } from '@shared/interfaces/common'
import { assertNever, nextTab, previousTab, type Tab } from './tabs'

export interface NavigationState {
  readonly tab: Tab
  readonly cursor: number
  readonly offset: number
  readonly width: number
  readonly height: number
}

export type Command =
  | { kind: 'quit' }
  | { kind: 'tab-forward' }
  | { kind: 'tab-backward' }
  | { kind: 'select-tab'; tab: Tab }
  | { kind: 'move-down' }
  | { kind: 'move-up' }
  | { kind: 'jump-start' }
  | { kind: 'jump-end' }
  | { kind: 'refresh' }

export type DashboardEvent =
  | { type: 'command'; command: Command }
  | { type: 'resize'; width: number; height: number }
  | { type: 'data'; data: DashboardData }

export type Effect = 'quit' | 'refresh'

export interface DashboardModel {
  readonly nav: NavigationState
  readonly data: DashboardData
}

export interface Transition {
  readonly model: DashboardModel
  readonly effects: readonly Effect[]
}

export function createInitialModel(): DashboardModel {
  return {
    nav: { tab: 'connections', cursor: 0, offset: 0, width: 0, height: 0 },
    data: EMPTY_DASHBOARD_DATA
  }
}

export function activeListLength(tab: Tab, data: DashboardData): number {
  switch (tab) {
    case 'connections':
      return data.connections.length
    case 'ports':
      return data.ports.length
    case 'interfaces':
      return data.interfaces.length
    default:
      return assertNever(tab)
  }
}

export function pageSize(height: number): number {
  return Math.max(height - FIXED_CHROME_ROWS, 1)
}

export function clampCursor(cursor: number, length: number): number {
  return Math.min(Math.max(cursor, 0), Math.max(length - 1, 0))
}

export function followCursor(cursor: number, offset: number, size: number): number {
  if (cursor < offset) return cursor
  if (cursor >= offset + size) return cursor - size + 1
  return offset
}

/**
 * Re-clamps the cursor to the active list and moves the scroll window so the
 * cursor row stays visible.
 */
export function settle(nav: NavigationState, data: DashboardData): NavigationState {
  const cursor = clampCursor(nav.cursor, activeListLength(nav.tab, data))
  const offset = followCursor(cursor, Math.max(nav.offset, 0), pageSize(nav.height))
  if (cursor === nav.cursor && offset === nav.offset) return nav
  return { ...nav, cursor, offset }
}

function applyCommand(model: DashboardModel, command: Command): Transition {
  const { nav, data } = model
  const stay = (next: NavigationState): Transition => ({
    model: { data, nav: settle(next, data) },
    effects: []
  })

  switch (command.kind) {
    case 'quit':
      return { model, effects: ['quit'] }
    case 'refresh':
      return { model, effects: ['refresh'] }
    case 'tab-forward':
      return stay({ ...nav, tab: nextTab(nav.tab), cursor: 0, offset: 0 })
    case 'tab-backward':
      return stay({ ...nav, tab: previousTab(nav.tab), cursor: 0, offset: 0 })
    case 'select-tab':
      return stay({ ...nav, tab: command.tab, cursor: 0, offset: 0 })
    case 'move-down':
      return stay({ ...nav, cursor: nav.cursor + 1 })
    case 'move-up':
      return stay({ ...nav, cursor: Math.max(nav.cursor - 1, 0) })
    case 'jump-start':
      return stay({ ...nav, cursor: 0, offset: 0 })
    case 'jump-end':
      return stay({ ...nav, cursor: activeListLength(nav.tab, data) - 1 })
    default:
      return assertNever(command)
  }
}

export function update(model: DashboardModel, event: DashboardEvent): Transition {
  switch (event.type) {
    case 'command':
      return applyCommand(model, event.command)
    case 'resize': {
      const nav = { ...model.nav, width: event.width, height: event.height }
      return { model: { data: model.data, nav: settle(nav, model.data) }, effects: [] }
    }
    case 'data':
      return { model: { data: event.data, nav: settle(model.nav, event.data) }, effects: [] }
    default:
      return assertNever(event)
  }
}
