import { APP_NAME, HELP_TEXT, PLACEHOLDER_FRAME } from '@config/constants'
import { pageSize, type NavigationState } from '@core/navigation/state'
import { assertNever, TABS, tabTitle } from '@core/navigation/tabs'
import type {
  ConnectionRecord,
  DashboardData,
  InterfaceRecord,
  PortRecord
} from '@shared/interfaces/common'
import {
  clip,
  clipSegments,
  displayWidth,
  formatBytes,
  formatClock,
  padCell,
  truncate
} from '@shared/utils/format'
import type { StyleFn, Theme } from './theme'

export interface Column<R> {
  readonly title: string
  readonly width: number
  readonly value: (record: R) => string
  readonly tone?: (record: R, theme: Theme) => StyleFn
}

interface TableView<R> {
  readonly columns: readonly Column<R>[]
  readonly records: readonly R[]
  readonly noun: string
}

export const CONNECTION_COLUMNS: readonly Column<ConnectionRecord>[] = [
  { title: 'PROTO', width: 7, value: (c) => c.proto },
  { title: 'LOCAL', width: 21, value: (c) => c.local },
  { title: 'REMOTE', width: 21, value: (c) => c.remote },
  { title: 'STATE', width: 11, value: (c) => c.state },
  { title: 'PROCESS', width: 15, value: (c) => c.process }
]

export const PORT_COLUMNS: readonly Column<PortRecord>[] = [
  { title: 'PORT', width: 7, value: (p) => String(p.port) },
  { title: 'PROTO', width: 7, value: (p) => p.proto },
  { title: 'ADDRESS', width: 16, value: (p) => p.address },
  { title: 'PID', width: 8, value: (p) => String(p.pid) },
  { title: 'PROCESS', width: 20, value: (p) => p.process }
]

export const INTERFACE_COLUMNS: readonly Column<InterfaceRecord>[] = [
  { title: 'NAME', width: 12, value: (i) => i.name },
  {
    title: 'STATE',
    width: 6,
    value: (i) => (i.up ? 'up' : 'down'),
    tone: (i, theme) => (i.up ? theme.stateUp : theme.stateDown)
  },
  { title: 'ADDRESS', width: 22, value: (i) => i.addresses[0] ?? '-' },
  { title: 'RX', width: 12, value: (i) => formatBytes(i.rxBytes) },
  { title: 'TX', width: 12, value: (i) => formatBytes(i.txBytes) }
]

// every cell but the last is padded to its column width
function layoutCells<R>(columns: readonly Column<R>[], values: readonly string[]): string[] {
  return values.map((value, index) =>
    index === columns.length - 1
      ? truncate(value, columns[index].width)
      : padCell(value, columns[index].width)
  )
}

export function renderColumnHeader<R>(columns: readonly Column<R>[], width: number): string {
  return clipSegments(
    layoutCells(
      columns,
      columns.map((column) => column.title)
    ),
    width
  ).join(' ')
}

export function renderRecord<R>(
  columns: readonly Column<R>[],
  record: R,
  selected: boolean,
  theme: Theme,
  width: number
): string {
  const cells = clipSegments(
    layoutCells(
      columns,
      columns.map((column) => column.value(record))
    ),
    width
  )
  if (selected) return theme.selected(theme.escape(cells.join(' ')))

  return cells
    .map((cell, index) => {
      const safe = theme.escape(cell)
      const tone = columns[index].tone?.(record, theme)
      return tone ? tone(safe) : safe
    })
    .join(' ')
}

function renderTable<R>(view: TableView<R>, nav: NavigationState, theme: Theme): string[] {
  const end = Math.min(nav.offset + pageSize(nav.height), view.records.length)
  const lines = [theme.header(renderColumnHeader(view.columns, nav.width))]

  for (let index = nav.offset; index < end; index += 1) {
    lines.push(
      renderRecord(view.columns, view.records[index], index === nav.cursor, theme, nav.width)
    )
  }

  lines.push('', theme.dim(clip(`${view.records.length} ${view.noun}`, nav.width)))
  return lines
}

function renderContent(nav: NavigationState, data: DashboardData, theme: Theme): string[] {
  switch (nav.tab) {
    case 'connections':
      return renderTable(
        { columns: CONNECTION_COLUMNS, records: data.connections, noun: 'connections' },
        nav,
        theme
      )
    case 'ports':
      return renderTable(
        { columns: PORT_COLUMNS, records: data.ports, noun: 'listening ports' },
        nav,
        theme
      )
    case 'interfaces':
      return renderTable(
        { columns: INTERFACE_COLUMNS, records: data.interfaces, noun: 'interfaces' },
        nav,
        theme
      )
    default:
      return assertNever(nav.tab)
  }
}

export function renderHeader(width: number, refreshedAt: Date | null, theme: Theme): string {
  const title = clip(` ${APP_NAME} `, width)
  const clock = clip(formatClock(refreshedAt), width - displayWidth(title))
  const gap = Math.max(width - displayWidth(title) - displayWidth(clock), 0)
  return theme.title(title) + ' '.repeat(gap) + theme.dim(clock)
}

export function renderTabBar(active: NavigationState['tab'], theme: Theme, width: number): string {
  const labels = clipSegments(
    TABS.map((tab) => ` ${tabTitle(tab)} `),
    width
  )
  return labels
    .map((label, index) => (TABS[index] === active ? theme.tabActive(label) : theme.tabInactive(label)))
    .join(' ')
}

/**
 * Renders one full frame. Pure: the viewport size and the clock value come
 * from the inputs. No line is wider than the viewport, so the view never
 * wraps.
 */
export function renderFrame(nav: NavigationState, data: DashboardData, theme: Theme): string {
  if (nav.width <= 0) return PLACEHOLDER_FRAME

  return [
    renderHeader(nav.width, data.refreshedAt, theme),
    renderTabBar(nav.tab, theme, nav.width),
    '',
    ...renderContent(nav, data, theme),
    theme.dim(clip(HELP_TEXT, nav.width))
  ].join('\n')
}
