export type StyleFn = (text: string) => string

export interface Theme {
  readonly title: StyleFn
  readonly dim: StyleFn
  readonly header: StyleFn
  readonly selected: StyleFn
  readonly tabActive: StyleFn
  readonly tabInactive: StyleFn
  readonly stateUp: StyleFn
  readonly stateDown: StyleFn
  /** Makes host-supplied text safe to embed in styled output. */
  readonly escape: StyleFn
}

export interface Palette {
  readonly accent: string
  readonly muted: string
  readonly heading: string
  readonly selectionText: string
  readonly tabBackground: string
  readonly up: string
  readonly down: string
}

export const NORD_PALETTE: Palette = Object.freeze({
  accent: '#88c0d0',
  muted: '#4c566a',
  heading: '#81a1c1',
  selectionText: '#2e3440',
  tabBackground: '#3b4252',
  up: '#a3be8c',
  down: '#bf616a'
})

const identity: StyleFn = (text) => text

export const PLAIN_THEME: Theme = Object.freeze({
  title: identity,
  dim: identity,
  header: identity,
  selected: identity,
  tabActive: identity,
  tabInactive: identity,
  stateUp: identity,
  stateDown: identity,
  escape: identity
})

type TagSpec = { fg?: string; bg?: string; bold?: boolean }

function tagStyle({ fg, bg, bold }: TagSpec): StyleFn {
  const open = [bold ? '{bold}' : '', fg ? `{${fg}-fg}` : '', bg ? `{${bg}-bg}` : ''].join('')
  return (text) => `${open}${text}{/}`
}

// blessed treats `{` as the start of a tag
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (brace) => (brace === '{' ? '{open}' : '{close}'))
}

/**
 * Theme emitting blessed content tags. Built once at startup and passed to
 * the renderer.
 */
export function createTagTheme(palette: Palette = NORD_PALETTE): Theme {
  return Object.freeze({
    title: tagStyle({ fg: palette.accent, bold: true }),
    dim: tagStyle({ fg: palette.muted }),
    header: tagStyle({ fg: palette.heading, bold: true }),
    selected: tagStyle({ fg: palette.selectionText, bg: palette.accent, bold: true }),
    tabActive: tagStyle({ fg: palette.accent, bg: palette.tabBackground, bold: true }),
    tabInactive: tagStyle({ fg: palette.muted }),
    stateUp: tagStyle({ fg: palette.up }),
    stateDown: tagStyle({ fg: palette.down }),
    escape: escapeTags
  })
}
