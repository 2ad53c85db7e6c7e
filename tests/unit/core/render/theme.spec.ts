import { describe, expect, it } from 'vitest'
import { NORD_PALETTE, PLAIN_THEME, createTagTheme, escapeTags } from '@core/render/theme'

describe('escapeTags', () => {
  it('replaces both braces with their escape tags', () => {
    expect(escapeTags('{red-fg}x{/}')).toBe('{open}red-fg{close}x{open}/{close}')
  })

  it('leaves plain text alone', () => {
    expect(escapeTags('sshd: root@pts/0')).toBe('sshd: root@pts/0')
  })
})

describe('createTagTheme', () => {
  it('wraps text in blessed tags from the palette', () => {
    const theme = createTagTheme()

    expect(theme.selected('row')).toBe('{bold}{#2e3440-fg}{#88c0d0-bg}row{/}')
    expect(theme.dim('x')).toBe('{#4c566a-fg}x{/}')
    expect(theme.stateUp('up')).toBe('{#a3be8c-fg}up{/}')
    expect(theme.escape('{')).toBe('{open}')
  })

  it('takes a custom palette', () => {
    const theme = createTagTheme({ ...NORD_PALETTE, accent: 'yellow' })

    expect(theme.title('t')).toBe('{bold}{yellow-fg}t{/}')
  })

  it('is immutable', () => {
    expect(Object.isFrozen(createTagTheme())).toBe(true)
    expect(Object.isFrozen(PLAIN_THEME)).toBe(true)
  })
})

describe('PLAIN_THEME', () => {
  it('passes text through unchanged', () => {
    expect(PLAIN_THEME.selected('{x}')).toBe('{x}')
    expect(PLAIN_THEME.escape('{x}')).toBe('{x}')
  })
})
