import type { Command } from '@core/navigation/state'

const QUIT: Command = { kind: 'quit' }
const TAB_FORWARD: Command = { kind: 'tab-forward' }
const TAB_BACKWARD: Command = { kind: 'tab-backward' }
const MOVE_DOWN: Command = { kind: 'move-down' }
const MOVE_UP: Command = { kind: 'move-up' }
const JUMP_START: Command = { kind: 'jump-start' }
const JUMP_END: Command = { kind: 'jump-end' }

// keys are blessed `key.full` names, with the typed character as fallback
const KEY_COMMANDS = new Map<string, Command>([
  ['q', QUIT],
  ['C-c', QUIT],
  ['tab', TAB_FORWARD],
  ['l', TAB_FORWARD],
  ['right', TAB_FORWARD],
  ['S-tab', TAB_BACKWARD],
  ['h', TAB_BACKWARD],
  ['left', TAB_BACKWARD],
  ['j', MOVE_DOWN],
  ['down', MOVE_DOWN],
  ['k', MOVE_UP],
  ['up', MOVE_UP],
  ['g', JUMP_START],
  ['home', JUMP_START],
  ['G', JUMP_END],
  ['S-g', JUMP_END],
  ['end', JUMP_END],
  ['1', { kind: 'select-tab', tab: 'connections' }],
  ['2', { kind: 'select-tab', tab: 'ports' }],
  ['3', { kind: 'select-tab', tab: 'interfaces' }],
  ['r', { kind: 'refresh' }]
])

export function resolveKeyCommand(
  ch: string | undefined,
  full: string | undefined
): Command | null {
  if (full !== undefined) {
    const byName = KEY_COMMANDS.get(full)
    if (byName) return byName
  }
  if (ch !== undefined) {
    return KEY_COMMANDS.get(ch) ?? null
  }
  return null
}
