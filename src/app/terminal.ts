import blessed from 'blessed'
import type { Widgets } from 'blessed'
import type { DashboardEvent } from '@core/navigation/state'
import type { DashboardView } from './dashboard-loop'
import { resolveKeyCommand } from './keymap'

/**
 * Full-screen blessed view: one tag-enabled box on the alternate buffer.
 */
export class BlessedTerminal implements DashboardView {
  private readonly screen: Widgets.Screen
  private readonly body: Widgets.BoxElement

  constructor(title: string) {
    this.screen = blessed.screen({
      smartCSR: true,
      fullUnicode: true,
      title
    })
    this.body = blessed.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: '100%',
      height: '100%',
      tags: true
    })
  }

  attach(push: (event: DashboardEvent) => void): void {
    this.screen.on('keypress', (ch: string | undefined, key: Widgets.Events.IKeyEventArg) => {
      const command = resolveKeyCommand(ch, key.full)
      if (command) push({ type: 'command', command })
    })
    this.screen.on('resize', () => {
      push(this.sizeEvent())
    })
    push(this.sizeEvent())
  }

  draw(frame: string): void {
    this.body.setContent(frame)
    this.screen.render()
  }

  destroy(): void {
    this.screen.destroy()
  }

  private sizeEvent(): DashboardEvent {
    return { type: 'resize', width: this.screen.program.cols, height: this.screen.program.rows }
  }
}
