import type { StateStore } from '../state/store.js'
import type { Progress, SharedState } from '../state/types.js'

export interface TerminalOutput {
  isTTY?: boolean
  write(chunk: string): boolean
}

export interface TerminalViewConfig {
  label: string
  select: (state: SharedState) => Progress | null
  frameIntervalMs?: number
  output?: TerminalOutput
}

const BAR_WIDTH = 24

export function formatProgress(progress: Progress | null, width = BAR_WIDTH): string {
  if (progress === null) return ''
  if (progress === 'indeterminate') return `[${'.'.repeat(width)}]   ?%`

  const ratio = Math.min(1, Math.max(0, progress))
  const filled = Math.round(ratio * width)
  const percent = String(Math.floor(ratio * 100)).padStart(3)
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${percent}%`
}

/**
 * Redraws one progress line from store snapshots, on a frame timer and
 * whenever the store signals a change. Never mutates the store.
 */
export class TerminalView {
  private timer: ReturnType<typeof setInterval> | null = null
  private lastLine = ''
  private output: TerminalOutput
  private onChange = () => this.render()

  constructor(private store: StateStore, private config: TerminalViewConfig) {
    this.output = config.output ?? process.stdout
  }

  start(): void {
    if (this.timer) return
    this.store.on('change', this.onChange)
    this.timer = setInterval(() => this.render(), this.config.frameIntervalMs ?? 100)
    this.render()
  }

  stop(): void {
    if (!this.timer) return
    clearInterval(this.timer)
    this.timer = null
    this.store.off('change', this.onChange)
    if (this.lastLine && this.output.isTTY) this.output.write('\n')
    this.lastLine = ''
  }

  private render(): void {
    const progress = this.config.select(this.store.snapshot())
    if (progress === null) return

    const line = `${this.config.label} ${formatProgress(progress)}`
    if (line === this.lastLine) return
    this.lastLine = line

    if (this.output.isTTY) {
      this.output.write(`\r${line}`)
    } else {
      this.output.write(`${line}\n`)
    }
  }
}
