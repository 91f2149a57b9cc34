import { EventEmitter } from 'node:events'
import type { Ticket } from '../ticket.js'
import type { TransferError, ShareError, GetError } from '../errors.js'
import type { Progress, SharedState } from './types.js'
import { INITIAL_STATE } from './types.js'

/**
 * Sole owner of the shared transfer state. Every mutation replaces the
 * published snapshot with a new frozen one and emits 'change', so readers
 * only ever hold a complete, consistent state.
 */
export class StateStore extends EventEmitter {
  private current: SharedState = INITIAL_STATE

  snapshot(): SharedState {
    return this.current
  }

  currentError(): TransferError | null {
    return this.current.errors.at(-1) ?? null
  }

  // --- Share cycle ---

  /** New file selected: forget the previous share's progress and ticket. */
  resetShare(): number {
    const shareCycle = this.current.shareCycle + 1
    this.publish({ sharingProgress: null, ticket: null, shareCycle })
    return shareCycle
  }

  /** Marks the cycle's share as running. Refused once the selection has moved on. */
  startShare(cycle: number): boolean {
    if (cycle !== this.current.shareCycle) return false
    this.publish({ sharingProgress: 'indeterminate', ticket: null })
    return true
  }

  reportShareProgress(cycle: number, progress: Progress): boolean {
    if (cycle !== this.current.shareCycle) return false
    this.publish({ sharingProgress: progress })
    return true
  }

  /**
   * Records a share's terminal outcome. A ticket is only kept when the
   * cycle is still current; a failure is appended either way.
   * Returns false when the outcome belonged to a stale cycle.
   */
  finishShare(cycle: number, outcome: { ticket: Ticket } | { error: ShareError } | { cancelled: true }): boolean {
    const errors = 'error' in outcome ? this.appended(outcome.error) : this.current.errors

    if (cycle !== this.current.shareCycle) {
      this.publish({ errors })
      return false
    }

    this.publish({
      sharingProgress: null,
      ticket: 'ticket' in outcome ? outcome.ticket : null,
      errors
    })
    return true
  }

  // --- Download ---

  startDownload(): void {
    this.publish({ downloadProgress: 0 })
  }

  reportDownloadProgress(progress: Progress): boolean {
    if (this.current.downloadProgress === null) return false
    this.publish({ downloadProgress: progress })
    return true
  }

  finishDownload(error: GetError | null): void {
    this.publish({
      downloadProgress: null,
      errors: error ? this.appended(error) : this.current.errors
    })
  }

  // --- Errors ---

  pushError(error: TransferError): void {
    this.publish({ errors: this.appended(error) })
  }

  /** Removes and returns the most recent error. */
  acknowledgeError(): TransferError | null {
    const top = this.currentError()
    if (!top) return null
    this.publish({ errors: Object.freeze(this.current.errors.slice(0, -1)) })
    return top
  }

  private appended(error: TransferError): readonly TransferError[] {
    return Object.freeze([...this.current.errors, error])
  }

  private publish(changes: Partial<SharedState>): void {
    this.current = Object.freeze({ ...this.current, ...changes })
    this.emit('change', this.current)
  }
}
