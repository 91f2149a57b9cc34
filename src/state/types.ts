import type { Ticket } from '../ticket.js'
import type { TransferError } from '../errors.js'

// A ratio in [0, 1], or 'indeterminate' while nothing has declared a size yet
export type Progress = number | 'indeterminate'

export interface SharedState {
  readonly sharingProgress: Progress | null
  readonly ticket: Ticket | null
  readonly downloadProgress: Progress | null
  readonly errors: readonly TransferError[]
  readonly shareCycle: number
}

export const INITIAL_STATE: SharedState = Object.freeze({
  sharingProgress: null,
  ticket: null,
  downloadProgress: null,
  errors: Object.freeze([]),
  shareCycle: 0
})
