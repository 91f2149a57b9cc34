import path from 'node:path'
import type { StateStore } from './state/store.js'
import type { SharedState } from './state/types.js'
import type { TransferWorker } from './worker/worker.js'
import type { WorkerRequest } from './worker/types.js'
import type { TransferError } from './errors.js'

export interface SessionOptions {
  cancelSupersededShare: boolean
}

export interface SessionView {
  selectedFile: string | null
  ticketText: string
  downloadTarget: string | null
  state: SharedState
  pending: number
}

export type ActionResult = { ok: true } | { ok: false; reason: string }

/**
 * The user-facing side of a transfer session: what is selected, pasted
 * and chosen, and the actions a presentation loop can trigger. Resets
 * mutate the store directly; transfers go to the worker as requests.
 */
export class Session {
  private selectedFile: string | null = null
  private ticketText = ''
  private downloadTarget: string | null = null

  constructor(
    private store: StateStore,
    private worker: TransferWorker,
    private options: SessionOptions = { cancelSupersededShare: false }
  ) {}

  selectFile(filePath: string): void {
    this.selectedFile = path.resolve(filePath)
    this.store.resetShare()
    if (this.options.cancelSupersededShare && this.worker.cancel('SHARE')) {
      console.log('Cancelled share of previously selected file')
    }
  }

  pasteTicket(text: string): void {
    this.ticketText = text
  }

  chooseTarget(dir: string): void {
    this.downloadTarget = path.resolve(dir)
  }

  share(): ActionResult {
    if (!this.selectedFile) return { ok: false, reason: 'No file selected' }

    const { ticket, shareCycle } = this.store.snapshot()
    if (ticket) return { ok: false, reason: 'File is already shared' }
    // A queued share of an older selection will be skipped; only this cycle's counts
    const running = this.worker.requests().some((r) => r.type === 'SHARE' && r.cycle === shareCycle)
    if (running) return { ok: false, reason: 'Share already in progress' }

    if (!this.worker.send({ type: 'SHARE', path: this.selectedFile, cycle: shareCycle })) {
      return { ok: false, reason: 'Worker is shutting down' }
    }
    return { ok: true }
  }

  download(): ActionResult {
    if (!this.downloadTarget) return { ok: false, reason: 'No download target chosen' }
    if (this.ticketText.trim().length === 0) return { ok: false, reason: 'No ticket pasted' }
    if (this.worker.requests().some((r) => r.type === 'GET')) {
      return { ok: false, reason: 'Download already in progress' }
    }

    if (!this.worker.send({ type: 'GET', ticket: this.ticketText, target: this.downloadTarget })) {
      return { ok: false, reason: 'Worker is shutting down' }
    }
    return { ok: true }
  }

  acknowledgeError(): TransferError | null {
    return this.store.acknowledgeError()
  }

  cancel(type?: WorkerRequest['type']): boolean {
    return this.worker.cancel(type)
  }

  view(): SessionView {
    return {
      selectedFile: this.selectedFile,
      ticketText: this.ticketText,
      downloadTarget: this.downloadTarget,
      state: this.store.snapshot(),
      pending: this.worker.pending
    }
  }
}
