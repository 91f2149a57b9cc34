import type { Ticket } from '../ticket.js'

export interface DeclaredSize {
  type: 'DECLARED_SIZE'
  id: number      // sub-item within the operation
  size: number    // bytes
}

export interface Processed {
  type: 'PROCESSED'
  id: number
  bytes: number   // increment, not a running offset
}

export interface AllDone {
  type: 'DONE'
}

export type ImportProgress = DeclaredSize | Processed
export type DownloadProgress = DeclaredSize | Processed | AllDone
export type ProgressEvent = ImportProgress | DownloadProgress

// Sending half of a progress channel. Resolves false once the receiver is gone.
export interface ProgressSender<T> {
  send(event: T): Promise<boolean>
}

export interface TransferEngine {
  provide(path: string, progress: ProgressSender<ImportProgress>, signal: AbortSignal): Promise<Ticket>
  /** Resolves with the path the content was saved to. */
  fetch(ticket: Ticket, target: string, progress: ProgressSender<DownloadProgress>, signal: AbortSignal): Promise<string>
  destroy(): Promise<void>
}
