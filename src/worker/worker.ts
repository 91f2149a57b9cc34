import { EventEmitter, once } from 'node:events'
import type { StateStore } from '../state/store.js'
import type { TransferEngine, ImportProgress, DownloadProgress } from '../transfer/types.js'
import type { Ticket } from '../ticket.js'
import { parseTicket } from '../ticket.js'
import { ShareError, GetError, describeError } from '../errors.js'
import { Channel } from './channel.js'
import { ProgressAggregator, relayProgress } from './progress.js'
import type { WorkerConfig, WorkerMessage, WorkerRequest, ShareRequest, GetRequest } from './types.js'
import { DEFAULT_WORKER_CONFIG } from './types.js'

interface ActiveOperation {
  request: WorkerRequest
  controller: AbortController
}

/**
 * Runs transfer requests strictly one at a time, in the order they were
 * sent. Outcomes are never returned to the sender; they land in the
 * StateStore where the presentation side observes them.
 *
 * Emits 'idle' whenever the last outstanding request has been handled.
 */
export class TransferWorker extends EventEmitter {
  private inbox = new Channel<WorkerMessage>()
  private config: WorkerConfig
  private active: ActiveOperation | null = null
  private queued: WorkerRequest[] = []   // mirrors the inbox, oldest first
  private loop: Promise<void> | null = null
  private stopping = false
  private outstanding = 0

  constructor(
    private engine: TransferEngine,
    private store: StateStore,
    config: Partial<WorkerConfig> = {}
  ) {
    super()
    this.config = { ...DEFAULT_WORKER_CONFIG, ...config }
  }

  /** Queued requests plus the one in flight. */
  get pending(): number {
    return this.outstanding
  }

  get current(): WorkerRequest | null {
    return this.active?.request ?? null
  }

  /** The request in flight followed by the queued ones. */
  requests(): WorkerRequest[] {
    return this.active ? [this.active.request, ...this.queued] : [...this.queued]
  }

  start(): void {
    if (this.loop) return
    this.loop = this.run()
  }

  send(request: WorkerRequest): boolean {
    if (this.stopping || !this.inbox.trySend(request)) return false
    this.queued.push(request)
    this.outstanding++
    return true
  }

  /** Aborts the in-flight operation, optionally only if it is of the given type. */
  cancel(type?: WorkerRequest['type']): boolean {
    if (!this.active) return false
    if (type && this.active.request.type !== type) return false
    this.active.controller.abort()
    return true
  }

  /** Resolves once the inbox is empty and nothing is running. */
  async drain(): Promise<void> {
    if (this.pending === 0 || !this.loop) return
    await once(this, 'idle')
  }

  async shutdown(): Promise<void> {
    if (!this.stopping) {
      this.stopping = true
      this.active?.controller.abort()
      this.inbox.trySend({ type: 'SHUTDOWN' })
      this.inbox.close()
    }
    if (!this.loop) {
      this.queued = []
      this.outstanding = 0
      return
    }
    await this.loop
  }

  private async run(): Promise<void> {
    console.log('Transfer worker started')

    for await (const message of this.inbox) {
      if (message.type === 'SHUTDOWN') break
      this.queued.shift()

      if (this.stopping) {
        console.log(`Skipping queued ${message.type} request (shutting down)`)
      } else {
        await this.dispatch(message)
      }

      this.outstanding--
      if (this.outstanding === 0) this.emit('idle')
    }

    // Anyone still draining is released by the loop ending
    this.queued = []
    this.outstanding = 0
    this.emit('idle')
    console.log('Transfer worker stopped')
  }

  private async dispatch(request: WorkerRequest): Promise<void> {
    const controller = new AbortController()
    this.active = { request, controller }

    try {
      switch (request.type) {
        case 'SHARE':
          await this.handleShare(request, controller.signal)
          break
        case 'GET':
          await this.handleGet(request, controller.signal)
          break
      }
    } catch (err) {
      // Store and relay code only; engine failures are handled above
      console.error(`Unexpected worker error during ${request.type}:`, err)
    } finally {
      this.active = null
    }
  }

  private async handleShare(request: ShareRequest, signal: AbortSignal): Promise<void> {
    const { cycle } = request
    if (!this.store.startShare(cycle)) {
      console.log(`Skipping share of ${request.path} (file selection changed)`)
      return
    }
    console.log(`Sharing ${request.path}`)

    const progress = new Channel<ImportProgress>(this.config.progressCapacity)
    const relay = relayProgress(progress, new ProgressAggregator(), (p) => {
      this.store.reportShareProgress(cycle, p)
    })

    let ticket: Ticket | null = null
    let failure: unknown = null
    try {
      ticket = await this.engine.provide(request.path, progress, signal)
    } catch (err) {
      failure = err
    } finally {
      // No progress write may land after the outcome
      progress.close()
      await relay
    }

    if (ticket) {
      const current = this.store.finishShare(cycle, { ticket })
      if (current) {
        console.log(`Shared ${request.path}`)
      } else {
        console.log(`Discarding ticket for ${request.path} (file selection changed)`)
      }
    } else if (signal.aborted) {
      console.log(`Share of ${request.path} cancelled`)
      this.store.finishShare(cycle, { cancelled: true })
    } else {
      const error = new ShareError(request.path, failure)
      console.error(`Share failed: ${describeError(error)}`)
      this.store.finishShare(cycle, { error })
    }
  }

  private async handleGet(request: GetRequest, signal: AbortSignal): Promise<void> {
    const parsed = parseTicket(request.ticket)
    if (!parsed.ok) {
      console.error(`Invalid ticket: ${parsed.error.reason}`)
      this.store.pushError(parsed.error)
      return
    }

    const { ticket } = parsed
    console.log(`Getting ${ticket.path} into ${request.target}`)

    this.store.startDownload()
    const progress = new Channel<DownloadProgress>(this.config.progressCapacity)
    const relay = relayProgress(progress, new ProgressAggregator(), (p) => {
      this.store.reportDownloadProgress(p)
    })

    let saved: string | null = null
    let failure: unknown = null
    try {
      saved = await this.engine.fetch(ticket, request.target, progress, signal)
    } catch (err) {
      failure = err
    } finally {
      progress.close()
      await relay
    }

    if (saved !== null) {
      console.log(`Saved ${saved}`)
      this.store.finishDownload(null)
    } else if (signal.aborted) {
      console.log('Download cancelled')
      this.store.finishDownload(null)
    } else {
      const error = new GetError(ticket, request.target, failure)
      console.error(`Download failed: ${describeError(error)}`)
      this.store.finishDownload(error)
    }
  }
}
