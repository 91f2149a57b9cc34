// In-process stand-in for the hyperdrive engine. Each provide/fetch follows
// a script: emit some events, optionally wait on a gate, then resolve or throw.

import path from 'node:path'
import type { Ticket } from '../src/ticket.js'
import type { TransferEngine, ImportProgress, DownloadProgress, ProgressSender } from '../src/transfer/types.js'

export interface Deferred {
  promise: Promise<void>
  resolve: () => void
}

export function deferred(): Deferred {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => { resolve = r })
  return { promise, resolve }
}

export interface Script<E> {
  events?: E[]
  gate?: Promise<void>
  lateEvents?: E[]   // sent after the gate opens
  error?: Error
}

export interface ProvideScript extends Script<ImportProgress> {
  ticket?: Ticket
}

export type FetchScript = Script<DownloadProgress>

export function makeTicket(name: string, overrides: Partial<Ticket> = {}): Ticket {
  return {
    driveKey: 'a'.repeat(64),
    hash: 'b'.repeat(64),
    size: 1024,
    path: `/0123456789abcdef/${name}`,
    ...overrides
  }
}

function waitOrAbort(gate: Promise<void>, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'))
      return
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true })
    gate.then(resolve, reject)
  })
}

export class FakeEngine implements TransferEngine {
  log: string[] = []
  provideCalls: string[] = []
  fetchCalls: Array<{ ticket: Ticket; target: string }> = []
  provideScripts: Map<string, ProvideScript> = new Map()   // keyed by file path
  fetchScripts: Map<string, FetchScript> = new Map()       // keyed by ticket path
  destroyed = false

  async provide(filePath: string, progress: ProgressSender<ImportProgress>, signal: AbortSignal): Promise<Ticket> {
    this.provideCalls.push(filePath)
    this.log.push(`provide:start:${filePath}`)
    const script = this.provideScripts.get(filePath) ?? {}

    try {
      await this.play(script, progress, signal)
    } finally {
      this.log.push(`provide:end:${filePath}`)
    }
    return script.ticket ?? makeTicket(path.basename(filePath))
  }

  async fetch(ticket: Ticket, target: string, progress: ProgressSender<DownloadProgress>, signal: AbortSignal): Promise<string> {
    this.fetchCalls.push({ ticket, target })
    this.log.push(`fetch:start:${ticket.path}`)
    const script = this.fetchScripts.get(ticket.path) ?? {}

    try {
      await this.play(script, progress, signal)
    } finally {
      this.log.push(`fetch:end:${ticket.path}`)
    }
    return path.join(target, path.posix.basename(ticket.path))
  }

  async destroy(): Promise<void> {
    this.destroyed = true
  }

  private async play<E>(script: Script<E>, progress: ProgressSender<E>, signal: AbortSignal): Promise<void> {
    for (const event of script.events ?? []) await progress.send(event)
    if (script.gate) await waitOrAbort(script.gate, signal)
    for (const event of script.lateEvents ?? []) await progress.send(event)
    if (script.error) throw script.error
  }
}
