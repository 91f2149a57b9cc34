import type { Ticket } from './ticket.js'

// Malformed ticket text, caught before the engine is touched
export class TicketParseError extends Error {
  readonly kind = 'TICKET_PARSE'
  readonly context = 'parsing ticket'

  constructor(readonly text: string, readonly reason: string) {
    super(reason)
    this.name = 'TicketParseError'
  }
}

export class ShareError extends Error {
  readonly kind = 'SHARE'
  readonly context = 'sharing'

  constructor(readonly path: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause })
    this.name = 'ShareError'
  }
}

export class GetError extends Error {
  readonly kind = 'GET'
  readonly context = 'get'

  constructor(readonly ticket: Ticket, readonly target: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause })
    this.name = 'GetError'
  }
}

export type TransferError = TicketParseError | ShareError | GetError

export function describeError(err: TransferError): string {
  return `${err.context}: ${err.message}`
}
