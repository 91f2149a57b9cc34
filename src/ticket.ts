import b4a from 'b4a'
import { TicketParseError } from './errors.js'

/**
 * Everything a receiver needs to find and verify one shared file:
 * the provider's drive key (swarm endpoint), the content hash, its
 * size and its path inside the drive.
 */
export interface Ticket {
  driveKey: string   // 64 hex chars
  hash: string       // SHA-256, 64 hex chars
  size: number       // bytes
  path: string       // "/<id>/<name>" within the drive
}

export type TicketParseResult =
  | { ok: true; ticket: Ticket }
  | { ok: false; error: TicketParseError }

export const TICKET_PREFIX = 'ferry'
export const TICKET_VERSION = 1

// version (1) | drive key (32) | hash (32) | size u64 BE (8) | path (utf8)
const KEY_OFFSET = 1
const HASH_OFFSET = KEY_OFFSET + 32
const SIZE_OFFSET = HASH_OFFSET + 32
const PATH_OFFSET = SIZE_OFFSET + 8
const MAX_PATH_BYTES = 1024

const BASE64URL = /^[A-Za-z0-9_-]+$/
const HEX_32 = /^[a-f0-9]{64}$/

/** Throws a TypeError for a ticket that would not parse back to itself. */
export function renderTicket(ticket: Ticket): string {
  const problem = validateTicket(ticket)
  if (problem) throw new TypeError(`Cannot render ticket: ${problem}`)

  const pathBytes = b4a.from(ticket.path, 'utf8')
  const buf = b4a.alloc(PATH_OFFSET + pathBytes.length)

  buf[0] = TICKET_VERSION
  b4a.from(ticket.driveKey, 'hex').copy(buf, KEY_OFFSET)
  b4a.from(ticket.hash, 'hex').copy(buf, HASH_OFFSET)
  buf.writeBigUInt64BE(BigInt(ticket.size), SIZE_OFFSET)
  pathBytes.copy(buf, PATH_OFFSET)

  return TICKET_PREFIX + b4a.toString(buf, 'base64url')
}

export function parseTicket(text: string): TicketParseResult {
  const fail = (reason: string): TicketParseResult => ({ ok: false, error: new TicketParseError(text, reason) })

  const trimmed = text.trim()
  if (!trimmed.startsWith(TICKET_PREFIX)) return fail(`missing ${TICKET_PREFIX} prefix`)

  const body = trimmed.slice(TICKET_PREFIX.length)
  if (body.length === 0) return fail('ticket body is empty')
  if (!BASE64URL.test(body)) return fail('ticket body is not base64url')

  const buf = b4a.from(body, 'base64url')
  // Buffer decoding is lenient; anything that doesn't re-encode to itself was garbage
  if (b4a.toString(buf, 'base64url') !== body) return fail('ticket body is not base64url')

  const version = buf[0]
  if (version !== TICKET_VERSION) return fail(`unsupported ticket version ${version}`)
  if (buf.length <= PATH_OFFSET) return fail('ticket is truncated')

  const size = buf.readBigUInt64BE(SIZE_OFFSET)
  if (size > BigInt(Number.MAX_SAFE_INTEGER)) return fail('ticket size exceeds safe integer range')

  const pathBytes = buf.subarray(PATH_OFFSET)
  if (pathBytes.length > MAX_PATH_BYTES) return fail('ticket path is too long')

  let drivePath: string
  try {
    drivePath = new TextDecoder('utf-8', { fatal: true }).decode(pathBytes)
  } catch {
    return fail('ticket path is not valid UTF-8')
  }
  if (!drivePath.startsWith('/')) return fail('ticket path must be absolute')

  return {
    ok: true,
    ticket: {
      driveKey: b4a.toString(buf.subarray(KEY_OFFSET, HASH_OFFSET), 'hex'),
      hash: b4a.toString(buf.subarray(HASH_OFFSET, SIZE_OFFSET), 'hex'),
      size: Number(size),
      path: drivePath
    }
  }
}

export function validateTicket(ticket: Ticket): string | null {
  if (!HEX_32.test(ticket.driveKey)) return 'Drive key must be 64 lowercase hexadecimal characters'
  if (!HEX_32.test(ticket.hash)) return 'Hash must be 64 lowercase hexadecimal characters'
  if (!Number.isSafeInteger(ticket.size) || ticket.size < 0) return 'Size must be a non-negative safe integer'
  if (!ticket.path.startsWith('/')) return 'Path must be absolute'
  if (Buffer.byteLength(ticket.path, 'utf8') > MAX_PATH_BYTES) return 'Path is too long'
  return null
}
