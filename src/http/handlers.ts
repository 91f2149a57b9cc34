import type { HttpRequest, HttpResponse } from './parser.js'
import { jsonResponse, errorResponse, parseJsonBody } from './parser.js'
import type { RouteParams } from './router.js'
import type { Session, SessionView } from '../session.js'
import type { TransferError } from '../errors.js'
import { describeError } from '../errors.js'
import { renderTicket } from '../ticket.js'

export interface HttpContext {
  session: Session
}

// --- State ---

export function handleState(_req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  return jsonResponse(serializeView(ctx.session.view()))
}

// --- Selection ---

export function handleSelect(req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  const payload = parseJsonBody(req.body)
  if (!payload) return errorResponse(400, 'Invalid JSON body')
  if (typeof payload.path !== 'string' || payload.path.length === 0) {
    return errorResponse(400, 'Missing required field: path')
  }

  ctx.session.selectFile(payload.path)
  return jsonResponse(serializeView(ctx.session.view()))
}

export function handlePasteTicket(req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  const payload = parseJsonBody(req.body)
  if (!payload) return errorResponse(400, 'Invalid JSON body')
  if (typeof payload.text !== 'string') return errorResponse(400, 'Missing required field: text')

  ctx.session.pasteTicket(payload.text)
  return jsonResponse(serializeView(ctx.session.view()))
}

export function handleChooseTarget(req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  const payload = parseJsonBody(req.body)
  if (!payload) return errorResponse(400, 'Invalid JSON body')
  if (typeof payload.dir !== 'string' || payload.dir.length === 0) {
    return errorResponse(400, 'Missing required field: dir')
  }

  ctx.session.chooseTarget(payload.dir)
  return jsonResponse(serializeView(ctx.session.view()))
}

// --- Operations ---

export function handleShare(_req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  const result = ctx.session.share()
  if (!result.ok) return errorResponse(409, result.reason)
  return jsonResponse({ queued: true }, 202)
}

export function handleDownload(_req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  const result = ctx.session.download()
  if (!result.ok) return errorResponse(409, result.reason)
  return jsonResponse({ queued: true }, 202)
}

export function handleCancel(_req: HttpRequest, params: RouteParams, ctx: HttpContext): HttpResponse {
  const type = params['type']
  if (type === undefined) {
    return jsonResponse({ cancelled: ctx.session.cancel() })
  }
  if (type !== 'share' && type !== 'get') {
    return errorResponse(400, `Unknown operation type: ${type}`)
  }
  return jsonResponse({ cancelled: ctx.session.cancel(type === 'share' ? 'SHARE' : 'GET') })
}

// --- Errors ---

export function handleAcknowledgeError(_req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  const acknowledged = ctx.session.acknowledgeError()
  return jsonResponse({
    acknowledged: acknowledged ? summarizeError(acknowledged) : null,
    remaining: ctx.session.view().state.errors.length
  })
}

// --- Helpers ---

function summarizeError(err: TransferError): Record<string, unknown> {
  return {
    kind: err.kind,
    context: err.context,
    message: describeError(err)
  }
}

export function serializeView(view: SessionView): Record<string, unknown> {
  const { state } = view
  const top = state.errors.at(-1)
  return {
    selectedFile: view.selectedFile,
    ticketText: view.ticketText,
    downloadTarget: view.downloadTarget,
    sharingProgress: state.sharingProgress,
    ticket: state.ticket ? renderTicket(state.ticket) : null,
    downloadProgress: state.downloadProgress,
    error: top ? summarizeError(top) : null,
    errorCount: state.errors.length,
    pending: view.pending
  }
}
