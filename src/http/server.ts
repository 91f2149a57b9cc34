import http from 'node:http'
import type { AddressInfo } from 'node:net'
import { urlPath, errorResponse } from './parser.js'
import type { HttpRequest, HttpResponse } from './parser.js'
import { Router } from './router.js'
import type { RouteHandler, RouteMatch } from './router.js'
import type { HttpContext } from './handlers.js'
import {
  handleState,
  handleSelect,
  handlePasteTicket,
  handleChooseTarget,
  handleShare,
  handleDownload,
  handleCancel,
  handleAcknowledgeError
} from './handlers.js'

export interface HttpServerConfig {
  port: number
  host?: string
  context: HttpContext
}

const MAX_BODY_BYTES = 64 * 1024

export class HttpServer {
  private server: http.Server | null = null
  private config: HttpServerConfig
  private router: Router

  constructor(config: HttpServerConfig) {
    this.config = config
    this.router = new Router()
    this.setupRoutes()
  }

  private setupRoutes(): void {
    const ctx = this.config.context

    // Wrap handlers to inject context
    const wrap = (handler: (req: HttpRequest, params: Record<string, string>, ctx: HttpContext) => HttpResponse): RouteHandler => {
      return (req, params) => handler(req, params, ctx)
    }

    this.router.add('GET', '/api/state', wrap(handleState))
    this.router.add('POST', '/api/select', wrap(handleSelect))
    this.router.add('POST', '/api/ticket', wrap(handlePasteTicket))
    this.router.add('POST', '/api/target', wrap(handleChooseTarget))
    this.router.add('POST', '/api/share', wrap(handleShare))
    this.router.add('POST', '/api/download', wrap(handleDownload))
    this.router.add('POST', '/api/cancel', wrap(handleCancel))
    this.router.add('POST', '/api/cancel/:type', wrap(handleCancel))
    this.router.add('POST', '/api/errors/ack', wrap(handleAcknowledgeError))
  }

  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((err) => {
          console.error('HTTP request failed:', err)
          if (!res.headersSent) res.writeHead(500)
          res.end()
        })
      })
      this.server = server

      server.once('error', reject)

      server.listen(this.config.port, this.config.host ?? '127.0.0.1', () => {
        const addr: AddressInfo | string | null = server.address()
        const port = (addr && typeof addr === 'object') ? addr.port : this.config.port
        console.log(`HTTP API listening on port ${port}`)
        resolve(port)
      })
    })
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          this.server = null
          resolve()
        })
      } else {
        resolve()
      }
    })
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const chunks: Buffer[] = []
    let received = 0
    for await (const chunk of req) {
      const data: Buffer = chunk
      received += data.length
      if (received > MAX_BODY_BYTES) {
        this.send(res, errorResponse(413, 'Request body too large'))
        return
      }
      chunks.push(data)
    }

    const request: HttpRequest = {
      method: (req.method ?? 'GET').toUpperCase(),
      path: urlPath(req.url ?? '/'),
      body: Buffer.concat(chunks).toString('utf8')
    }

    this.send(res, await this.route(request))
  }

  private async route(req: HttpRequest): Promise<HttpResponse> {
    let match: RouteMatch | null
    let allowed: string[] = []
    try {
      match = this.router.match(req.method, req.path)
      if (!match) allowed = this.router.allowedMethods(req.path)
    } catch (err) {
      // Route params are percent-decoded
      if (err instanceof URIError) return errorResponse(400, 'Malformed request path')
      throw err
    }
    if (!match) {
      if (allowed.length > 0) {
        const response = errorResponse(405, 'Method not allowed')
        response.headers['allow'] = allowed.join(', ')
        return response
      }
      return errorResponse(404, 'Not found')
    }

    try {
      return await match.handler(req, match.params)
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err)
      console.error(`HTTP handler error: ${msg}`)
      return errorResponse(500, 'Internal server error')
    }
  }

  private send(res: http.ServerResponse, response: HttpResponse): void {
    res.writeHead(response.status, {
      ...response.headers,
      'content-length': String(Buffer.byteLength(response.body, 'utf8'))
    })
    res.end(response.body)
  }
}
