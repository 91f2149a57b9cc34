import type { HttpRequest, HttpResponse } from './parser.js'

export type RouteParams = Record<string, string>
export type RouteHandler = (req: HttpRequest, params: RouteParams) => HttpResponse | Promise<HttpResponse>

export interface RouteMatch {
  handler: RouteHandler
  params: RouteParams
}

interface Route {
  method: string
  segments: string[]  // e.g. ['api', 'cancel', ':type']
  handler: RouteHandler
}

export class Router {
  private routes: Route[] = []

  add(method: string, pattern: string, handler: RouteHandler): void {
    this.routes.push({
      method: method.toUpperCase(),
      segments: pattern.split('/').filter(Boolean),
      handler
    })
  }

  // Throws URIError when a parameter segment is not valid percent-encoding
  match(method: string, path: string): RouteMatch | null {
    const pathSegments = path.split('/').filter(Boolean)
    const upperMethod = method.toUpperCase()

    for (const route of this.routes) {
      if (route.method !== upperMethod) continue

      const params = matchSegments(route.segments, pathSegments)
      if (params !== null) {
        return { handler: route.handler, params }
      }
    }

    return null
  }

  // Methods registered for a path; lets the server tell 404 from 405
  allowedMethods(path: string): string[] {
    const pathSegments = path.split('/').filter(Boolean)
    const methods = new Set<string>()
    for (const route of this.routes) {
      if (matchSegments(route.segments, pathSegments) !== null) methods.add(route.method)
    }
    return [...methods]
  }
}

function matchSegments(routeSegments: string[], pathSegments: string[]): RouteParams | null {
  if (pathSegments.length !== routeSegments.length) return null

  const params: RouteParams = {}

  for (let i = 0; i < routeSegments.length; i++) {
    const routeSeg = routeSegments[i]
    const pathSeg = pathSegments[i]
    if (routeSeg === undefined || pathSeg === undefined) return null

    if (routeSeg.startsWith(':')) {
      params[routeSeg.slice(1)] = decodeURIComponent(pathSeg)
    } else if (routeSeg !== pathSeg) {
      return null
    }
  }

  return params
}
