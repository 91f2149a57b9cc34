export interface HttpRequest {
  method: string
  path: string
  body: string
}

export interface HttpResponse {
  status: number
  headers: Record<string, string>
  body: string
}

// No endpoint takes query parameters; they are dropped
export function urlPath(rawUrl: string): string {
  const qIdx = rawUrl.indexOf('?')
  return qIdx >= 0 ? rawUrl.slice(0, qIdx) : rawUrl
}

// Empty body counts as {}; anything that isn't a JSON object is rejected
export function parseJsonBody(body: string): Record<string, unknown> | null {
  if (body.trim() === '') return {}
  try {
    const parsed: unknown = JSON.parse(body)
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null
    return parsed as Record<string, unknown>
  } catch {
    return null
  }
}

export function jsonResponse(data: unknown, status = 200): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(data)
  }
}

export function errorResponse(status: number, message: string): HttpResponse {
  return jsonResponse({ error: message }, status)
}
