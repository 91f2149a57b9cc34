import fs from 'node:fs'
import path from 'node:path'
import crypto from 'hypercore-crypto'
import b4a from 'b4a'

export function generateId(): string {
  return b4a.toString(crypto.randomBytes(16), 'hex')
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}

// Picks a name that doesn't collide with an existing file (or its .part twin) in dir
export function uniqueFileName(dir: string, name: string): string {
  const taken = (candidate: string) =>
    fs.existsSync(path.join(dir, candidate)) || fs.existsSync(path.join(dir, `${candidate}.part`))

  if (!taken(name)) return name

  const dotIdx = name.lastIndexOf('.')
  const base = dotIdx > 0 ? name.slice(0, dotIdx) : name
  const ext = dotIdx > 0 ? name.slice(dotIdx) : ''

  let counter = 1
  let candidate = `${base}-${counter}${ext}`
  while (taken(candidate)) {
    counter++
    candidate = `${base}-${counter}${ext}`
  }
  return candidate
}
