import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

export interface Config {
  storageDir?: string              // corestore location
  downloadDir?: string             // default target for `get`
  httpPort?: number
  progressCapacity?: number        // bound on each operation's progress channel
  fetchTimeoutMs?: number          // how long to wait for a remote entry to appear
  cancelSupersededShare?: boolean  // abort a running share when a new file is selected
}

export interface ResolvedConfig {
  storageDir: string
  downloadDir: string
  httpPort: number
  progressCapacity: number
  fetchTimeoutMs: number
  cancelSupersededShare: boolean
}

export interface ConfigValidationError {
  field: string
  message: string
}

export const DEFAULT_HTTP_PORT = 8421
export const DEFAULT_PROGRESS_CAPACITY = 32
export const DEFAULT_FETCH_TIMEOUT_MS = 60_000

export function getConfigDir(): string {
  return process.env.FERRY_HOME ?? path.join(os.homedir(), '.ferry')
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json')
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 65535
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0
}

export function validateConfig(config: unknown): ConfigValidationError[] {
  const errors: ConfigValidationError[] = []

  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    errors.push({ field: 'config', message: 'Config must be an object' })
    return errors
  }

  const c = config as Record<string, unknown>

  for (const field of ['storageDir', 'downloadDir'] as const) {
    if (c[field] !== undefined && !isNonEmptyString(c[field])) {
      errors.push({ field, message: `${field} must be a non-empty string` })
    }
  }

  if (c.httpPort !== undefined && !isPort(c.httpPort)) {
    errors.push({ field: 'httpPort', message: 'HTTP port must be an integer between 1 and 65535' })
  }

  if (c.progressCapacity !== undefined && !isPositiveInteger(c.progressCapacity)) {
    errors.push({ field: 'progressCapacity', message: 'progressCapacity must be a positive integer' })
  }

  if (c.fetchTimeoutMs !== undefined && !isPositiveInteger(c.fetchTimeoutMs)) {
    errors.push({ field: 'fetchTimeoutMs', message: 'fetchTimeoutMs must be a positive integer' })
  }

  if (c.cancelSupersededShare !== undefined && typeof c.cancelSupersededShare !== 'boolean') {
    errors.push({ field: 'cancelSupersededShare', message: 'cancelSupersededShare must be a boolean' })
  }

  return errors
}

// Keeps only the individually-valid fields of a parsed config file
function pickValid(parsed: Record<string, unknown>): Config {
  const config: Config = {}
  if (isNonEmptyString(parsed.storageDir)) config.storageDir = parsed.storageDir
  if (isNonEmptyString(parsed.downloadDir)) config.downloadDir = parsed.downloadDir
  if (isPort(parsed.httpPort)) config.httpPort = parsed.httpPort
  if (isPositiveInteger(parsed.progressCapacity)) config.progressCapacity = parsed.progressCapacity
  if (isPositiveInteger(parsed.fetchTimeoutMs)) config.fetchTimeoutMs = parsed.fetchTimeoutMs
  if (typeof parsed.cancelSupersededShare === 'boolean') config.cancelSupersededShare = parsed.cancelSupersededShare
  return config
}

export function loadConfig(configFile: string = getConfigPath()): Config {
  try {
    if (fs.existsSync(configFile)) {
      const content = fs.readFileSync(configFile, 'utf8')
      const parsed: unknown = JSON.parse(content)

      const errors = validateConfig(parsed)
      if (errors.length > 0) {
        console.error(`Config validation errors in ${configFile}:`)
        for (const err of errors) {
          console.error(`  - ${err.field}: ${err.message}`)
        }
        console.error('Using default values for invalid fields.')
      }

      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {}
      return pickValid(parsed as Record<string, unknown>)
    }
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(`Invalid JSON in config file ${configFile}:`, err.message)
    } else {
      console.error('Failed to load config:', err)
    }
  }
  return {}
}

export function saveConfig(config: Config, configFile: string = getConfigPath()): boolean {
  const errors = validateConfig(config)
  if (errors.length > 0) {
    console.error('Cannot save invalid config:')
    for (const err of errors) {
      console.error(`  - ${err.field}: ${err.message}`)
    }
    return false
  }

  try {
    fs.mkdirSync(path.dirname(configFile), { recursive: true })
    fs.writeFileSync(configFile, JSON.stringify(config, null, 2))
    return true
  } catch (err) {
    console.error('Failed to save config:', err)
    return false
  }
}

const CONFIG_FIELDS = {
  storageDir: 'string',
  downloadDir: 'string',
  httpPort: 'number',
  progressCapacity: 'number',
  fetchTimeoutMs: 'number',
  cancelSupersededShare: 'boolean'
} as const

export type ConfigField = keyof typeof CONFIG_FIELDS

export function isConfigField(name: string): name is ConfigField {
  return Object.hasOwn(CONFIG_FIELDS, name)
}

export type ConfigUpdateResult =
  | { ok: true; config: Config }
  | { ok: false; error: string }

// Sets one field from its command-line text form
export function applyConfigValue(config: Config, field: string, raw: string): ConfigUpdateResult {
  if (!isConfigField(field)) {
    return { ok: false, error: `Unknown config field: ${field}. Known fields: ${Object.keys(CONFIG_FIELDS).join(', ')}` }
  }

  let value: unknown = raw
  switch (CONFIG_FIELDS[field]) {
    case 'number':
      value = raw.trim() === '' ? NaN : Number(raw)
      break
    case 'boolean':
      if (raw !== 'true' && raw !== 'false') return { ok: false, error: `${field} must be true or false` }
      value = raw === 'true'
      break
  }

  const candidate: Record<string, unknown> = { ...config, [field]: value }
  const errors = validateConfig(candidate)
  if (errors.length > 0) return { ok: false, error: errors.map((e) => e.message).join('; ') }
  return { ok: true, config: pickValid(candidate) }
}

export function resolveConfig(config: Config): ResolvedConfig {
  return {
    storageDir: config.storageDir ?? path.join(getConfigDir(), 'drives'),
    downloadDir: config.downloadDir ?? process.cwd(),
    httpPort: config.httpPort ?? DEFAULT_HTTP_PORT,
    progressCapacity: config.progressCapacity ?? DEFAULT_PROGRESS_CAPACITY,
    fetchTimeoutMs: config.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
    cancelSupersededShare: config.cancelSupersededShare ?? false
  }
}
