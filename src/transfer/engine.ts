import fs from 'node:fs'
import path from 'node:path'
import { createHash } from 'node:crypto'
import { once } from 'node:events'
import { finished } from 'node:stream/promises'
import { setTimeout as sleep } from 'node:timers/promises'
import Hyperswarm, { type JoinOptions } from 'hyperswarm'
import Corestore from 'corestore'
import Hyperdrive, { type DriveWriteStream, type HyperdriveEntry } from 'hyperdrive'
import b4a from 'b4a'
import type { Ticket } from '../ticket.js'
import { generateId, uniqueFileName, formatSize } from '../utils.js'
import type { TransferEngine, ImportProgress, DownloadProgress, ProgressSender } from './types.js'

/** The part of Hyperswarm the engine drives. */
export interface Swarm {
  join(topic: Buffer, options?: JoinOptions): unknown
  leave(topic: Buffer): Promise<void>
  flush(): Promise<void>
  destroy(): Promise<void>
  on(event: 'connection', handler: (conn: unknown) => void): unknown
  on(event: 'error', handler: (err: Error) => void): unknown
}

export interface HyperdriveEngineConfig {
  storageDir: string
  fetchTimeoutMs: number
  // Both default to ones built on start(); the engine closes them on destroy()
  store?: Corestore
  swarm?: Swarm
}

const ENTRY_POLL_INTERVAL_MS = 500

/**
 * Content-addressed provide/fetch over hyperdrive. Shared files go into a
 * single outbound drive announced on the swarm; fetches open the remote
 * drive named by the ticket and stream the entry to disk.
 */
export class HyperdriveEngine implements TransferEngine {
  private store: Corestore | null = null
  private swarm: Swarm | null = null
  private outbound: Hyperdrive | null = null
  private drives: Map<string, Hyperdrive> = new Map()   // remote driveKey hex -> drive

  constructor(private config: HyperdriveEngineConfig) {}

  async start(): Promise<void> {
    if (!fs.existsSync(this.config.storageDir)) {
      fs.mkdirSync(this.config.storageDir, { recursive: true })
    }

    const store = this.config.store ?? new Corestore(this.config.storageDir)
    await store.ready()
    this.store = store

    const swarm: Swarm = this.config.swarm ?? new Hyperswarm()
    swarm.on('connection', (conn) => {
      store.replicate(conn)
    })
    swarm.on('error', (err) => {
      console.error('Swarm error:', err.message)
    })
    this.swarm = swarm

    console.log('Transfer engine started')
  }

  async destroy(): Promise<void> {
    const drives = [...this.drives.values()]
    if (this.outbound) drives.push(this.outbound)

    for (const drive of drives) {
      try {
        await drive.close()
      } catch (err) {
        console.error('Failed to close drive:', err)
      }
    }
    this.drives.clear()
    this.outbound = null

    if (this.swarm) {
      await this.swarm.destroy()
      this.swarm = null
    }

    if (this.store) {
      await this.store.close()
      this.store = null
    }
  }

  // --- Provider side ---

  async provide(filePath: string, progress: ProgressSender<ImportProgress>, signal: AbortSignal): Promise<Ticket> {
    const stat = await fs.promises.stat(filePath)
    if (!stat.isFile()) throw new Error(`Not a regular file: ${filePath}`)

    const drive = await this.getOutboundDrive()
    const drivePath = `/${generateId()}/${path.basename(filePath)}`

    await progress.send({ type: 'DECLARED_SIZE', id: 0, size: stat.size })

    const hash = createHash('sha256')
    const out = drive.createWriteStream(drivePath)
    const done = streamDone(out)

    try {
      for await (const chunk of fs.createReadStream(filePath, { signal })) {
        const data: Buffer = chunk
        hash.update(data)
        if (!out.write(data)) await drained(out)
        await progress.send({ type: 'PROCESSED', id: 0, bytes: data.length })
      }
    } catch (err) {
      out.destroy()
      throw err
    }

    out.end()
    const writeError = await done
    if (writeError) throw writeError

    console.log(`Imported ${path.basename(filePath)} (${formatSize(stat.size)})`)

    return {
      driveKey: b4a.toString(drive.key, 'hex'),
      hash: hash.digest('hex'),
      size: stat.size,
      path: drivePath
    }
  }

  private async getOutboundDrive(): Promise<Hyperdrive> {
    if (this.outbound) return this.outbound
    const { store, swarm } = this.running()

    const drive = new Hyperdrive(store.namespace('outbound'))
    await drive.ready()

    swarm.join(drive.discoveryKey, { client: false, server: true })
    await swarm.flush()

    this.outbound = drive
    return drive
  }

  // --- Receiver side ---

  async fetch(ticket: Ticket, target: string, progress: ProgressSender<DownloadProgress>, signal: AbortSignal): Promise<string> {
    const drive = await this.openRemoteDrive(ticket.driveKey)

    try {
      await progress.send({ type: 'DECLARED_SIZE', id: 0, size: ticket.size })

      const entry = await this.waitForEntry(drive, ticket.path, signal)
      if (!entry) throw new Error(`Timed out waiting for ${ticket.path}`)

      await fs.promises.mkdir(target, { recursive: true })
      const localName = uniqueFileName(target, path.posix.basename(ticket.path))
      const destPath = path.join(target, localName)
      const partPath = `${destPath}.part`

      const hash = createHash('sha256')
      const out = (await fs.promises.open(partPath, 'w')).createWriteStream()

      try {
        for await (const data of drive.createReadStream(ticket.path)) {
          signal.throwIfAborted()
          hash.update(data)
          if (!out.write(data)) await once(out, 'drain', { signal })
          await progress.send({ type: 'PROCESSED', id: 0, bytes: data.length })
        }
        out.end()
        await finished(out)
      } catch (err) {
        out.destroy()
        await fs.promises.rm(partPath, { force: true })
        throw err
      }

      const actualHash = hash.digest('hex')
      if (actualHash !== ticket.hash) {
        await fs.promises.rm(partPath, { force: true })
        throw new Error(`Hash mismatch for ${localName}: expected ${ticket.hash.slice(0, 16)}..., got ${actualHash.slice(0, 16)}...`)
      }

      await fs.promises.rename(partPath, destPath)
      await progress.send({ type: 'DONE' })

      console.log(`Received ${localName} (${formatSize(ticket.size)})`)
      return destPath
    } finally {
      await this.leave(drive)
    }
  }

  // Opens (or reuses) the remote drive and joins its topic as a client
  private async openRemoteDrive(driveKeyHex: string): Promise<Hyperdrive> {
    const { store, swarm } = this.running()

    let drive = this.drives.get(driveKeyHex)
    if (!drive) {
      drive = new Hyperdrive(store, b4a.from(driveKeyHex, 'hex'))
      await drive.ready()
      this.drives.set(driveKeyHex, drive)
    }

    const done = drive.findingPeers()
    swarm.join(drive.discoveryKey, { client: true, server: false })
    await swarm.flush()
    done()

    return drive
  }

  private async waitForEntry(drive: Hyperdrive, drivePath: string, signal: AbortSignal): Promise<HyperdriveEntry | null> {
    const deadline = Date.now() + this.config.fetchTimeoutMs
    while (Date.now() < deadline) {
      const entry = await drive.entry(drivePath)
      if (entry) return entry
      await sleep(ENTRY_POLL_INTERVAL_MS, undefined, { signal })
    }
    return null
  }

  // Stop looking for peers; the drive stays open for a repeat fetch
  private async leave(drive: Hyperdrive): Promise<void> {
    if (!this.swarm) return
    try {
      await this.swarm.leave(drive.discoveryKey)
    } catch (err) {
      console.error('Failed to leave drive topic:', err)
    }
  }

  private running(): { store: Corestore; swarm: Swarm } {
    if (!this.store || !this.swarm) throw new Error('Transfer engine not started')
    return { store: this.store, swarm: this.swarm }
  }
}

// Resolves on 'drain', or on 'close' if the stream died while full
function drained(stream: DriveWriteStream): Promise<void> {
  return new Promise((resolve) => {
    stream.once('drain', () => resolve())
    stream.once('close', () => resolve())
  })
}

// Settles with the stream's error, or null once it closed cleanly
function streamDone(stream: DriveWriteStream): Promise<Error | null> {
  return new Promise((resolve) => {
    stream.once('error', (err) => resolve(err))
    stream.once('close', () => resolve(null))
  })
}
