#!/usr/bin/env node
import fs from 'node:fs'
import { loadConfig, saveConfig, resolveConfig, applyConfigValue, getConfigPath, type ResolvedConfig } from './config.js'
import { HyperdriveEngine } from './transfer/engine.js'
import { StateStore } from './state/store.js'
import { TransferWorker } from './worker/worker.js'
import { Session } from './session.js'
import { HttpServer } from './http/server.js'
import { TerminalView } from './ui/terminal.js'
import { describeError } from './errors.js'
import { renderTicket } from './ticket.js'

const config = resolveConfig(loadConfig())

function printUsage(): void {
  console.log(`
ferry - share files over a peer-to-peer swarm with a redeemable ticket

Usage:
  ferry <command> [options]

Commands:
  start                    Start the daemon with the HTTP API
  share <file>             Share a file, print its ticket and keep serving it
  get <ticket> [dir]       Fetch a shared file into dir (default: ${config.downloadDir})
  config                   Show current configuration
  config set <field> <value>
                           Change one setting in the config file
  help                     Show this help message

Environment Variables:
  FERRY_HOME   Config and storage directory (default: ~/.ferry)

Config: ${getConfigPath()}
`)
}

interface Runtime {
  store: StateStore
  worker: TransferWorker
  session: Session
  shutdown: () => Promise<void>
}

async function createRuntime(cfg: ResolvedConfig): Promise<Runtime> {
  const engine = new HyperdriveEngine({ storageDir: cfg.storageDir, fetchTimeoutMs: cfg.fetchTimeoutMs })
  await engine.start()

  const store = new StateStore()
  const worker = new TransferWorker(engine, store, { progressCapacity: cfg.progressCapacity })
  const session = new Session(store, worker, { cancelSupersededShare: cfg.cancelSupersededShare })
  worker.start()

  let closed = false
  const shutdown = async () => {
    if (closed) return
    closed = true

    await worker.shutdown()
    try {
      await engine.destroy()
      console.log('  Transfer engine closed')
    } catch (err) {
      console.error('  Error closing transfer engine:', err)
    }
  }

  return { store, worker, session, shutdown }
}

// Most recent first, the same order a dismiss-to-reveal modal shows them
function reportErrors(store: StateStore): number {
  let count = 0
  for (let err = store.acknowledgeError(); err; err = store.acknowledgeError()) {
    console.error(`Error: ${describeError(err)}`)
    count++
  }
  return count
}

function onSignal(handler: () => Promise<void>): void {
  let handled = false
  const run = () => {
    if (handled) return
    handled = true
    console.log('')
    console.log('Shutting down...')
    handler()
      .then(() => {
        console.log('Goodbye!')
        process.exit(0)
      })
      .catch((err) => {
        console.error('Error during shutdown:', err)
        process.exit(1)
      })
  }
  process.on('SIGINT', run)
  process.on('SIGTERM', run)
}

async function shareFile(file: string): Promise<void> {
  if (!fs.existsSync(file)) {
    console.error(`Error: file not found: ${file}`)
    process.exit(1)
  }

  const runtime = await createRuntime(config)
  const { store, worker, session } = runtime

  session.selectFile(file)
  const view = new TerminalView(store, { label: 'Importing', select: (s) => s.sharingProgress })
  view.start()

  const result = session.share()
  if (!result.ok) {
    view.stop()
    console.error(`Error: ${result.reason}`)
    await runtime.shutdown()
    process.exit(1)
  }

  await worker.drain()
  view.stop()

  const { ticket } = store.snapshot()
  if (!ticket) {
    reportErrors(store)
    await runtime.shutdown()
    process.exit(1)
  }

  console.log('')
  console.log('Ready to share. Ticket:')
  console.log(renderTicket(ticket))
  console.log('')
  console.log('To fetch it elsewhere:')
  console.log(`  ferry get ${renderTicket(ticket)}`)
  console.log('')
  console.log('Serving until interrupted (Ctrl+C)...')

  onSignal(runtime.shutdown)
}

async function getFile(ticketText: string, dir: string): Promise<void> {
  const runtime = await createRuntime(config)
  const { store, worker, session } = runtime

  session.pasteTicket(ticketText)
  session.chooseTarget(dir)
  const view = new TerminalView(store, { label: 'Downloading', select: (s) => s.downloadProgress })
  view.start()

  const result = session.download()
  if (!result.ok) {
    view.stop()
    console.error(`Error: ${result.reason}`)
    await runtime.shutdown()
    process.exit(1)
  }

  await worker.drain()
  view.stop()

  const failures = reportErrors(store)
  await runtime.shutdown()
  process.exit(failures > 0 ? 1 : 0)
}

async function startDaemon(): Promise<void> {
  console.log('Starting ferry daemon...')
  console.log(`  Storage: ${config.storageDir}`)
  console.log(`  HTTP: localhost:${config.httpPort}`)

  const runtime = await createRuntime(config)
  const httpServer = new HttpServer({ port: config.httpPort, context: { session: runtime.session } })

  try {
    await httpServer.start()
  } catch (err) {
    console.error('Failed to start HTTP server:', err)
    await runtime.shutdown()
    process.exit(1)
  }

  onSignal(async () => {
    try {
      await httpServer.stop()
      console.log('  HTTP server stopped')
    } catch (err) {
      console.error('  Error stopping HTTP server:', err)
    }
    await runtime.shutdown()
  })

  console.log('Ready. Waiting for requests...')
}

function showConfig(): void {
  console.log('Current configuration:')
  console.log(`  Config file: ${getConfigPath()}`)
  console.log(`  Storage dir: ${config.storageDir}`)
  console.log(`  Download dir: ${config.downloadDir}`)
  console.log(`  HTTP port: ${config.httpPort}`)
  console.log(`  Progress channel capacity: ${config.progressCapacity}`)
  console.log(`  Fetch timeout: ${config.fetchTimeoutMs}ms`)
  console.log(`  Cancel superseded share: ${config.cancelSupersededShare}`)
}

function setConfig(field: string, value: string): void {
  const result = applyConfigValue(loadConfig(), field, value)
  if (!result.ok) {
    console.error(`Error: ${result.error}`)
    process.exit(1)
  }
  if (!saveConfig(result.config)) process.exit(1)
  console.log(`Set ${field} = ${value} in ${getConfigPath()}`)
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)

  if (args.length === 0) {
    printUsage()
    process.exit(0)
  }

  const command = args[0]

  switch (command) {
    case 'start':
      await startDaemon()
      break

    case 'share': {
      const file = args[1]
      if (!file) {
        console.error('Error: file is required')
        console.error('Usage: ferry share <file>')
        process.exit(1)
      }
      await shareFile(file)
      break
    }

    case 'get': {
      const ticket = args[1]
      if (!ticket) {
        console.error('Error: ticket is required')
        console.error('Usage: ferry get <ticket> [dir]')
        process.exit(1)
      }
      await getFile(ticket, args[2] ?? config.downloadDir)
      break
    }

    case 'config': {
      if (args[1] !== 'set') {
        showConfig()
        break
      }
      const [field, value] = args.slice(2)
      if (field === undefined || value === undefined) {
        console.error('Usage: ferry config set <field> <value>')
        process.exit(1)
      }
      setConfig(field, value)
      break
    }

    case 'help':
    case '--help':
    case '-h':
      printUsage()
      break

    default:
      console.error(`Unknown command: ${command}`)
      console.error('Run "ferry help" for usage.')
      process.exit(1)
  }
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
