import { describe, test } from 'node:test'
import assert from 'node:assert/strict'
import { setImmediate as tick } from 'node:timers/promises'
import { TransferWorker } from '../src/worker/worker.js'
import { StateStore } from '../src/state/store.js'
import type { Progress, SharedState } from '../src/state/types.js'
import { renderTicket } from '../src/ticket.js'
import { TicketParseError, ShareError, GetError, describeError } from '../src/errors.js'
import { FakeEngine, deferred, makeTicket } from './fake-engine.js'

function setup() {
  const engine = new FakeEngine()
  const store = new StateStore()
  const worker = new TransferWorker(engine, store)
  worker.start()
  return { engine, store, worker }
}

function recordProgress(store: StateStore, select: (s: SharedState) => Progress | null): Array<Progress | null> {
  const seen: Array<Progress | null> = []
  store.on('change', (s: SharedState) => seen.push(select(s)))
  return seen
}

describe('TransferWorker', () => {
  test('drain resolves at once when nothing was sent', async () => {
    const { worker } = setup()
    assert.equal(worker.pending, 0)
    await worker.drain()
    await worker.shutdown()
  })

  test('drain and shutdown return at once when the loop never started', async () => {
    const worker = new TransferWorker(new FakeEngine(), new StateStore())
    assert.equal(worker.send({ type: 'SHARE', path: '/tmp/a.txt', cycle: 0 }), true)
    assert.equal(worker.pending, 1)

    await worker.drain()
    await worker.shutdown()
    assert.equal(worker.pending, 0)
    assert.deepEqual(worker.requests(), [])
  })

  test('share reports ratios and ends with a ticket', async () => {
    const { engine, store, worker } = setup()
    const ticket = makeTicket('big.bin', { size: 10_000_000 })
    engine.provideScripts.set('/tmp/big.bin', {
      events: [
        { type: 'DECLARED_SIZE', id: 1, size: 10_000_000 },
        { type: 'PROCESSED', id: 1, bytes: 2_500_000 },
        { type: 'PROCESSED', id: 1, bytes: 2_500_000 },
        { type: 'PROCESSED', id: 1, bytes: 2_500_000 },
        { type: 'PROCESSED', id: 1, bytes: 2_500_000 }
      ],
      ticket
    })
    const seen = recordProgress(store, (s) => s.sharingProgress)

    assert.equal(worker.send({ type: 'SHARE', path: '/tmp/big.bin', cycle: 0 }), true)
    await worker.drain()

    assert.deepEqual(seen, ['indeterminate', 0, 0.25, 0.5, 0.75, 1, null])
    const state = store.snapshot()
    assert.deepEqual(state.ticket, ticket)
    assert.equal(state.sharingProgress, null)
    assert.equal(state.errors.length, 0)
    await worker.shutdown()
  })

  test('a malformed ticket fails without touching the engine', async () => {
    const { engine, store, worker } = setup()
    const seen = recordProgress(store, (s) => s.downloadProgress)

    worker.send({ type: 'GET', ticket: 'not-a-ticket', target: '/tmp/downloads' })
    await worker.drain()

    const { errors, downloadProgress } = store.snapshot()
    assert.equal(errors.length, 1)
    const [error] = errors
    assert.ok(error instanceof TicketParseError)
    assert.equal(error.reason, 'missing ferry prefix')
    assert.equal(describeError(error), 'parsing ticket: missing ferry prefix')
    assert.equal(downloadProgress, null)
    assert.deepEqual(seen, [null])
    assert.equal(engine.fetchCalls.length, 0)
    await worker.shutdown()
  })

  test('get reports progress and clears it on completion', async () => {
    const { engine, store, worker } = setup()
    const ticket = makeTicket('notes.txt', { size: 100 })
    engine.fetchScripts.set(ticket.path, {
      events: [
        { type: 'DECLARED_SIZE', id: 0, size: 100 },
        { type: 'PROCESSED', id: 0, bytes: 40 },
        { type: 'PROCESSED', id: 0, bytes: 60 },
        { type: 'DONE' }
      ]
    })
    const seen = recordProgress(store, (s) => s.downloadProgress)

    worker.send({ type: 'GET', ticket: renderTicket(ticket), target: '/tmp/downloads' })
    await worker.drain()

    assert.deepEqual(seen, [0, 0, 0.4, 1, 1, null])
    assert.deepEqual(engine.fetchCalls, [{ ticket, target: '/tmp/downloads' }])
    assert.equal(store.snapshot().errors.length, 0)
    await worker.shutdown()
  })

  test('requests run one at a time in send order', async () => {
    const { engine, worker } = setup()
    const gate = deferred()
    const ticket = makeTicket('middle.txt')
    engine.provideScripts.set('/tmp/first.txt', { gate: gate.promise })

    worker.send({ type: 'SHARE', path: '/tmp/first.txt', cycle: 0 })
    worker.send({ type: 'GET', ticket: renderTicket(ticket), target: '/tmp/out' })
    worker.send({ type: 'SHARE', path: '/tmp/last.txt', cycle: 0 })
    assert.equal(worker.pending, 3)

    await tick()
    assert.deepEqual(engine.log, ['provide:start:/tmp/first.txt'])
    assert.deepEqual(worker.current, { type: 'SHARE', path: '/tmp/first.txt', cycle: 0 })

    gate.resolve()
    await worker.drain()

    assert.deepEqual(engine.log, [
      'provide:start:/tmp/first.txt',
      'provide:end:/tmp/first.txt',
      `fetch:start:${ticket.path}`,
      `fetch:end:${ticket.path}`,
      'provide:start:/tmp/last.txt',
      'provide:end:/tmp/last.txt'
    ])
    assert.equal(worker.pending, 0)
    assert.equal(worker.current, null)
    await worker.shutdown()
  })

  test('a failed share records a ShareError and the loop carries on', async () => {
    const { engine, store, worker } = setup()
    engine.provideScripts.set('/tmp/locked.txt', { error: new Error('permission denied') })

    worker.send({ type: 'SHARE', path: '/tmp/locked.txt', cycle: 0 })
    worker.send({ type: 'SHARE', path: '/tmp/open.txt', cycle: 0 })
    await worker.drain()

    const state = store.snapshot()
    assert.equal(state.errors.length, 1)
    const [error] = state.errors
    assert.ok(error instanceof ShareError)
    assert.equal(error.path, '/tmp/locked.txt')
    assert.equal(describeError(error), 'sharing: permission denied')
    assert.deepEqual(state.ticket, makeTicket('open.txt'))
    assert.equal(state.sharingProgress, null)
    await worker.shutdown()
  })

  test('a failed get records a GetError and clears progress', async () => {
    const { engine, store, worker } = setup()
    const ticket = makeTicket('gone.txt')
    engine.fetchScripts.set(ticket.path, {
      events: [{ type: 'DECLARED_SIZE', id: 0, size: 10 }],
      error: new Error('timed out waiting for peers')
    })

    worker.send({ type: 'GET', ticket: renderTicket(ticket), target: '/tmp/out' })
    await worker.drain()

    const state = store.snapshot()
    assert.equal(state.downloadProgress, null)
    assert.equal(state.errors.length, 1)
    const [error] = state.errors
    assert.ok(error instanceof GetError)
    assert.deepEqual(error.ticket, ticket)
    assert.equal(error.target, '/tmp/out')
    assert.equal(describeError(error), 'get: timed out waiting for peers')
    await worker.shutdown()
  })

  test('a share outcome after a new file selection is discarded', async () => {
    const { engine, store, worker } = setup()
    const gate = deferred()
    engine.provideScripts.set('/tmp/old.txt', {
      gate: gate.promise,
      lateEvents: [
        { type: 'DECLARED_SIZE', id: 1, size: 100 },
        { type: 'PROCESSED', id: 1, bytes: 50 }
      ]
    })

    worker.send({ type: 'SHARE', path: '/tmp/old.txt', cycle: 0 })
    await tick()
    store.resetShare()

    const seen = recordProgress(store, (s) => s.sharingProgress)
    gate.resolve()
    await worker.drain()

    assert.deepEqual(seen, [null])
    const state = store.snapshot()
    assert.equal(state.ticket, null)
    assert.equal(state.sharingProgress, null)
    assert.equal(state.errors.length, 0)
    await worker.shutdown()
  })

  test('a queued share of an older selection is skipped', async () => {
    const engine = new FakeEngine()
    const store = new StateStore()
    const worker = new TransferWorker(engine, store)
    worker.send({ type: 'SHARE', path: '/tmp/old.txt', cycle: 0 })
    store.resetShare()
    const seen = recordProgress(store, (s) => s.sharingProgress)

    worker.start()
    await worker.drain()

    assert.deepEqual(engine.provideCalls, [])
    assert.deepEqual(seen, [])
    assert.equal(store.snapshot().ticket, null)
    await worker.shutdown()
  })

  test('requests lists the running request before the queued ones', async () => {
    const { engine, worker } = setup()
    const gate = deferred()
    engine.provideScripts.set('/tmp/first.txt', { gate: gate.promise })

    worker.send({ type: 'SHARE', path: '/tmp/first.txt', cycle: 0 })
    worker.send({ type: 'GET', ticket: 'not-a-ticket', target: '/tmp/out' })
    await tick()
    assert.deepEqual(worker.requests(), [
      { type: 'SHARE', path: '/tmp/first.txt', cycle: 0 },
      { type: 'GET', ticket: 'not-a-ticket', target: '/tmp/out' }
    ])

    gate.resolve()
    await worker.drain()
    assert.deepEqual(worker.requests(), [])
    await worker.shutdown()
  })

  test('a share failure after a new file selection is still recorded', async () => {
    const { engine, store, worker } = setup()
    const gate = deferred()
    engine.provideScripts.set('/tmp/old.txt', { gate: gate.promise, error: new Error('read error') })

    worker.send({ type: 'SHARE', path: '/tmp/old.txt', cycle: 0 })
    await tick()
    store.resetShare()
    gate.resolve()
    await worker.drain()

    const state = store.snapshot()
    assert.equal(state.errors.length, 1)
    assert.ok(state.errors[0] instanceof ShareError)
    assert.equal(state.ticket, null)
    await worker.shutdown()
  })

  test('cancel aborts the running operation without recording an error', async () => {
    const { engine, store, worker } = setup()
    engine.provideScripts.set('/tmp/slow.txt', {
      events: [{ type: 'DECLARED_SIZE', id: 1, size: 100 }],
      gate: deferred().promise
    })

    worker.send({ type: 'SHARE', path: '/tmp/slow.txt', cycle: 0 })
    await tick()
    assert.equal(worker.cancel('GET'), false)
    assert.equal(worker.cancel('SHARE'), true)
    await worker.drain()

    const state = store.snapshot()
    assert.equal(state.sharingProgress, null)
    assert.equal(state.ticket, null)
    assert.equal(state.errors.length, 0)
    assert.equal(worker.cancel(), false)
    await worker.shutdown()
  })

  test('a cancelled get clears download progress', async () => {
    const { engine, store, worker } = setup()
    const ticket = makeTicket('slow.bin')
    engine.fetchScripts.set(ticket.path, { gate: deferred().promise })

    worker.send({ type: 'GET', ticket: renderTicket(ticket), target: '/tmp/out' })
    await tick()
    assert.equal(store.snapshot().downloadProgress, 0)
    assert.equal(worker.cancel(), true)
    await worker.drain()

    assert.equal(store.snapshot().downloadProgress, null)
    assert.equal(store.snapshot().errors.length, 0)
    await worker.shutdown()
  })

  test('shutdown aborts the running operation and skips queued ones', async () => {
    const { engine, store, worker } = setup()
    engine.provideScripts.set('/tmp/a.txt', { gate: deferred().promise })

    worker.send({ type: 'SHARE', path: '/tmp/a.txt', cycle: 0 })
    worker.send({ type: 'SHARE', path: '/tmp/b.txt', cycle: 0 })
    await tick()
    await worker.shutdown()

    assert.deepEqual(engine.provideCalls, ['/tmp/a.txt'])
    assert.equal(worker.pending, 0)
    assert.equal(store.snapshot().errors.length, 0)
    assert.equal(worker.send({ type: 'SHARE', path: '/tmp/c.txt', cycle: 0 }), false)
  })

  test('a small progress capacity applies backpressure without losing events', async () => {
    const engine = new FakeEngine()
    const store = new StateStore()
    const worker = new TransferWorker(engine, store, { progressCapacity: 1 })
    worker.start()

    const events = Array.from({ length: 10 }, () => ({ type: 'PROCESSED' as const, id: 1, bytes: 10 }))
    engine.provideScripts.set('/tmp/chunks.bin', {
      events: [{ type: 'DECLARED_SIZE', id: 1, size: 100 }, ...events]
    })
    const seen = recordProgress(store, (s) => s.sharingProgress)

    worker.send({ type: 'SHARE', path: '/tmp/chunks.bin', cycle: 0 })
    await worker.drain()

    assert.deepEqual(seen, ['indeterminate', 0, 0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1, null])
    await worker.shutdown()
  })
})
