import { LEGACY_REJECTED_MESSAGE, ReconciliationSupervisor } from '../reconciliation/supervisor.js'
import type { LegacySink } from '../legacy/types.js'
import { SqlitePairingStore } from '../storage/sqlite-pairing-store.js'
import { deferred } from './fakes.js'

function createMockStore() {
  return { updateStatus: vi.fn(async () => true) }
}

function sinkReturning(result: boolean | Error): LegacySink {
  return {
    attemptSave: vi.fn(async () => {
      if (result instanceof Error) throw result
      return result
    }),
  }
}

const job = { recordId: 7, platform: 5, product: 42 }

describe('ReconciliationSupervisor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('marks the record successful when the legacy save is accepted', async () => {
    const store = createMockStore()
    const sink = sinkReturning(true)
    const supervisor = new ReconciliationSupervisor(store, sink)

    supervisor.spawn(job)
    await supervisor.drain()

    expect(sink.attemptSave).toHaveBeenCalledWith(5, 42)
    expect(store.updateStatus).toHaveBeenCalledTimes(1)
    expect(store.updateStatus).toHaveBeenCalledWith(7, 'success', null)
    expect(supervisor.getStats()).toEqual({ inFlight: 0, succeeded: 1, failed: 0 })
  })

  it('marks the record failed when the legacy system rejects it', async () => {
    const store = createMockStore()
    const supervisor = new ReconciliationSupervisor(store, sinkReturning(false))

    supervisor.spawn(job)
    await supervisor.drain()

    expect(store.updateStatus).toHaveBeenCalledTimes(1)
    expect(store.updateStatus).toHaveBeenCalledWith(7, 'failure', LEGACY_REJECTED_MESSAGE)
    expect(supervisor.getStats()).toEqual({ inFlight: 0, succeeded: 0, failed: 1 })
  })

  it('records the error text when the legacy call throws', async () => {
    const store = createMockStore()
    const supervisor = new ReconciliationSupervisor(store, sinkReturning(new Error('connection reset')))

    supervisor.spawn(job)
    await supervisor.drain()

    expect(store.updateStatus).toHaveBeenCalledWith(7, 'failure', 'connection reset')
  })

  it('returns before the legacy save completes', async () => {
    const store = createMockStore()
    const save = deferred<boolean>()
    const supervisor = new ReconciliationSupervisor(store, { attemptSave: () => save.promise })

    supervisor.spawn(job)

    expect(supervisor.getStats().inFlight).toBe(1)
    expect(store.updateStatus).not.toHaveBeenCalled()

    save.resolve(true)
    await supervisor.drain()
    expect(supervisor.getStats()).toEqual({ inFlight: 0, succeeded: 1, failed: 0 })
  })

  it('survives a store error while saving the status', async () => {
    const store = { updateStatus: vi.fn(async () => { throw new Error('readonly database') }) }
    const supervisor = new ReconciliationSupervisor(store, sinkReturning(true))

    supervisor.spawn(job)
    await expect(supervisor.drain()).resolves.toBeUndefined()

    expect(console.error).toHaveBeenCalledWith(
      '[Reconciliation] Could not store status for record #7:',
      expect.any(Error),
    )
  })

  it('abandons running tasks and refuses new ones', async () => {
    const store = createMockStore()
    const save = deferred<boolean>()
    const attemptSave = vi.fn(() => save.promise)
    const supervisor = new ReconciliationSupervisor(store, { attemptSave })

    supervisor.spawn(job)
    expect(supervisor.abandon()).toBe(1)
    expect(supervisor.getStats().inFlight).toBe(0)

    supervisor.spawn({ recordId: 8, platform: 5, product: 43 })
    expect(attemptSave).toHaveBeenCalledTimes(1)
  })

  it('settles each stored record exactly once', async () => {
    const store = await SqlitePairingStore.open(':memory:')
    const { recordId } = await store.commitPairing({ login: 'alice', platform: 5, product: 42 })
    const supervisor = new ReconciliationSupervisor(store, sinkReturning(true))

    supervisor.spawn({ recordId, platform: 5, product: 42 })
    await supervisor.drain()

    expect((await store.getRecord(recordId))?.syncStatus).toBe('success')
    expect(await store.updateStatus(recordId, 'failure', 'late')).toBe(false)
    expect((await store.getRecord(recordId))?.syncStatus).toBe('success')
    await store.close()
  })
})
