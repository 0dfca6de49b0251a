import { ConnectionRole } from '@scanlink/shared'
import { PairingCoordinator, type PairingOutcome } from '../pairing/pairing-coordinator.js'
import { Broadcaster } from '../sessions/broadcaster.js'
import { SessionRegistry } from '../sessions/session-registry.js'
import { FakeConnection, InMemoryPairingStore } from './fakes.js'

function committed(outcome: PairingOutcome) {
  if (outcome.status !== 'committed') throw new Error(`expected a commit, got ${outcome.status}`)
  return outcome
}

describe('PairingCoordinator', () => {
  let broadcaster: Broadcaster
  let registry: SessionRegistry
  let store: InMemoryPairingStore
  let spawn: ReturnType<typeof vi.fn>
  let coordinator: PairingCoordinator

  function build(nextStore: InMemoryPairingStore) {
    store = nextStore
    spawn = vi.fn()
    coordinator = new PairingCoordinator({ registry, broadcaster, store, reconciliation: { spawn } })
  }

  /** Register a scanner and a dashboard for `login`; returns the dashboard with a clean inbox. */
  async function operator(login: string) {
    await registry.register(new FakeConnection(`${login}-scanner`), login, ConnectionRole.Writer, { login })
    const dashboard = new FakeConnection(`${login}-dashboard`)
    await registry.register(dashboard, login, ConnectionRole.Reader, { login })
    dashboard.reset()
    return dashboard
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    broadcaster = new Broadcaster()
    registry = new SessionRegistry(broadcaster)
    build(new InMemoryPairingStore())
  })

  afterEach(() => {
    registry.clear()
    vi.restoreAllMocks()
  })

  it('commits a first pairing and tells the platform', async () => {
    const dashboard = await operator('alice')

    const outcome = await coordinator.handleNewPairing('alice', 5, 42)

    expect(outcome).toEqual({
      status: 'committed',
      platformChanged: true,
      recordId: 1,
      previous: null,
      moved: false,
    })
    expect(dashboard.sent).toEqual([
      { type: 'platform_changed', platform: 5 },
      { type: 'new_pairing', platform: 5, product: 42, recordId: 1, overwrite: false },
    ])
    expect(store.records[0]).toMatchObject({
      login: 'alice',
      platform: 5,
      product: 42,
      overwritten: false,
      syncStatus: 'pending',
    })
    expect(spawn).toHaveBeenCalledWith({ recordId: 1, platform: 5, product: 42 })
  })

  it('moves a product between platforms', async () => {
    const alice = await operator('alice')
    const bob = await operator('bob')
    await coordinator.handleNewPairing('alice', 5, 42)
    alice.reset()

    const outcome = committed(await coordinator.handleNewPairing('bob', 7, 42))

    expect(outcome.previous).toEqual({ id: 1, platform: 5 })
    expect(outcome.moved).toBe(true)
    expect(bob.sent).toEqual([
      { type: 'platform_changed', platform: 7 },
      { type: 'new_pairing', platform: 7, product: 42, recordId: 2, overwrite: true },
    ])
    expect(alice.sent).toEqual([{ type: 'product_moved', product: 42, from: 5, to: 7 }])
    expect(store.records.map((r) => r.overwritten)).toEqual([true, false])
  })

  it('treats a re-scan onto the same platform as an overwrite without a move', async () => {
    const dashboard = await operator('alice')
    await coordinator.handleNewPairing('alice', 5, 42)
    dashboard.reset()

    const outcome = committed(await coordinator.handleNewPairing('alice', 5, 42))

    expect(outcome).toMatchObject({ platformChanged: false, previous: { id: 1, platform: 5 }, moved: false })
    expect(dashboard.sent).toEqual([
      { type: 'new_pairing', platform: 5, product: 42, recordId: 2, overwrite: true },
    ])
  })

  it('fans out to every identity bound to the platform', async () => {
    await operator('alice')
    const carol = await operator('carol')
    await coordinator.handleNewPairing('carol', 5, null)
    carol.reset()

    await coordinator.handleNewPairing('alice', 5, 42)

    expect(carol.sent).toEqual([
      { type: 'new_pairing', platform: 5, product: 42, recordId: 1, overwrite: false },
    ])
  })

  it('rebinds without touching the store when no product is given', async () => {
    const dashboard = await operator('alice')

    expect(await coordinator.handleNewPairing('alice', 9, null)).toEqual({
      status: 'rebound',
      platformChanged: true,
    })
    expect(await coordinator.handleNewPairing('alice', 9, null)).toEqual({
      status: 'rebound',
      platformChanged: false,
    })

    expect(dashboard.sent).toEqual([{ type: 'platform_changed', platform: 9 }])
    expect(registry.lookup('alice')?.currentPlatform).toBe(9)
    expect(store.writes).toBe(0)
    expect(spawn).not.toHaveBeenCalled()
  })

  it('ignores an unregistered login', async () => {
    const dashboard = await operator('alice')
    await coordinator.handleNewPairing('alice', 5, null)
    dashboard.reset()

    expect(await coordinator.handleNewPairing('ghost', 5, 42)).toEqual({ status: 'ignored' })

    expect(store.writes).toBe(0)
    expect(spawn).not.toHaveBeenCalled()
    expect(dashboard.sent).toEqual([])
  })

  it('lets exactly one of two concurrent commits for a product see no previous holder', async () => {
    build(new InMemoryPairingStore({ yieldBetweenSteps: true }))
    await operator('alice')
    await operator('bob')

    const outcomes = (
      await Promise.all([
        coordinator.handleNewPairing('alice', 5, 42),
        coordinator.handleNewPairing('bob', 7, 42),
      ])
    ).map(committed)

    const firsts = outcomes.filter((o) => o.previous === null)
    const seconds = outcomes.filter((o) => o.previous !== null)
    expect(firsts).toHaveLength(1)
    expect(seconds).toHaveLength(1)
    expect(seconds[0].previous?.id).toBe(firsts[0].recordId)
    expect(store.records.filter((r) => !r.overwritten)).toHaveLength(1)
  })

  it('processes calls for one login in order', async () => {
    const dashboard = await operator('alice')

    await Promise.all([
      coordinator.handleNewPairing('alice', 5, 1),
      coordinator.handleNewPairing('alice', 6, 2),
    ])

    expect(dashboard.sent).toEqual([
      { type: 'platform_changed', platform: 5 },
      { type: 'new_pairing', platform: 5, product: 1, recordId: 1, overwrite: false },
      { type: 'platform_changed', platform: 6 },
      { type: 'new_pairing', platform: 6, product: 2, recordId: 2, overwrite: false },
    ])
  })

  it('emits no pairing events when the commit fails', async () => {
    const dashboard = await operator('alice')
    store.failCommit = new Error('disk full')

    await expect(coordinator.handleNewPairing('alice', 5, 42)).rejects.toThrow('disk full')

    expect(dashboard.types()).toEqual(['platform_changed'])
    expect(spawn).not.toHaveBeenCalled()

    store.failCommit = null
    const retry = committed(await coordinator.handleNewPairing('alice', 5, 42))
    expect(retry.recordId).toBe(1)
  })
})
