import { MAX_SUPPLY, ONE } from '@elastic-supply/math'
import { StaticOracle } from '../../src/adapters/StaticOracle'
import { InMemoryLedger, Ledger } from '../../src/services/Ledger'
import { PolicyEngine, PolicyParams } from '../../src/services/PolicyEngine'
import { DAY, codeOf, contextOf, makeCtx, thrownBy, windowTime } from '../helpers'

const SUPPLY = 1_000_000n * ONE

function setup(params: Partial<PolicyParams> = {}, ledger: Ledger = new InMemoryLedger(SUPPLY)) {
  const ref = new StaticOracle(100n * ONE)
  const market = new StaticOracle(ONE)
  const aux = new StaticOracle(ONE)
  const policy = new PolicyEngine({
    owner: 'owner',
    ledger,
    baseReferenceIndex: 100n * ONE,
    params: { orchestrator: 'orch', ...params },
    oracles: { referenceIndex: ref, exchangeRate: market, auxRate: aux },
  })
  return { ledger, ref, market, aux, policy }
}

const asOrchestrator = (timestamp: number) => makeCtx({ sender: 'orch', direct: false, timestamp })

async function failureOf(p: Promise<unknown>): Promise<unknown> {
  try {
    await p
  } catch (err) {
    return err
  }
  throw new Error('expected rebase to fail')
}

describe('PolicyEngine defaults', () => {
  test('starts at epoch zero with the reference parameters', () => {
    const { policy } = setup()
    const state = policy.state()
    expect(state.epoch).toBe(0)
    expect(state.lastRebaseTimestamp).toBe(0)
    expect(state.owner).toBe('owner')
    expect(state.config).toEqual({
      version: 1,
      deviationThreshold: 50000000000000000n,
      rebaseLag: 30n,
      minRebaseInterval: 86_400,
      rebaseWindowOffset: 72_000,
      rebaseWindowLength: 900,
      auxWeight: 0n,
      orchestrator: 'orch',
    })
    expect(state.oracles).toEqual({ referenceIndex: true, exchangeRate: true, auxRate: true })
  })

  test('a zero base reference index is rejected', () => {
    const err = thrownBy(() => new PolicyEngine({ owner: 'owner', ledger: new InMemoryLedger(ONE), baseReferenceIndex: 0n }))
    expect(codeOf(err)).toBe('CONFIG_INVALID_PARAMETER')
    expect(contextOf(err)).toEqual({ parameter: 'baseReferenceIndex' })
  })
})

describe('rebase window', () => {
  test('window is [offset, offset + length) within each interval', () => {
    const { policy } = setup()
    expect(policy.inRebaseWindow(72_000)).toBe(true)
    expect(policy.inRebaseWindow(71_999)).toBe(false)
    expect(policy.inRebaseWindow(72_899)).toBe(true)
    expect(policy.inRebaseWindow(72_900)).toBe(false)
    expect(policy.inRebaseWindow(DAY * 3 + 72_450)).toBe(true)
  })

  test('nextRebaseWindow finds the earliest time both gates pass', () => {
    const { policy } = setup()
    expect(policy.nextRebaseWindow(5 * DAY)).toBe(windowTime(5))
    expect(policy.nextRebaseWindow(windowTime(5, 100))).toBe(windowTime(5, 100))
    expect(policy.nextRebaseWindow(windowTime(5, 900))).toBe(windowTime(6))
  })

  test('nextRebaseWindow is null for a zero-length window', () => {
    const { policy } = setup({ rebaseWindowLength: 0 })
    expect(policy.nextRebaseWindow(windowTime(5))).toBeNull()
  })
})

describe('PolicyEngine.rebase', () => {
  test('expands supply, snaps the timestamp and journals LogRebase', async () => {
    const { policy, market, ledger } = setup()
    market.set(1_100000000000000000n)
    const ctx = asOrchestrator(windowTime(10, 300))

    const result = await policy.rebase(ctx)

    expect(result.epoch).toBe(1)
    expect(result.targetRate).toBe(ONE)
    expect(result.delta).toBe(3333333333333333333333n)
    expect(result.totalSupply).toBe(1003333333333333333333333n)
    await expect(ledger.totalSupply()).resolves.toBe(1003333333333333333333333n)
    expect(policy.state().lastRebaseTimestamp).toBe(windowTime(10))
    expect(ctx.journal.drain()).toEqual([
      {
        name: 'LogRebase',
        epoch: 1,
        exchangeRate: 1_100000000000000000n,
        refIndex: 100n * ONE,
        auxRate: ONE,
        requestedSupplyAdjustment: 3333333333333333333333n,
        timestamp: windowTime(10, 300),
      },
    ])
  })

  test('a deviation in the dead zone still advances epoch and timestamp', async () => {
    const { policy, market, ledger } = setup()
    const rebase = jest.spyOn(ledger, 'rebase')
    market.set(1_040000000000000000n)
    const result = await policy.rebase(asOrchestrator(windowTime(10, 120)))
    expect(result.delta).toBe(0n)
    expect(result.suppressed).toBe(true)
    expect(policy.state().epoch).toBe(1)
    expect(policy.state().lastRebaseTimestamp).toBe(windowTime(10))
    expect(rebase).toHaveBeenCalledTimes(1)
    expect(rebase).toHaveBeenCalledWith(1, 0n)
    await expect(ledger.totalSupply()).resolves.toBe(SUPPLY)
  })

  test('only the orchestrator may rebase', async () => {
    const { policy } = setup()
    const err = await failureOf(policy.rebase(makeCtx({ sender: 'mallory', timestamp: windowTime(10) })))
    expect(codeOf(err)).toBe('AUTH_NOT_ORCHESTRATOR')
  })

  test('outside the window nothing changes', async () => {
    const { policy } = setup()
    const err = await failureOf(policy.rebase(asOrchestrator(windowTime(10, 900))))
    expect(codeOf(err)).toBe('GATING_OUTSIDE_REBASE_WINDOW')
    expect(policy.state().epoch).toBe(0)
  })

  test('cooldown is strict: the next window start is still too soon', async () => {
    const { policy } = setup()
    await policy.rebase(asOrchestrator(windowTime(10, 10)))

    expect(codeOf(await failureOf(policy.rebase(asOrchestrator(windowTime(10, 20)))))).toBe('GATING_REBASE_TOO_SOON')
    expect(codeOf(await failureOf(policy.rebase(asOrchestrator(windowTime(11)))))).toBe('GATING_REBASE_TOO_SOON')
    expect(policy.nextRebaseWindow(windowTime(10, 30))).toBe(windowTime(11, 1))

    const next = await policy.rebase(asOrchestrator(windowTime(11, 1)))
    expect(next.epoch).toBe(2)
  })

  test('first window after genesis is blocked by the cooldown', async () => {
    const { policy } = setup()
    expect(codeOf(await failureOf(policy.rebase(asOrchestrator(windowTime(0)))))).toBe('GATING_REBASE_TOO_SOON')
    expect(policy.isRebaseDue(windowTime(1))).toBe(true)
  })

  test('a removed oracle fails the rebase as not configured', async () => {
    const { policy } = setup()
    policy.setMarketOracle(makeCtx(), null)
    const err = await failureOf(policy.rebase(asOrchestrator(windowTime(10))))
    expect(codeOf(err)).toBe('INPUT_ORACLE_NOT_CONFIGURED')
    expect(contextOf(err)).toEqual({ source: 'exchangeRate' })
  })

  test('a ledger reporting supply above the ceiling violates the invariant', async () => {
    const broken: Ledger = {
      totalSupply: async () => SUPPLY,
      rebase: async () => MAX_SUPPLY + 1n,
    }
    const { policy } = setup({}, broken)
    expect(codeOf(await failureOf(policy.rebase(asOrchestrator(windowTime(10)))))).toBe('LEDGER_SUPPLY_INVARIANT')
  })

  test('globalEpochAndSupply reports epoch with ledger supply', async () => {
    const { policy, market } = setup()
    market.set(900000000000000000n)
    await policy.rebase(asOrchestrator(windowTime(10)))
    await expect(policy.globalEpochAndSupply()).resolves.toEqual({ epoch: 1, totalSupply: 996666666666666666666667n })
  })

  test('snapshot and restore undo a rebase', async () => {
    const { policy } = setup()
    const saved = policy.snapshot()
    await policy.rebase(asOrchestrator(windowTime(10)))
    policy.restore(saved)
    expect(policy.state().epoch).toBe(0)
    expect(policy.state().lastRebaseTimestamp).toBe(0)
  })
})

describe('owner-only setters', () => {
  test('reject non-owners', () => {
    const { policy } = setup()
    const mallory = makeCtx({ sender: 'mallory' })
    expect(codeOf(thrownBy(() => policy.setRebaseLag(mallory, 10n)))).toBe('AUTH_NOT_OWNER')
    expect(codeOf(thrownBy(() => policy.setAuxOracle(mallory, null)))).toBe('AUTH_NOT_OWNER')
  })

  test('each accepted update produces a new config version', () => {
    const { policy } = setup()
    const owner = makeCtx()
    const before = policy.getConfig()
    policy.setDeviationThreshold(owner, ONE / 10n)
    policy.setRebaseLag(owner, 10n)
    policy.setAuxWeight(owner, ONE / 2n)
    policy.setRebaseTimingParameters(owner, { minRebaseInterval: 3_600, rebaseWindowOffset: 600, rebaseWindowLength: 300 })
    policy.setOrchestrator(owner, 'orch-2')

    expect(before.version).toBe(1)
    expect(before.rebaseLag).toBe(30n)
    expect(policy.getConfig()).toEqual({
      version: 6,
      deviationThreshold: 100000000000000000n,
      rebaseLag: 10n,
      minRebaseInterval: 3_600,
      rebaseWindowOffset: 600,
      rebaseWindowLength: 300,
      auxWeight: 500000000000000000n,
      orchestrator: 'orch-2',
    })
  })

  test.each([
    ['rebaseLag', { rebaseLag: 0n }],
    ['auxWeight', { auxWeight: ONE + 1n }],
    ['minRebaseInterval', { minRebaseInterval: 0 }],
    ['rebaseWindowOffset', { rebaseWindowOffset: 86_400 }],
    ['rebaseWindowLength', { rebaseWindowLength: -1 }],
    ['deviationThreshold', { deviationThreshold: -1n }],
  ])('rejects an invalid %s and keeps the old config', (parameter, patch) => {
    const { policy } = setup()
    const err = thrownBy(() => policy.updateParams(makeCtx(), patch))
    expect(codeOf(err)).toBe('CONFIG_INVALID_PARAMETER')
    expect(contextOf(err)).toEqual({ parameter })
    expect(policy.getConfig().version).toBe(1)
  })

  test('oracle setters swap the feed used by the next rebase', async () => {
    const { policy } = setup()
    policy.setMarketOracle(makeCtx(), new StaticOracle(1_100000000000000000n))
    expect(policy.getConfig().version).toBe(2)
    const result = await policy.rebase(asOrchestrator(windowTime(10)))
    expect(result.exchangeRate).toBe(1_100000000000000000n)
  })
})
