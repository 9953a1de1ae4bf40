import { CycleScheduler, SchedulerDeps } from '../../src/services/CycleScheduler'
import { CycleReport } from '../../src/services/Orchestrator'
import { rejection } from '@elastic-supply/reasons'

const REPORT: CycleReport = {
  cycleId: 'c1',
  rebase: {
    epoch: 1,
    timestamp: 0,
    referenceIndex: 0n,
    exchangeRate: 0n,
    auxRate: 0n,
    targetRate: 0n,
    combinedRate: 0n,
    delta: 0n,
    suppressed: true,
    clamped: false,
    totalSupply: 0n,
  },
  calls: [],
}

function makeScheduler(deps: Partial<SchedulerDeps> = {}) {
  const calls: string[] = []
  const full: SchedulerDeps = {
    isRebaseDue: () => true,
    runCycle: async sender => {
      calls.push(sender)
      return REPORT
    },
    ...deps,
  }
  const scheduler = new CycleScheduler(full, { keeperId: 'keeper', pollMs: 1_000, clock: () => 123 })
  return { scheduler, calls }
}

describe('CycleScheduler', () => {
  test('does nothing while the policy is not due', async () => {
    const seen: number[] = []
    const { scheduler, calls } = makeScheduler({
      isRebaseDue: now => {
        seen.push(now)
        return false
      },
    })
    await expect(scheduler.tick()).resolves.toBeNull()
    expect(seen).toEqual([123])
    expect(calls).toEqual([])
  })

  test('runs a cycle as the keeper when due', async () => {
    const { scheduler, calls } = makeScheduler()
    await expect(scheduler.tick()).resolves.toBe(REPORT)
    expect(calls).toEqual(['keeper'])
  })

  test('a failed cycle is reported as null and the next tick tries again', async () => {
    let attempts = 0
    const { scheduler } = makeScheduler({
      runCycle: async () => {
        attempts += 1
        throw rejection('INPUT_ORACLE_DATA_INVALID')
      },
    })
    await expect(scheduler.tick()).resolves.toBeNull()
    await expect(scheduler.tick()).resolves.toBeNull()
    expect(attempts).toBe(2)
  })

  test('overlapping ticks do not start a second cycle', async () => {
    let release: () => void = () => undefined
    const gate = new Promise<void>(resolve => {
      release = resolve
    })
    let started = 0
    const { scheduler } = makeScheduler({
      runCycle: async () => {
        started += 1
        await gate
        return REPORT
      },
    })
    const first = scheduler.tick()
    await expect(scheduler.tick()).resolves.toBeNull()
    release()
    await expect(first).resolves.toBe(REPORT)
    expect(started).toBe(1)
  })

  test('start and stop manage the poll timer', () => {
    const { scheduler } = makeScheduler()
    scheduler.start()
    expect(scheduler.isRunning()).toBe(true)
    scheduler.stop()
    expect(scheduler.isRunning()).toBe(false)
  })
})
