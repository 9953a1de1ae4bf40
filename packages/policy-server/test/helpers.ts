import { isReasonedRejection } from '@elastic-supply/reasons'
import { CallContext } from '../src/host/CallContext'
import { EventJournal } from '../src/host/EventJournal'
import { GasMeter } from '../src/host/GasMeter'

export const DAY = 86_400
export const WINDOW_OFFSET = 72_000

/** A timestamp `into` seconds after the rebase window of `day` opens (default schedule). */
export function windowTime(day: number, into = 0): number {
  return day * DAY + WINDOW_OFFSET + into
}

export function makeCtx(overrides: Partial<CallContext> = {}): CallContext {
  return {
    cycleId: 'test-cycle',
    sender: 'owner',
    origin: 'owner',
    direct: true,
    timestamp: windowTime(10),
    gas: new GasMeter(1_000_000n),
    journal: new EventJournal(),
    ...overrides,
  }
}

/** Runs `fn`, returning what it threw; fails the test if it returned normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('expected function to throw')
}

export function codeOf(err: unknown): string | undefined {
  return isReasonedRejection(err) ? err.code : undefined
}

export function contextOf(err: unknown): Record<string, string | number | boolean> | undefined {
  return isReasonedRejection(err) ? err.reason.context : undefined
}
