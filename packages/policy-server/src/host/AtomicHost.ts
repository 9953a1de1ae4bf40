/**
 * AtomicHost
 * Runs every state-mutating invocation as one unit of work:
 *  1. invocations are queued and executed one at a time
 *  2. every registered participant is snapshotted before the unit starts
 *  3. on any failure all participants are restored and journaled events are dropped
 *  4. on success journaled events are published on `events` and logged
 *  5. a unit may not start another unit; views queue behind in-flight units
 */
import { AsyncLocalStorage } from 'async_hooks'
import { EventEmitter } from 'events'
import { ulid } from 'ulid'
import { rejection } from '@elastic-supply/reasons'
import { CallContext } from './CallContext'
import { EventJournal, PolicyEvent } from './EventJournal'
import { GasMeter } from './GasMeter'
import { logEvent } from '../utils/logger'

export interface Snapshotable<S> {
  snapshot(): S
  restore(state: S): void
}

export type Clock = () => number

export const systemClock: Clock = () => Math.floor(Date.now() / 1000)

export interface Invocation {
  sender: string
  gasLimit?: bigint
  /** Overrides the host clock for this unit (unix seconds). */
  timestamp?: number
}

export interface AtomicHostOptions {
  clock?: Clock
  defaultGasLimit?: bigint
}

type Restorer = () => void

export class AtomicHost {
  public readonly events = new EventEmitter()
  private readonly clock: Clock
  private readonly defaultGasLimit: bigint
  private readonly participants: Array<() => Restorer> = []
  private tail: Promise<void> = Promise.resolve()
  // cycle id of the unit whose async call chain we are in
  private readonly active = new AsyncLocalStorage<string>()

  constructor(opts: AtomicHostOptions = {}) {
    this.clock = opts.clock ?? systemClock
    this.defaultGasLimit = opts.defaultGasLimit ?? 30_000_000n
  }

  register<S>(participant: Snapshotable<S>): this {
    this.participants.push(() => {
      const state = participant.snapshot()
      return () => participant.restore(state)
    })
    return this
  }

  now(): number {
    return this.clock()
  }

  execute<T>(invocation: Invocation, fn: (ctx: CallContext) => Promise<T> | T): Promise<T> {
    const cycleId = this.active.getStore()
    if (cycleId !== undefined) {
      // the caller would wait on the queue slot it is holding
      return Promise.reject(
        rejection('AUTH_INDIRECT_CALL_REJECTED', { message: 'Re-entrant call into a running unit', context: { cycleId, sender: invocation.sender } }),
      )
    }
    return this.enqueue(() => this.runUnit(invocation, fn))
  }

  /**
   * Runs a view over committed state. Outside a unit it waits for in-flight units to settle;
   * inside one it runs inline and sees that unit's own writes.
   */
  read<T>(fn: () => Promise<T> | T): Promise<T> {
    if (this.active.getStore() !== undefined) return Promise.resolve().then(fn)
    return this.enqueue(fn)
  }

  private enqueue<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(fn)
    // the queue only tracks completion; the outcome reaches the caller through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  private async runUnit<T>(invocation: Invocation, fn: (ctx: CallContext) => Promise<T> | T): Promise<T> {
    const restorers = this.participants.map(capture => capture())
    const ctx: CallContext = {
      cycleId: ulid(),
      sender: invocation.sender,
      origin: invocation.sender,
      direct: true,
      timestamp: invocation.timestamp ?? this.clock(),
      gas: new GasMeter(invocation.gasLimit ?? this.defaultGasLimit),
      journal: new EventJournal(),
    }

    let result: T
    try {
      result = await this.active.run(ctx.cycleId, () => fn(ctx))
    } catch (err) {
      for (const restore of restorers.reverse()) restore()
      ctx.journal.drain()
      throw err
    }

    for (const event of ctx.journal.drain()) this.publish(ctx.cycleId, event)
    return result
  }

  private publish(cycleId: string, event: PolicyEvent): void {
    logEvent(cycleId, event)
    this.events.emit(event.name, event)
    this.events.emit('event', event)
  }
}
