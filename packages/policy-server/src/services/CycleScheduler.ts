/**
 * CycleScheduler
 * Optional keeper: polls the policy gates and runs a cycle once per open window. A failed cycle
 * is logged and left to the next poll, which re-checks the gates.
 */
import { getLogger } from '../utils/logger'
import { Clock } from '../host/AtomicHost'
import { CycleReport } from './Orchestrator'
import { toRejection } from './errors'

export interface SchedulerDeps {
  isRebaseDue(now: number): Promise<boolean> | boolean
  runCycle(sender: string): Promise<CycleReport>
}

export interface SchedulerOptions {
  keeperId: string
  pollMs: number
  clock: Clock
}

export class CycleScheduler {
  private timer: NodeJS.Timeout | null = null
  private running = false

  constructor(
    private readonly deps: SchedulerDeps,
    private readonly opts: SchedulerOptions,
  ) {}

  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => {
      this.tick().catch(err => getLogger().error({ event: 'scheduler.tick_error', error: String(err) }))
    }, this.opts.pollMs)
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer)
    this.timer = null
  }

  isRunning(): boolean {
    return this.timer !== null
  }

  /** One poll: runs a cycle when due and no cycle from this keeper is in flight. */
  async tick(): Promise<CycleReport | null> {
    if (this.running) return null
    this.running = true
    try {
      if (!(await this.deps.isRebaseDue(this.opts.clock()))) return null
      return await this.deps.runCycle(this.opts.keeperId)
    } catch (err) {
      const rejected = toRejection(err)
      getLogger().warn({ event: 'scheduler.cycle_failed', reason_code: rejected.code, message: rejected.message })
      return null
    } finally {
      this.running = false
    }
  }
}
