import { rejection } from '@elastic-supply/reasons'

/**
 * GasMeter
 * Compute allowance for one unit of work. Downstream calls are charged against it; the orchestrator
 * checks `remaining()` before each call instead of trusting the caller's total.
 */
export class GasMeter {
  private used = 0n

  constructor(public readonly limit: bigint) {
    if (limit < 0n) throw new RangeError('gas limit must be non-negative')
  }

  remaining(): bigint {
    return this.limit - this.used
  }

  consumed(): bigint {
    return this.used
  }

  consume(amount: bigint): void {
    if (amount < 0n) throw new RangeError('gas amount must be non-negative')
    if (amount > this.remaining()) {
      throw rejection('DOWNSTREAM_INSUFFICIENT_BUDGET', {
        context: { requested: amount.toString(), remaining: this.remaining().toString() },
      })
    }
    this.used += amount
  }
}
