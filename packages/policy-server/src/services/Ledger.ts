import { MAX_SUPPLY, absInt, addUint, subUint, toUint256Safe } from '@elastic-supply/math'
import { Snapshotable } from '../host/AtomicHost'

/** Supply ledger driven by the policy engine. */
export interface Ledger {
  totalSupply(): Promise<bigint>
  /** Applies `delta` for `epoch` and returns the resulting total supply. */
  rebase(epoch: number, delta: bigint): Promise<bigint>
}

export interface LedgerSnapshot {
  supply: bigint
  lastEpoch: number
}

/**
 * In-process ledger. Expansion saturates at MAX_SUPPLY; contraction goes through checked
 * subtraction and fails rather than going below zero.
 */
export class InMemoryLedger implements Ledger, Snapshotable<LedgerSnapshot> {
  private supply: bigint
  private lastEpoch = 0

  constructor(initialSupply: bigint) {
    this.supply = toUint256Safe(initialSupply)
  }

  async totalSupply(): Promise<bigint> {
    return this.supply
  }

  epoch(): number {
    return this.lastEpoch
  }

  async rebase(epoch: number, delta: bigint): Promise<bigint> {
    this.lastEpoch = epoch
    if (delta === 0n) return this.supply

    if (delta < 0n) this.supply = subUint(this.supply, absInt(delta))
    else this.supply = addUint(this.supply, delta)

    if (this.supply > MAX_SUPPLY) this.supply = MAX_SUPPLY
    return this.supply
  }

  snapshot(): LedgerSnapshot {
    return { supply: this.supply, lastEpoch: this.lastEpoch }
  }

  restore(state: LedgerSnapshot): void {
    this.supply = state.supply
    this.lastEpoch = state.lastEpoch
  }
}
