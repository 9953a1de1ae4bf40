/**
 * Events produced inside a unit of work. They are buffered here and only published by the host
 * once the unit commits; a rollback drops them with the rest of the state.
 */

export type LogRebaseEvent = {
  name: 'LogRebase'
  epoch: number
  exchangeRate: bigint
  refIndex: bigint
  auxRate: bigint
  requestedSupplyAdjustment: bigint
  timestamp: number
}

export type TransactionFailedEvent = {
  name: 'TransactionFailed'
  destination: string
  index: number
  payload: string
  message: string
}

export type OwnershipTransferredEvent = {
  name: 'OwnershipTransferred'
  previousOwner: string
  newOwner: string
}

export type PolicyEvent = LogRebaseEvent | TransactionFailedEvent | OwnershipTransferredEvent

export class EventJournal {
  private entries: PolicyEvent[] = []

  record(event: PolicyEvent): void {
    this.entries.push(event)
  }

  get size(): number {
    return this.entries.length
  }

  /** Returns the buffered events in record order and empties the journal. */
  drain(): PolicyEvent[] {
    const out = this.entries
    this.entries = []
    return out
  }
}
