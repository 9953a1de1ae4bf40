/**
 * TransactionList
 * Ordered downstream notifications run after each rebase. Indices are positional only:
 * `remove` moves the last record into the freed slot.
 */
import { isHexString } from 'ethers'
import { isUint256 } from '@elastic-supply/math'
import { rejection } from '@elastic-supply/reasons'
import { Snapshotable } from '../host/AtomicHost'

export interface TransactionRecord {
  enabled: boolean
  destination: string
  /** hex-encoded call data */
  payload: string
  computeBudget: bigint
  /** keccak256 failure codes tolerated for this record, as the owner supplied them */
  approvedFailureCodes: Set<string>
}

export interface NewTransaction {
  destination: string
  payload: string
  computeBudget: bigint
  approvedFailureCodes?: Iterable<string>
  enabled?: boolean
}

function copyRecord(record: TransactionRecord): TransactionRecord {
  return { ...record, approvedFailureCodes: new Set(record.approvedFailureCodes) }
}

function invalid(parameter: string, message: string): Error {
  return rejection('CONFIG_INVALID_PARAMETER', { message, context: { parameter } })
}

/** Hex comparison; codes are stored with the caller's casing. */
export function isApprovedFailure(record: TransactionRecord, code: string): boolean {
  const wanted = code.toLowerCase()
  for (const approved of record.approvedFailureCodes) {
    if (approved.toLowerCase() === wanted) return true
  }
  return false
}

export class TransactionList implements Snapshotable<TransactionRecord[]> {
  private records: TransactionRecord[] = []

  append(tx: NewTransaction): number {
    if (tx.destination.trim() === '') throw invalid('destination', 'destination must be non-empty')
    if (!isHexString(tx.payload)) throw invalid('payload', 'payload must be hex encoded')
    if (!isUint256(tx.computeBudget)) throw invalid('computeBudget', 'computeBudget must be a uint256')

    const codes = new Set<string>()
    for (const code of tx.approvedFailureCodes ?? []) {
      if (!isHexString(code, 32)) throw invalid('approvedFailureCodes', `failure code must be 32 bytes of hex: ${code}`)
      codes.add(code)
    }

    this.records.push({
      enabled: tx.enabled ?? true,
      destination: tx.destination,
      payload: tx.payload,
      computeBudget: tx.computeBudget,
      approvedFailureCodes: codes,
    })
    return this.records.length - 1
  }

  remove(index: number): void {
    this.checkIndex(index)
    const last = this.records.length - 1
    if (index !== last) this.records[index] = this.records[last]
    this.records.pop()
  }

  setEnabled(index: number, enabled: boolean): void {
    const record = this.checkIndex(index)
    record.enabled = enabled
  }

  size(): number {
    return this.records.length
  }

  get(index: number): TransactionRecord {
    return copyRecord(this.checkIndex(index))
  }

  list(): TransactionRecord[] {
    return this.records.map(copyRecord)
  }

  snapshot(): TransactionRecord[] {
    return this.list()
  }

  restore(state: TransactionRecord[]): void {
    this.records = state.map(copyRecord)
  }

  private checkIndex(index: number): TransactionRecord {
    const record = Number.isInteger(index) ? this.records[index] : undefined
    if (!record) {
      throw rejection('CONFIG_INDEX_OUT_OF_RANGE', { context: { index, size: this.records.length } })
    }
    return record
  }
}
