/**
 * OracleAdapter
 * Reads the three market inputs of a rebase, always in the same order, and normalises them.
 * A missing handle or an invalid reading fails the cycle; out-of-range rates are clamped.
 */
import { isUint256, minUint, MAX_RATE, MAX_AUX_RATE } from '@elastic-supply/math'
import { isReasonedRejection, rejection } from '@elastic-supply/reasons'

export type OracleSource = 'referenceIndex' | 'exchangeRate' | 'auxRate'

export const ORACLE_SOURCES: readonly OracleSource[] = ['referenceIndex', 'exchangeRate', 'auxRate']

export interface OracleReading {
  value: bigint
  valid: boolean
}

export interface Oracle {
  getReading(): Promise<OracleReading>
}

export type OracleHandles = Record<OracleSource, Oracle | null>

export interface OracleInputs {
  referenceIndex: bigint
  exchangeRate: bigint
  auxRate: bigint
}

export class OracleAdapter {
  private handles: OracleHandles

  constructor(handles: Partial<OracleHandles> = {}) {
    this.handles = {
      referenceIndex: handles.referenceIndex ?? null,
      exchangeRate: handles.exchangeRate ?? null,
      auxRate: handles.auxRate ?? null,
    }
  }

  setHandle(source: OracleSource, oracle: Oracle | null): void {
    this.handles = { ...this.handles, [source]: oracle }
  }

  getHandles(): OracleHandles {
    return { ...this.handles }
  }

  replaceHandles(handles: OracleHandles): void {
    this.handles = { ...handles }
  }

  isConfigured(source: OracleSource): boolean {
    return this.handles[source] !== null
  }

  async readAll(): Promise<OracleInputs> {
    const referenceIndex = await this.read('referenceIndex')
    const exchangeRate = minUint(await this.read('exchangeRate'), MAX_RATE)
    const auxRate = minUint(await this.read('auxRate'), MAX_AUX_RATE)
    return { referenceIndex, exchangeRate, auxRate }
  }

  private async read(source: OracleSource): Promise<bigint> {
    const oracle = this.handles[source]
    if (!oracle) {
      throw rejection('INPUT_ORACLE_NOT_CONFIGURED', { message: `Oracle not configured: ${source}`, context: { source } })
    }

    let reading: OracleReading
    try {
      reading = await oracle.getReading()
    } catch (err) {
      if (isReasonedRejection(err)) throw err
      const error = err instanceof Error ? err.message : String(err)
      throw rejection('INPUT_ORACLE_DATA_INVALID', { message: `Oracle data invalid: ${source}`, context: { source, error } })
    }

    if (!reading.valid || !isUint256(reading.value)) {
      throw rejection('INPUT_ORACLE_DATA_INVALID', { message: `Oracle data invalid: ${source}`, context: { source } })
    }
    return reading.value
  }
}
