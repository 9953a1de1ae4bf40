import { Oracle, OracleReading } from '../services/OracleAdapter'

/** Settable in-memory feed for local runs and tests. */
export class StaticOracle implements Oracle {
  private reading: OracleReading

  constructor(value: bigint, valid = true) {
    this.reading = { value, valid }
  }

  set(value: bigint, valid = true): void {
    this.reading = { value, valid }
  }

  invalidate(): void {
    this.reading = { ...this.reading, valid: false }
  }

  async getReading(): Promise<OracleReading> {
    return { ...this.reading }
  }
}
