/**
 * ContractOracle
 * Reads a median-style feed contract exposing `getData() returns (uint256, bool)` over JSON-RPC.
 */
import { Contract, ContractRunner } from 'ethers'
import { Oracle, OracleReading } from '../services/OracleAdapter'

export const FEED_ABI = ['function getData() view returns (uint256, bool)']

export class ContractOracle implements Oracle {
  private readonly contract: Contract

  constructor(readonly address: string, runner: ContractRunner) {
    this.contract = new Contract(address, FEED_ABI, runner)
  }

  async getReading(): Promise<OracleReading> {
    const result: unknown = await this.contract.getFunction('getData').staticCall()
    if (!Array.isArray(result)) throw new Error(`unexpected getData result from ${this.address}`)
    const [value, valid]: unknown[] = [...result]
    if (typeof value !== 'bigint' || typeof valid !== 'boolean') {
      throw new Error(`unexpected getData result from ${this.address}`)
    }
    return { value, valid }
  }
}
