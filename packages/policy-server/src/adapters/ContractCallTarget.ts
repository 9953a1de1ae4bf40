/**
 * ContractCallTarget
 * Dry-runs a notification against a contract with `eth_call`, using the record's budget as the
 * gas limit. Reverts come back as failures with their raw data.
 */
import { isAddress, isError, Provider } from 'ethers'
import { CallOutcome, CallRequest, CallTarget, TargetResolver } from '../services/CallTargetRegistry'

export class ContractCallTarget implements CallTarget {
  constructor(
    private readonly address: string,
    private readonly provider: Pick<Provider, 'call'>,
    private readonly from?: string,
  ) {}

  async invoke(request: CallRequest): Promise<CallOutcome> {
    try {
      const data = await this.provider.call({
        to: this.address,
        from: this.from,
        data: request.payload,
        gasLimit: request.budget,
      })
      // eth_call reports no usage; charge the full allowance
      return { ok: true, data, gasUsed: request.budget }
    } catch (err) {
      if (isError(err, 'CALL_EXCEPTION')) {
        return { ok: false, raw: err.data ?? '0x', gasUsed: request.budget }
      }
      throw err
    }
  }
}

/** Resolves any address destination to a contract target on `provider`. */
export function contractTargetResolver(provider: Pick<Provider, 'call'>, from?: string): TargetResolver {
  return destination => (isAddress(destination) ? new ContractCallTarget(destination, provider, from) : null)
}
