/**
 * CallTargetRegistry
 * Resolves transaction destinations to in-process or remote call targets. Every way a call can
 * go wrong is reduced to a Failure carrying raw revert-style data, so the orchestrator has a
 * single classification path.
 */
import { isError, isHexString } from 'ethers'
import { CallContext } from '../host/CallContext'
import { encodeErrorPayload } from './FailureClassifier'

export const TARGET_NOT_FOUND_MESSAGE = 'call target not found'

export type CallOutcome =
  | { ok: true; data: string; gasUsed: bigint }
  | { ok: false; raw: string; gasUsed: bigint }

export interface CallRequest {
  payload: string
  budget: bigint
  ctx: CallContext
}

export interface CallTarget {
  invoke(request: CallRequest): Promise<CallOutcome>
}

function revertData(err: unknown): string | null {
  if (isError(err, 'CALL_EXCEPTION') && typeof err.data === 'string' && isHexString(err.data)) return err.data
  return null
}

function errorMessage(err: unknown): string {
  if (isError(err, 'CALL_EXCEPTION') && err.reason) return err.reason
  return err instanceof Error ? err.message : String(err)
}

/** Supplies a target for a destination nobody registered; null leaves it unresolved. */
export type TargetResolver = (destination: string) => CallTarget | null

export class CallTargetRegistry {
  private readonly targets = new Map<string, CallTarget>()

  constructor(private readonly resolve: TargetResolver = () => null) {}

  register(destination: string, target: CallTarget): this {
    this.targets.set(destination.toLowerCase(), target)
    return this
  }

  unregister(destination: string): boolean {
    return this.targets.delete(destination.toLowerCase())
  }

  has(destination: string): boolean {
    return this.targets.has(destination.toLowerCase())
  }

  async dispatch(destination: string, request: CallRequest): Promise<CallOutcome> {
    const target = this.lookup(destination)
    if (!target) return { ok: false, raw: encodeErrorPayload(TARGET_NOT_FOUND_MESSAGE), gasUsed: 0n }

    let outcome: CallOutcome
    try {
      outcome = await target.invoke(request)
    } catch (err) {
      return { ok: false, raw: revertData(err) ?? encodeErrorPayload(errorMessage(err)), gasUsed: 0n }
    }

    // exceeding the allowance is indistinguishable from running out of it
    if (outcome.gasUsed > request.budget) return { ok: false, raw: '0x', gasUsed: request.budget }
    if (outcome.gasUsed < 0n) return { ...outcome, gasUsed: 0n }
    return outcome
  }

  private lookup(destination: string): CallTarget | null {
    const known = this.targets.get(destination.toLowerCase())
    if (known) return known
    const resolved = this.resolve(destination)
    if (resolved) this.register(destination, resolved)
    return resolved
  }
}
