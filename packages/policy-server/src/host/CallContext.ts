import { GasMeter } from './GasMeter'
import { EventJournal } from './EventJournal'

/**
 * CallContext
 * Everything an operation may know about who invoked it and within which unit of work.
 *  - sender: the immediate caller identity
 *  - origin: the identity that opened the unit of work
 *  - direct: true only for the entry point of the unit; every nested call carries false
 *  - timestamp: unix seconds, fixed for the whole unit
 */
export interface CallContext {
  readonly cycleId: string
  readonly sender: string
  readonly origin: string
  readonly direct: boolean
  readonly timestamp: number
  readonly gas: GasMeter
  readonly journal: EventJournal
}

/** Context for a call made from inside the current unit, on behalf of `sender`. */
export function nested(ctx: CallContext, sender: string): CallContext {
  return { ...ctx, sender, direct: false }
}
