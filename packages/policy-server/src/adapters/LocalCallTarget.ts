import { CallOutcome, CallRequest, CallTarget } from '../services/CallTargetRegistry'

export type LocalHandler = (request: CallRequest) => Promise<CallOutcome> | CallOutcome

/** In-process receiver; the handler decides the outcome and the gas it reports. */
export class LocalCallTarget implements CallTarget {
  public readonly received: CallRequest[] = []

  constructor(private readonly handler: LocalHandler) {}

  async invoke(request: CallRequest): Promise<CallOutcome> {
    this.received.push(request)
    return this.handler(request)
  }
}
