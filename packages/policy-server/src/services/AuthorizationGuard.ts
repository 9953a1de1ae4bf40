/**
 * AuthorizationGuard
 * Single-owner access control plus the direct-caller check used by the orchestrator.
 */
import { rejection } from '@elastic-supply/reasons'
import { CallContext } from '../host/CallContext'
import { Snapshotable } from '../host/AtomicHost'

/** Owner value after renouncement; no caller can match it. */
export const NO_OWNER = ''

export class Ownable implements Snapshotable<string> {
  private currentOwner: string

  constructor(owner: string) {
    this.currentOwner = owner
  }

  owner(): string {
    return this.currentOwner
  }

  isOwner(identity: string): boolean {
    return this.currentOwner !== NO_OWNER && identity === this.currentOwner
  }

  requireOwner(ctx: CallContext): void {
    if (!this.isOwner(ctx.sender)) {
      throw rejection('AUTH_NOT_OWNER', { context: { sender: ctx.sender } })
    }
  }

  transferOwnership(ctx: CallContext, newOwner: string): void {
    this.requireOwner(ctx)
    if (newOwner.trim() === NO_OWNER) {
      throw rejection('CONFIG_INVALID_PARAMETER', { message: 'New owner must be a non-empty identity', context: { parameter: 'owner' } })
    }
    this.setOwner(ctx, newOwner)
  }

  renounceOwnership(ctx: CallContext): void {
    this.requireOwner(ctx)
    this.setOwner(ctx, NO_OWNER)
  }

  snapshot(): string {
    return this.currentOwner
  }

  restore(state: string): void {
    this.currentOwner = state
  }

  private setOwner(ctx: CallContext, next: string): void {
    ctx.journal.record({ name: 'OwnershipTransferred', previousOwner: this.currentOwner, newOwner: next })
    this.currentOwner = next
  }
}

export function requireDirect(ctx: CallContext): void {
  if (!ctx.direct) {
    throw rejection('AUTH_INDIRECT_CALL_REJECTED', { context: { sender: ctx.sender, origin: ctx.origin } })
  }
}
