import { Ownable, requireDirect, NO_OWNER } from '../../src/services/AuthorizationGuard'
import { codeOf, contextOf, makeCtx, thrownBy } from '../helpers'

describe('Ownable', () => {
  test('only the owner passes requireOwner', () => {
    const ownable = new Ownable('owner')
    expect(() => ownable.requireOwner(makeCtx({ sender: 'owner' }))).not.toThrow()
    const err = thrownBy(() => ownable.requireOwner(makeCtx({ sender: 'mallory' })))
    expect(codeOf(err)).toBe('AUTH_NOT_OWNER')
    expect(contextOf(err)).toEqual({ sender: 'mallory' })
  })

  test('transferOwnership hands over control and journals the change', () => {
    const ownable = new Ownable('owner')
    const ctx = makeCtx({ sender: 'owner' })
    ownable.transferOwnership(ctx, 'next')

    expect(ownable.owner()).toBe('next')
    expect(ctx.journal.drain()).toEqual([{ name: 'OwnershipTransferred', previousOwner: 'owner', newOwner: 'next' }])
    expect(codeOf(thrownBy(() => ownable.requireOwner(makeCtx({ sender: 'owner' }))))).toBe('AUTH_NOT_OWNER')
  })

  test('transferOwnership rejects an empty identity', () => {
    const ownable = new Ownable('owner')
    expect(codeOf(thrownBy(() => ownable.transferOwnership(makeCtx(), '  ')))).toBe('CONFIG_INVALID_PARAMETER')
    expect(ownable.owner()).toBe('owner')
  })

  test('non-owners cannot transfer', () => {
    const ownable = new Ownable('owner')
    expect(codeOf(thrownBy(() => ownable.transferOwnership(makeCtx({ sender: 'mallory' }), 'mallory')))).toBe('AUTH_NOT_OWNER')
  })

  test('renounceOwnership leaves no caller able to act as owner', () => {
    const ownable = new Ownable('owner')
    ownable.renounceOwnership(makeCtx())
    expect(ownable.owner()).toBe(NO_OWNER)
    expect(ownable.isOwner('')).toBe(false)
    expect(codeOf(thrownBy(() => ownable.requireOwner(makeCtx({ sender: '' }))))).toBe('AUTH_NOT_OWNER')
  })

  test('snapshot and restore round the owner back', () => {
    const ownable = new Ownable('owner')
    const saved = ownable.snapshot()
    ownable.transferOwnership(makeCtx(), 'next')
    ownable.restore(saved)
    expect(ownable.owner()).toBe('owner')
  })
})

describe('requireDirect', () => {
  test('accepts the entry call and rejects nested ones', () => {
    expect(() => requireDirect(makeCtx({ direct: true }))).not.toThrow()
    const err = thrownBy(() => requireDirect(makeCtx({ direct: false, sender: 'contract', origin: 'alice' })))
    expect(codeOf(err)).toBe('AUTH_INDIRECT_CALL_REJECTED')
    expect(contextOf(err)).toEqual({ sender: 'contract', origin: 'alice' })
  })
})
