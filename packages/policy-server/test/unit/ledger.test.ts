import { ArithmeticError, MAX_SUPPLY, ONE } from '@elastic-supply/math'
import { InMemoryLedger } from '../../src/services/Ledger'

describe('InMemoryLedger', () => {
  test('applies signed deltas and records the epoch', async () => {
    const ledger = new InMemoryLedger(100n * ONE)
    await expect(ledger.rebase(1, 5n * ONE)).resolves.toBe(105n * ONE)
    await expect(ledger.rebase(2, -10n * ONE)).resolves.toBe(95n * ONE)
    expect(ledger.epoch()).toBe(2)
  })

  test('a zero delta still advances the epoch', async () => {
    const ledger = new InMemoryLedger(ONE)
    await expect(ledger.rebase(7, 0n)).resolves.toBe(ONE)
    expect(ledger.epoch()).toBe(7)
  })

  test('expansion saturates at the supply ceiling', async () => {
    const ledger = new InMemoryLedger(MAX_SUPPLY - 1n)
    await expect(ledger.rebase(1, 5n)).resolves.toBe(MAX_SUPPLY)
  })

  test('contraction below zero is an arithmetic failure', async () => {
    const ledger = new InMemoryLedger(ONE)
    await expect(ledger.rebase(1, -2n * ONE)).rejects.toBeInstanceOf(ArithmeticError)
  })

  test('snapshot and restore', async () => {
    const ledger = new InMemoryLedger(ONE)
    const saved = ledger.snapshot()
    await ledger.rebase(3, ONE)
    ledger.restore(saved)
    await expect(ledger.totalSupply()).resolves.toBe(ONE)
    expect(ledger.epoch()).toBe(0)
  })
})
