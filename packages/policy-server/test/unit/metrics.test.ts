import { Registry } from 'prom-client'
import * as metrics from '../../src/utils/metrics'

describe('metrics wrapper', () => {
  let reg: Registry

  beforeEach(() => {
    reg = new Registry()
    metrics.setRegistry(reg)
  })

  async function metric(name: string) {
    const all = await reg.getMetricsAsJSON()
    const found = all.find(m => m.name === name)
    if (!found) throw new Error(`metric ${name} not registered`)
    return found
  }

  test('cycle counter labels outcome and reason', async () => {
    metrics.countCycle('COMMITTED')
    metrics.countCycle('ROLLED_BACK', 'GATING_REBASE_TOO_SOON')
    metrics.countCycle('ROLLED_BACK', 'GATING_REBASE_TOO_SOON')
    const values = (await metric('rebase_cycles_total')).values
    expect(values.find(s => s.labels.outcome === 'COMMITTED')?.labels.reason).toBe('ok')
    expect(values.find(s => s.labels.reason === 'GATING_REBASE_TOO_SOON')?.value).toBe(2)
  })

  test('downstream counter by outcome', async () => {
    metrics.countDownstreamCall('tolerated')
    const sample = (await metric('downstream_calls_total')).values.find(s => s.labels.outcome === 'tolerated')
    expect(sample?.value).toBe(1)
  })

  test('supply and epoch gauges', async () => {
    metrics.setSupply(5_000n)
    metrics.setEpoch(12)
    expect((await metric('supply_total')).values[0].value).toBe(5_000)
    expect((await metric('policy_epoch')).values[0].value).toBe(12)
  })

  test('cycle histogram records a sample', async () => {
    metrics.observeCycle('COMMITTED', 120)
    const count = (await metric('cycle_duration_ms')).values.find(
      s => s.labels.le === '+Inf' && s.labels.outcome === 'COMMITTED',
    )
    expect(count?.value).toBe(1)
  })

  test('getRegistry returns the active registry', () => {
    expect(metrics.getRegistry()).toBe(reg)
  })
})
