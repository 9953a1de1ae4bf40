import { Registry, Counter, Histogram, Gauge } from 'prom-client'
import type { Request, Response } from 'express'

let registry: Registry
let cycleCounter: Counter<string>
let downstreamCounter: Counter<string>
let cycleHistogram: Histogram<string>
let supplyGauge: Gauge<string>
let epochGauge: Gauge<string>

function initMetrics(reg?: Registry): void {
  registry = reg ?? new Registry()

  cycleCounter = new Counter({
    name: 'rebase_cycles_total',
    help: 'Rebase cycles by outcome and reason code',
    labelNames: ['outcome', 'reason'],
    registers: [registry],
  })

  downstreamCounter = new Counter({
    name: 'downstream_calls_total',
    help: 'Downstream notifications by outcome',
    labelNames: ['outcome'],
    registers: [registry],
  })

  cycleHistogram = new Histogram({
    name: 'cycle_duration_ms',
    help: 'Wall time of one cycle including queueing (ms)',
    labelNames: ['outcome'],
    buckets: [10, 50, 100, 200, 500, 1000, 5000],
    registers: [registry],
  })

  supplyGauge = new Gauge({
    name: 'supply_total',
    help: 'Ledger total supply after the last committed cycle',
    registers: [registry],
  })

  epochGauge = new Gauge({
    name: 'policy_epoch',
    help: 'Policy epoch after the last committed cycle',
    registers: [registry],
  })
}

// initialize default metrics on module load
initMetrics()

export function setRegistry(reg: Registry): void {
  initMetrics(reg)
}

export function getRegistry(): Registry {
  return registry
}

export function countCycle(outcome: string, reason = 'ok'): void {
  cycleCounter.labels({ outcome, reason }).inc()
}

export function countDownstreamCall(outcome: string): void {
  downstreamCounter.labels({ outcome }).inc()
}

export function observeCycle(outcome: string, ms: number): void {
  cycleHistogram.labels({ outcome }).observe(ms)
}

export function setSupply(supply: bigint): void {
  supplyGauge.set(Number(supply))
}

export function setEpoch(epoch: number): void {
  epochGauge.set(epoch)
}

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', registry.contentType)
  res.status(200).send(await registry.metrics())
}
