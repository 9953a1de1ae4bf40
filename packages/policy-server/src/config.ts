// src/config.ts

/**
 * Centralized configuration module for environment variables.
 */

import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'
import { rejection } from '@elastic-supply/reasons'
import { PolicySettings, validatePolicySettings } from './validators/policyParams'

// Resolve package root for both ts-node (src) and built (dist/...) layouts
const distMarker = `${path.sep}dist${path.sep}`
const distIdx = __dirname.lastIndexOf(distMarker)
const packageRoot = distIdx !== -1 ? __dirname.slice(0, distIdx) : path.resolve(__dirname, '..')

// Try to load .env.policy-server from package root, with cwd fallback
const candidateEnvPaths = [
  path.join(packageRoot, '.env.policy-server'),
  path.join(process.cwd(), '.env.policy-server'),
]
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p })
    break
  }
}

export const ENV = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: process.env.PORT ? Number(process.env.PORT) : 3000,
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  // JSON-RPC endpoint for contract-backed oracles and call targets; empty runs fully in-process
  RPC_URL: process.env.RPC_URL || '',
  REFERENCE_INDEX_ORACLE: process.env.REFERENCE_INDEX_ORACLE || '',
  MARKET_ORACLE: process.env.MARKET_ORACLE || '',
  AUX_ORACLE: process.env.AUX_ORACLE || '',

  // Identities
  OWNER_ID: process.env.OWNER_ID || 'owner',
  ORCHESTRATOR_ID: process.env.ORCHESTRATOR_ID || 'orchestrator',
  KEEPER_ID: process.env.KEEPER_ID || 'keeper',
  // Empty disables every /admin route
  ADMIN_API_KEY: process.env.ADMIN_API_KEY || '',

  // Ledger and policy (fixed-point values are 18-decimal strings)
  INITIAL_SUPPLY: process.env.INITIAL_SUPPLY || '50000000000000000',
  BASE_REFERENCE_INDEX: process.env.BASE_REFERENCE_INDEX || '1',
  DEVIATION_THRESHOLD: process.env.DEVIATION_THRESHOLD || '0.05',
  REBASE_LAG: process.env.REBASE_LAG || '30',
  MIN_REBASE_INTERVAL_SEC: process.env.MIN_REBASE_INTERVAL_SEC || '86400',
  REBASE_WINDOW_OFFSET_SEC: process.env.REBASE_WINDOW_OFFSET_SEC || '72000',
  REBASE_WINDOW_LENGTH_SEC: process.env.REBASE_WINDOW_LENGTH_SEC || '900',
  AUX_WEIGHT: process.env.AUX_WEIGHT || '0',

  CYCLE_GAS_LIMIT: process.env.CYCLE_GAS_LIMIT || '30000000',
  SCHEDULER_ENABLED: process.env.SCHEDULER_ENABLED === '1' || process.env.SCHEDULER_ENABLED === 'true',
  SCHEDULER_POLL_MS: process.env.SCHEDULER_POLL_MS ? Number(process.env.SCHEDULER_POLL_MS) : 60_000,
}

export type Env = typeof ENV

/** Parses the policy and cycle-budget section of the environment; throws CONFIG_INVALID_PARAMETER on bad input. */
export function loadPolicySettings(env: Env = ENV): PolicySettings {
  const res = validatePolicySettings({
    initialSupply: env.INITIAL_SUPPLY,
    baseReferenceIndex: env.BASE_REFERENCE_INDEX,
    deviationThreshold: env.DEVIATION_THRESHOLD,
    rebaseLag: env.REBASE_LAG,
    minRebaseInterval: env.MIN_REBASE_INTERVAL_SEC,
    rebaseWindowOffset: env.REBASE_WINDOW_OFFSET_SEC,
    rebaseWindowLength: env.REBASE_WINDOW_LENGTH_SEC,
    auxWeight: env.AUX_WEIGHT,
    orchestrator: env.ORCHESTRATOR_ID,
    cycleGasLimit: env.CYCLE_GAS_LIMIT,
  })
  if (!res.valid) {
    throw rejection('CONFIG_INVALID_PARAMETER', { message: `Invalid policy settings: ${res.error}`, context: { source: 'env' } })
  }
  return res.value
}
