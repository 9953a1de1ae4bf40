/**
 * policy-server public surface.
 */
export * from './host/AtomicHost'
export * from './host/CallContext'
export * from './host/EventJournal'
export * from './host/GasMeter'
export * from './services/AuthorizationGuard'
export * from './services/CallTargetRegistry'
export * from './services/CycleScheduler'
export * from './services/FailureClassifier'
export * from './services/Ledger'
export * from './services/OracleAdapter'
export * from './services/Orchestrator'
export * from './services/PolicyEngine'
export * from './services/TransactionList'
export * from './services/errors'
export * from './services/runtime'
export * from './services/supplyDelta'
export * from './adapters/ContractCallTarget'
export * from './adapters/ContractOracle'
export * from './adapters/LocalCallTarget'
export * from './adapters/StaticOracle'
export { createApp } from './http'
