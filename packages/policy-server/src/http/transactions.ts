/**
 * Transaction-list routes. Reads are public; mutations are mounted under /admin.
 */
import { Request, Response } from 'express'
import { rejection } from '@elastic-supply/reasons'
import { Runtime } from '../services/runtime'
import { IndexParamSchema, SetEnabledSchema, validateNewTransaction } from '../validators/transaction'
import { sendError } from './errors'
import { serializeTransaction } from './serialize'

function listBody(runtime: Runtime) {
  return runtime.view(() => ({ transactions: runtime.orchestrator.listTransactions().map(serializeTransaction) }))
}

function parseIndex(req: Request, res: Response): number | null {
  const parsed = IndexParamSchema.safeParse(req.params.index)
  if (!parsed.success) {
    sendError(req, res, rejection('CLIENT_BAD_REQUEST', { message: 'index must be a non-negative integer' }))
    return null
  }
  return parsed.data
}

export function getTransactions(runtime: Runtime) {
  return async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json(await listBody(runtime))
  }
}

export function postTransaction(runtime: Runtime) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = validateNewTransaction(req.body)
    if (!parsed.valid) {
      sendError(req, res, rejection('CLIENT_BAD_REQUEST', { message: parsed.error }))
      return
    }
    const index = await runtime.asOwner(ctx => runtime.orchestrator.addTransaction(ctx, parsed.value))
    req.log?.info({ event: 'transactions.appended', index, destination: parsed.value.destination })
    res.status(201).json({ index, ...(await listBody(runtime)) })
  }
}

export function patchTransaction(runtime: Runtime) {
  return async (req: Request, res: Response): Promise<void> => {
    const index = parseIndex(req, res)
    if (index === null) return
    const parsed = SetEnabledSchema.safeParse(req.body)
    if (!parsed.success) {
      sendError(req, res, rejection('CLIENT_BAD_REQUEST', { message: 'body must be {"enabled": boolean}' }))
      return
    }
    await runtime.asOwner(ctx => runtime.orchestrator.setTransactionEnabled(ctx, index, parsed.data.enabled))
    res.status(200).json(await listBody(runtime))
  }
}

export function deleteTransaction(runtime: Runtime) {
  return async (req: Request, res: Response): Promise<void> => {
    const index = parseIndex(req, res)
    if (index === null) return
    await runtime.asOwner(ctx => runtime.orchestrator.removeTransaction(ctx, index))
    req.log?.info({ event: 'transactions.removed', index })
    res.status(200).json(await listBody(runtime))
  }
}
