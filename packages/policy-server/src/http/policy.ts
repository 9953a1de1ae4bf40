/**
 * Policy routes: public state view and the owner-only parameter update.
 */
import { Request, Response } from 'express'
import { rejection } from '@elastic-supply/reasons'
import { Runtime } from '../services/runtime'
import { validatePolicyPatch } from '../validators/policyParams'
import { sendError } from './errors'
import { serializePolicy } from './serialize'

function policyView(runtime: Runtime) {
  return runtime.view(async () => serializePolicy(runtime.policy, await runtime.ledger.totalSupply(), runtime.host.now()))
}

export function getPolicy(runtime: Runtime) {
  return async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json(await policyView(runtime))
  }
}

export function patchPolicy(runtime: Runtime) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = validatePolicyPatch(req.body)
    if (!parsed.valid) {
      sendError(req, res, rejection('CLIENT_BAD_REQUEST', { message: parsed.error }))
      return
    }
    await runtime.asOwner(ctx => runtime.policy.updateParams(ctx, parsed.value))
    const body = await policyView(runtime)
    req.log?.info({ event: 'policy.updated', version: body.config.version })
    res.status(200).json(body)
  }
}
