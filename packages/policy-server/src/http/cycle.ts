/**
 * POST /cycle
 *
 * Runs one rebase cycle as a direct caller. The caller identity comes from
 * `x-caller-id`; anything the cycle throws is rendered by the error handler.
 */
import { Request, Response } from 'express'
import { Runtime } from '../services/runtime'
import { serializeReport } from './serialize'

export const ANONYMOUS_CALLER = 'anonymous'

export function postCycle(runtime: Runtime) {
  return async (req: Request, res: Response): Promise<void> => {
    const sender = req.header('x-caller-id') || ANONYMOUS_CALLER
    const report = await runtime.runCycle(sender)
    res.status(200).json(serializeReport(report))
  }
}
