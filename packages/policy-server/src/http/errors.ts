/**
 * Error responses. Every failure leaves the HTTP layer as an ErrorEnvelope.
 */
import { Request, Response, NextFunction, RequestHandler } from 'express'
import { ulid } from 'ulid'
import { ErrorEnvelope } from '@elastic-supply/dto'
import { ReasonedRejection, rejection } from '@elastic-supply/reasons'
import { toRejection } from '../services/errors'

export function sendError(req: Request, res: Response, rejected: ReasonedRejection): void {
  const envelope: ErrorEnvelope = {
    corr_id: req.corr_id ?? `corr_${ulid()}`,
    reason: rejected.reason,
    ts: new Date().toISOString(),
  }
  req.log?.warn({ event: 'http.rejected', path: req.path, reason_code: rejected.code })
  res.status(rejected.reason.http_status).json(envelope)
}

export function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next)
  }
}

export function notFound(req: Request, res: Response): void {
  sendError(req, res, rejection('CLIENT_NOT_FOUND', { context: { path: req.path } }))
}

// express recognises error middleware by its four parameters
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    sendError(req, res, rejection('CLIENT_BAD_REQUEST', { message: 'Malformed JSON body' }))
    return
  }
  sendError(req, res, toRejection(err))
}
