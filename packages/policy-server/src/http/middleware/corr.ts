/**
 * corr middleware
 *
 * Enforces a stable correlation id for every request. If the incoming
 * request provides `x-corr-id` that value is used; otherwise a ULID-based
 * correlation id is generated. The id is attached as `req.corr_id` and a
 * request-scoped child logger as `req.log`.
 */
import { Request, Response, NextFunction } from 'express'
import pino from 'pino'
import { ulid } from 'ulid'
import { getLogger } from '../../utils/logger'

declare global {
  namespace Express {
    interface Request {
      corr_id?: string
      log?: pino.Logger
    }
  }
}

export default function corr(req: Request, _res: Response, next: NextFunction): void {
  const header = req.header('x-corr-id') || ''
  const corr_id = header.length ? header : `corr_${ulid()}`
  req.corr_id = corr_id
  req.log = getLogger().child({ corr_id })
  next()
}
