/**
 * Admin routes act as the configured owner, so they are gated on a shared API key.
 * An empty configured key disables them entirely.
 */
import { Request, Response, NextFunction, RequestHandler } from 'express'
import { rejection } from '@elastic-supply/reasons'
import { sendError } from '../errors'

export function adminAuth(apiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const presented = req.header('x-api-key') || ''
    if (apiKey === '' || presented !== apiKey) {
      sendError(req, res, rejection('AUTH_NOT_OWNER', { message: 'Admin API key missing or invalid' }))
      return
    }
    next()
  }
}
