/**
 * HTTP router for policy-server
 * Exposes `createApp()` to allow tests to mount the app without starting a server.
 */
import express from 'express'
import corr from './middleware/corr'
import { adminAuth } from './middleware/adminAuth'
import { asyncHandler, errorHandler, notFound } from './errors'
import { getPolicy, patchPolicy } from './policy'
import { postCycle } from './cycle'
import { deleteTransaction, getTransactions, patchTransaction, postTransaction } from './transactions'
import { Runtime } from '../services/runtime'
import { metricsHandler } from '../utils/metrics'
import { logHttp } from '../utils/logger'

export interface AppOptions {
  adminApiKey: string
}

export function createApp(runtime: Runtime, opts: AppOptions) {
  const app = express()
  app.use(express.json())
  app.use(corr)

  app.use((req, res, next) => {
    const start = Date.now()
    res.on('finish', () => {
      logHttp({ path: req.path, method: req.method, status: res.statusCode, corr_id: req.corr_id, latency_ms: Date.now() - start })
    })
    next()
  })

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' })
  })
  app.get('/policy', asyncHandler(getPolicy(runtime)))
  app.get('/transactions', asyncHandler(getTransactions(runtime)))
  app.post('/cycle', asyncHandler(postCycle(runtime)))
  app.get('/metrics', asyncHandler(metricsHandler))

  const admin = express.Router()
  admin.use(adminAuth(opts.adminApiKey))
  admin.post('/transactions', asyncHandler(postTransaction(runtime)))
  admin.patch('/transactions/:index', asyncHandler(patchTransaction(runtime)))
  admin.delete('/transactions/:index', asyncHandler(deleteTransaction(runtime)))
  admin.patch('/policy', asyncHandler(patchPolicy(runtime)))
  app.use('/admin', admin)

  app.use(notFound)
  app.use(errorHandler)

  return app
}

export default createApp
