/**
 * Peer API - HTTP face of the responder side of the protocol
 */

import express, { type Express, type Router } from 'express'
import type { Logger } from 'pino'
import type { z } from 'zod'
import type { MutexEngine } from '../mutex/mutex-engine'
import { AccessRequestSchema, ReleaseNoticeSchema, formatIssues } from '../schemas/protocol'
import { ApiError, createErrorHandler } from './error-handler'

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body)
  if (!result.success) {
    throw new ApiError(400, 'Invalid request body', 'VALIDATION_ERROR', formatIssues(result.error))
  }
  return result.data
}

export function createPeerRouter(engine: MutexEngine): Router {
  const router = express.Router()

  router.post('/mutex/request', (req, res) => {
    const request = parseBody(AccessRequestSchema, req.body)
    res.json(engine.receiveRequest(request))
  })

  router.post('/mutex/release', (req, res) => {
    const notice = parseBody(ReleaseNoticeSchema, req.body)
    res.json(engine.receiveRelease(notice))
  })

  router.get('/mutex/status', (req, res) => {
    res.json(engine.snapshot())
  })

  return router
}

export interface HealthReporter {
  getHealthStatus(): Promise<{ status: string }>
}

/**
 * Express app for one peer: protocol routes plus /health
 */
export function createPeerApp(engine: MutexEngine, logger: Logger, health?: HealthReporter): Express {
  const app = express()
  app.use(express.json())
  app.use(createPeerRouter(engine))

  app.get('/health', async (req, res, next) => {
    try {
      const status = health ? await health.getHealthStatus() : { status: 'healthy' }
      res.status(status.status === 'unhealthy' ? 503 : 200).json({ peerId: engine.selfId, ...status })
    } catch (error) {
      next(error)
    }
  })

  app.use(createErrorHandler(logger))
  return app
}
