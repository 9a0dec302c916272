/**
 * Print Service - The protected resource
 *
 * Takes no part in mutual exclusion: it prints whatever it is sent and confirms.
 * It does notice when two jobs are in progress at once and reports it under /stats.
 */

import type { Server } from 'http'
import express, { type Express } from 'express'
import type { Logger } from 'pino'
import { createErrorHandler, ApiError } from '../api/error-handler'
import { obs } from '../observability'
import { ResourceJobSchema, formatIssues } from '../schemas/protocol'
import { BaseService, type HealthStatus, type ServiceMetrics } from '../services/service'
import { LamportClock } from '../timing/lamport-clock'
import type { PeerId, ResourceJob, WorkReceipt } from '../types'

export interface PrintServiceOptions {
  port: number
  host?: string
  minDelayMs: number
  maxDelayMs: number
  random?: () => number
  logger?: Logger
}

export interface PrintedDocument {
  peerId: PeerId
  requestNumber: number
  timestamp: number
  content: string
  overlapped: boolean
}

export interface PrintStats {
  printCount: number
  overlapCount: number
  inProgress: number
  clock: number
  printed: PrintedDocument[]
}

export interface PrintHealthDetails {
  printCount: number
  overlapCount: number
  inProgress: number
}

export class PrintService extends BaseService<PrintHealthDetails> {
  readonly app: Express
  private server: Server | null = null
  private readonly clock = new LamportClock()
  private readonly logger: Logger
  private readonly random: () => number
  private readonly printed: PrintedDocument[] = []
  private inProgress = 0
  private overlapCount = 0

  constructor(private readonly options: PrintServiceOptions) {
    super('print-service')
    this.logger = options.logger ?? obs.createChildLogger({ component: 'print-service' })
    this.random = options.random ?? Math.random
    this.app = this.createApp()
  }

  /**
   * Print one job; resolves after the simulated print delay
   */
  async print(job: ResourceJob): Promise<WorkReceipt> {
    this.clock.observe(job.timestamp)

    const overlapped = this.inProgress > 0
    if (overlapped) {
      this.overlapCount++
      this.logger.error(
        { peerId: job.peerId, requestNumber: job.requestNumber, inProgress: this.inProgress },
        'Overlapping print job: mutual exclusion was violated'
      )
    }

    const { minDelayMs, maxDelayMs } = this.options
    const delay = minDelayMs + (maxDelayMs - minDelayMs) * this.random()

    this.inProgress++
    this.logger.info(
      { peerId: job.peerId, requestNumber: job.requestNumber, timestamp: job.timestamp, delayMs: Math.round(delay) },
      `Printing: ${job.content}`
    )

    try {
      await new Promise(resolve => setTimeout(resolve, delay))
    } finally {
      this.inProgress--
    }

    this.printed.push({
      peerId: job.peerId,
      requestNumber: job.requestNumber,
      timestamp: job.timestamp,
      content: job.content,
      overlapped,
    })
    this.logger.info({ printCount: this.printed.length }, 'Print completed')

    return {
      success: true,
      confirmation: `Print completed for peer ${job.peerId}`,
      timestamp: this.clock.tick(),
    }
  }

  stats(): PrintStats {
    return {
      printCount: this.printed.length,
      overlapCount: this.overlapCount,
      inProgress: this.inProgress,
      clock: this.clock.get(),
      printed: [...this.printed],
    }
  }

  protected async onStart(): Promise<void> {
    const { port, host = '0.0.0.0' } = this.options
    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(port, host, () => resolve())
      server.once('error', reject)
      this.server = server
    })
    this.logger.info({ port }, 'Print service listening')
  }

  protected async onStop(): Promise<void> {
    const server = this.server
    this.server = null
    if (!server) return
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()))
    })
    this.logger.info('Print service stopped')
  }

  protected async onHealthCheck(): Promise<HealthStatus<PrintHealthDetails>> {
    return {
      status: this.overlapCount > 0 ? 'degraded' : 'healthy',
      message: this.overlapCount > 0 ? `${this.overlapCount} overlapping jobs seen` : undefined,
      details: { printCount: this.printed.length, overlapCount: this.overlapCount, inProgress: this.inProgress },
      timestamp: Date.now(),
    }
  }

  protected async onGetMetrics(): Promise<ServiceMetrics> {
    return {
      printCount: this.printed.length,
      overlapCount: this.overlapCount,
      inProgress: this.inProgress,
    }
  }

  private createApp(): Express {
    const app = express()
    app.use(express.json())

    app.post('/print', async (req, res, next) => {
      try {
        const parsed = ResourceJobSchema.safeParse(req.body)
        if (!parsed.success) {
          throw new ApiError(400, 'Invalid print job', 'VALIDATION_ERROR', formatIssues(parsed.error))
        }
        res.json(await this.print(parsed.data))
      } catch (error) {
        next(error)
      }
    })

    app.get('/stats', (req, res) => {
      res.json(this.stats())
    })

    app.get('/health', async (req, res, next) => {
      try {
        const health = await this.getHealthStatus()
        res.status(health.status === 'unhealthy' ? 503 : 200).json(health)
      } catch (error) {
        next(error)
      }
    })

    app.use(createErrorHandler(this.logger))
    return app
  }
}
