import { describe, it, expect } from 'vitest'
import request from 'supertest'
import pino from 'pino'
import { PrintService } from '../../resource/print-service'
import { ServiceLifecycle } from '../../services/service'

const logger = pino({ level: 'silent' })

function createService(delayMs = 0) {
  return new PrintService({ port: 0, minDelayMs: delayMs, maxDelayMs: delayMs, logger })
}

describe('PrintService', () => {
  it('prints a job and stamps the receipt after the job', async () => {
    const service = createService()

    const response = await request(service.app)
      .post('/print')
      .send({ peerId: 2, requestNumber: 1, timestamp: 7, content: 'Meeting Notes' })

    expect(response.status).toBe(200)
    expect(response.body).toEqual({ success: true, confirmation: 'Print completed for peer 2', timestamp: 9 })
    expect(service.stats()).toEqual({
      printCount: 1,
      overlapCount: 0,
      inProgress: 0,
      clock: 9,
      printed: [{ peerId: 2, requestNumber: 1, timestamp: 7, content: 'Meeting Notes', overlapped: false }],
    })
  })

  it('rejects invalid jobs', async () => {
    const service = createService()

    const response = await request(service.app)
      .post('/print')
      .send({ peerId: 2, requestNumber: 1, timestamp: 7, content: '' })

    expect(response.status).toBe(400)
    expect(response.body).toEqual({
      error: 'Invalid print job',
      code: 'VALIDATION_ERROR',
      details: ['content: String must contain at least 1 character(s)'],
    })
    expect(service.stats().printCount).toBe(0)
  })

  it('detects overlapping jobs', async () => {
    const service = createService(10)

    await Promise.all([
      service.print({ peerId: 1, requestNumber: 1, timestamp: 1, content: 'A' }),
      service.print({ peerId: 2, requestNumber: 1, timestamp: 1, content: 'B' }),
    ])

    const stats = service.stats()
    expect(stats.overlapCount).toBe(1)
    expect(stats.printed.map(doc => [doc.peerId, doc.overlapped])).toEqual([
      [1, false],
      [2, true],
    ])
  })

  it('serves stats over HTTP', async () => {
    const service = createService()
    await service.print({ peerId: 3, requestNumber: 2, timestamp: 4, content: 'Invoice' })

    const response = await request(service.app).get('/stats')

    expect(response.status).toBe(200)
    expect(response.body).toMatchObject({ printCount: 1, overlapCount: 0, inProgress: 0, clock: 6 })
  })

  it('is unhealthy until started', async () => {
    const service = createService()

    const response = await request(service.app).get('/health')

    expect(response.status).toBe(503)
    expect(response.body).toMatchObject({
      status: 'unhealthy',
      message: 'Service is not running (state: initial)',
    })
  })

  it('reports degraded health once an overlap was seen', async () => {
    const service = new PrintService({ port: 0, host: '127.0.0.1', minDelayMs: 5, maxDelayMs: 5, logger })
    await service.start()

    try {
      expect(service.state).toBe(ServiceLifecycle.RUNNING)
      await expect(service.getHealthStatus()).resolves.toMatchObject({ status: 'healthy' })

      await Promise.all([
        service.print({ peerId: 1, requestNumber: 1, timestamp: 1, content: 'A' }),
        service.print({ peerId: 2, requestNumber: 1, timestamp: 1, content: 'B' }),
      ])

      await expect(service.getHealthStatus()).resolves.toMatchObject({
        status: 'degraded',
        message: '1 overlapping jobs seen',
      })
      await expect(service.getMetrics()).resolves.toMatchObject({ printCount: 2, overlapCount: 1, state: 'running' })
    } finally {
      await service.stop()
    }
    expect(service.state).toBe(ServiceLifecycle.STOPPED)
  })
})
