import { describe, it, expect } from 'vitest'
import { BaseService, ServiceLifecycle, type HealthStatus, type ServiceMetrics } from '../../services/service'

interface QueueDetails {
  queued: number
}

class QueueService extends BaseService<QueueDetails> {
  failStart = false
  stopCalls = 0

  constructor() {
    super('queue')
  }

  protected async onStart(): Promise<void> {
    await new Promise(resolve => setTimeout(resolve, 5))
    if (this.failStart) {
      throw new Error('port in use')
    }
  }

  protected async onStop(): Promise<void> {
    this.stopCalls++
  }

  protected async onHealthCheck(): Promise<HealthStatus<QueueDetails>> {
    return { status: 'healthy', details: { queued: 2 }, timestamp: 0 }
  }

  protected async onGetMetrics(): Promise<ServiceMetrics> {
    return { queued: 2 }
  }
}

describe('BaseService', () => {
  it('runs start then stop, ignoring repeats', async () => {
    const service = new QueueService()

    await service.start()
    await service.start()
    expect(service.state).toBe(ServiceLifecycle.RUNNING)

    await service.stop()
    await service.stop()
    expect(service.state).toBe(ServiceLifecycle.STOPPED)
    expect(service.stopCalls).toBe(1)
  })

  it('does nothing when stopped before starting', async () => {
    const service = new QueueService()

    await service.stop()

    expect(service.state).toBe(ServiceLifecycle.INITIAL)
    expect(service.stopCalls).toBe(0)
  })

  it('refuses to stop while starting', async () => {
    const service = new QueueService()

    const starting = service.start()
    await expect(service.stop()).rejects.toThrow('Service queue is starting')
    await starting

    expect(service.state).toBe(ServiceLifecycle.RUNNING)
  })

  it('enters ERROR and counts the failure when start fails', async () => {
    const service = new QueueService()
    service.failStart = true

    await expect(service.start()).rejects.toThrow('port in use')

    expect(service.state).toBe(ServiceLifecycle.ERROR)
    await expect(service.getMetrics()).resolves.toEqual({ uptimeMs: 0, errorCount: 1, state: 'error', queued: 2 })
  })

  it('reports subclass health only while running', async () => {
    const service = new QueueService()

    await expect(service.getHealthStatus()).resolves.toMatchObject({
      status: 'unhealthy',
      message: 'Service is not running (state: initial)',
    })

    await service.start()
    await expect(service.getHealthStatus()).resolves.toEqual({
      status: 'healthy',
      details: { queued: 2 },
      timestamp: 0,
    })
  })
})
