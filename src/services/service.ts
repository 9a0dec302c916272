/**
 * Lifecycle base for the two long-running processes: a peer node and the print service.
 * Subclasses describe their health with their own details (engine snapshot, print stats).
 */

export enum ServiceLifecycle {
  INITIAL = 'initial',
  STARTING = 'starting',
  RUNNING = 'running',
  STOPPING = 'stopping',
  STOPPED = 'stopped',
  ERROR = 'error',
}

export interface HealthStatus<TDetails> {
  status: 'healthy' | 'degraded' | 'unhealthy'
  message?: string
  details?: TDetails
  timestamp: number
}

export type ServiceMetrics = Record<string, number | string | boolean | undefined>

export abstract class BaseService<TDetails> {
  private _state = ServiceLifecycle.INITIAL
  private startedAt: number | null = null
  private errorCount = 0

  constructor(readonly name: string) {}

  get state(): ServiceLifecycle {
    return this._state
  }

  /**
   * Starting a running service does nothing
   */
  async start(): Promise<void> {
    if (this._state === ServiceLifecycle.RUNNING) return
    this.assertSettled()
    await this.transition(ServiceLifecycle.STARTING, () => this.onStart(), ServiceLifecycle.RUNNING)
    this.startedAt = Date.now()
  }

  /**
   * Stopping a service that never started, or already stopped, does nothing
   */
  async stop(): Promise<void> {
    if (this._state === ServiceLifecycle.INITIAL || this._state === ServiceLifecycle.STOPPED) return
    this.assertSettled()
    await this.transition(ServiceLifecycle.STOPPING, () => this.onStop(), ServiceLifecycle.STOPPED)
  }

  async getHealthStatus(): Promise<HealthStatus<TDetails>> {
    if (this._state !== ServiceLifecycle.RUNNING) {
      return {
        status: 'unhealthy',
        message: `Service is not running (state: ${this._state})`,
        timestamp: Date.now(),
      }
    }
    return this.onHealthCheck()
  }

  async getMetrics(): Promise<ServiceMetrics> {
    return {
      uptimeMs: this.startedAt === null ? 0 : Date.now() - this.startedAt,
      errorCount: this.errorCount,
      state: this._state,
      ...(await this.onGetMetrics()),
    }
  }

  protected recordError(): void {
    this.errorCount++
  }

  private assertSettled(): void {
    if (this._state === ServiceLifecycle.STARTING || this._state === ServiceLifecycle.STOPPING) {
      throw new Error(`Service ${this.name} is ${this._state}`)
    }
  }

  private async transition(
    during: ServiceLifecycle,
    action: () => Promise<void>,
    after: ServiceLifecycle
  ): Promise<void> {
    this._state = during
    try {
      await action()
      this._state = after
    } catch (error) {
      this._state = ServiceLifecycle.ERROR
      this.recordError()
      throw error
    }
  }

  protected abstract onStart(): Promise<void>
  protected abstract onStop(): Promise<void>
  protected abstract onHealthCheck(): Promise<HealthStatus<TDetails>>
  protected abstract onGetMetrics(): Promise<ServiceMetrics>
}
