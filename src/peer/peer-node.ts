import type { Server } from 'http'
import type { Express } from 'express'
import type { Logger } from 'pino'
import { createPeerApp } from '../api/peer-routes'
import type { ClusterConfig } from '../config'
import { describeError } from '../errors'
import { MutexEngine } from '../mutex/mutex-engine'
import { InMemoryMetrics, obs } from '../observability'
import { HttpResourceClient } from '../resource/http-resource-client'
import type { ResourceClient } from '../resource/resource-client'
import { BaseService, type HealthStatus, type ServiceMetrics } from '../services/service'
import { HttpPeerTransport } from '../transport/http-transport'
import type { PeerTransport } from '../transport/peer-transport'
import type { MutexSnapshot, PeerRecord } from '../types'
import { AutoRequester } from './auto-requester'

export interface PeerNodeOptions {
  config: ClusterConfig
  /**
   * Overrides for tests; HTTP implementations otherwise
   */
  transport?: PeerTransport
  resource?: ResourceClient
  logger?: Logger
}

/**
 * PeerNode - One peer process: HTTP server, mutex engine and optional workload
 */
export class PeerNode extends BaseService<MutexSnapshot> {
  readonly engine: MutexEngine
  readonly app: Express
  readonly metrics = new InMemoryMetrics()
  private readonly logger: Logger
  private readonly self: PeerRecord
  private readonly requester: AutoRequester | null
  private requesterRun: Promise<void> | null = null
  private server: Server | null = null

  constructor(private readonly options: PeerNodeOptions) {
    super(`peer-${options.config.self}`)
    const { config } = options

    const peers: PeerRecord[] = config.peers.map(peer => ({ peerId: peer.id, endpoint: peer.endpoint }))
    const self = peers.find(peer => peer.peerId === config.self)
    if (!self) {
      throw new Error(`Peer ${config.self} is not part of the peer set`)
    }
    this.self = self
    this.logger = options.logger ?? obs.createChildLogger({ component: 'peer-node', peerId: config.self })

    this.engine = new MutexEngine({
      selfId: config.self,
      peers,
      transport: options.transport ?? new HttpPeerTransport({ timeoutMs: config.transport.timeoutMs }),
      resource:
        options.resource ??
        new HttpResourceClient({ endpoint: config.resource.endpoint, timeoutMs: config.resource.timeoutMs }),
      acquireTimeoutMs: config.mutex.acquireTimeoutMs,
      logger: this.logger.child({ component: 'mutex-engine' }),
      metrics: this.metrics,
    })

    this.app = createPeerApp(this.engine, this.logger, this)
    this.requester = config.workload.enabled
      ? new AutoRequester(this.engine, {
          minIntervalMs: config.workload.minIntervalMs,
          maxIntervalMs: config.workload.maxIntervalMs,
          documents: config.workload.documents,
          logger: this.logger.child({ component: 'auto-requester' }),
        })
      : null
  }

  protected async onStart(): Promise<void> {
    const url = new URL(this.self.endpoint)
    const port = Number(url.port || (url.protocol === 'https:' ? 443 : 80))

    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(port, () => resolve())
      server.once('error', reject)
      this.server = server
    })
    this.logger.info(
      { port, peers: this.options.config.peers.length, resource: this.options.config.resource.endpoint },
      'Peer listening'
    )

    if (this.requester) {
      this.requesterRun = this.requester.run().catch(error => {
        this.recordError()
        this.logger.error({ error: describeError(error) }, 'Workload stopped unexpectedly')
      })
    }
  }

  protected async onStop(): Promise<void> {
    this.requester?.stop()
    await this.engine.stop()
    await this.requesterRun

    const server = this.server
    this.server = null
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()))
      })
    }
    this.logger.info(this.engine.snapshot(), 'Peer stopped')
  }

  protected async onHealthCheck(): Promise<HealthStatus<MutexSnapshot>> {
    return {
      status: 'healthy',
      details: this.engine.snapshot(),
      timestamp: Date.now(),
    }
  }

  protected async onGetMetrics(): Promise<ServiceMetrics> {
    return {
      ...this.metrics.snapshot(),
      clock: this.engine.time,
      status: this.engine.status,
      workloadSubmitted: this.requester?.submitted,
      workloadFailed: this.requester?.failed,
    }
  }
}
