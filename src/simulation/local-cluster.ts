import type { Logger } from 'pino'
import { MutexEngine } from '../mutex/mutex-engine'
import { InMemoryMetrics, obs } from '../observability'
import { InMemoryResource, type InMemoryResourceOptions } from '../resource/in-memory-resource'
import { LamportClock } from '../timing/lamport-clock'
import { InMemoryPeerNetwork, type InMemoryNetworkOptions } from '../transport/in-memory-network'
import type { PeerId, PeerRecord, WorkReceipt } from '../types'

export interface LocalClusterOptions {
  size: number
  network?: InMemoryNetworkOptions
  resource?: InMemoryResourceOptions
  acquireTimeoutMs?: number
  /**
   * Starting clock value per peer
   */
  initialClock?: (peerId: PeerId) => number
  logger?: Logger
}

/**
 * LocalCluster - N peers wired together on an in-memory network,
 * all sharing one in-memory resource
 */
export class LocalCluster {
  readonly network: InMemoryPeerNetwork
  readonly resource: InMemoryResource
  readonly peers: PeerRecord[]
  private readonly engines = new Map<PeerId, MutexEngine>()
  private readonly metricsByPeer = new Map<PeerId, InMemoryMetrics>()

  constructor(options: LocalClusterOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new Error(`Cluster size must be a positive integer, got ${options.size}`)
    }

    const logger = options.logger ?? obs.createChildLogger({ component: 'local-cluster' })
    this.network = new InMemoryPeerNetwork(options.network)
    this.resource = new InMemoryResource(options.resource)
    this.peers = Array.from({ length: options.size }, (_, index) => ({
      peerId: index + 1,
      endpoint: `memory://peer-${index + 1}`,
    }))

    for (const peer of this.peers) {
      const metrics = new InMemoryMetrics()
      const engine = new MutexEngine({
        selfId: peer.peerId,
        peers: this.peers,
        transport: this.network.transportFor(peer.peerId),
        resource: this.resource,
        clock: new LamportClock(options.initialClock?.(peer.peerId) ?? 0),
        acquireTimeoutMs: options.acquireTimeoutMs,
        logger: logger.child({ peerId: peer.peerId }),
        metrics,
      })
      this.network.attach(peer.peerId, engine)
      this.engines.set(peer.peerId, engine)
      this.metricsByPeer.set(peer.peerId, metrics)
    }
  }

  engine(peerId: PeerId): MutexEngine {
    const engine = this.engines.get(peerId)
    if (!engine) {
      throw new Error(`No peer ${peerId} in this cluster`)
    }
    return engine
  }

  metrics(peerId: PeerId): InMemoryMetrics {
    const metrics = this.metricsByPeer.get(peerId)
    if (!metrics) {
      throw new Error(`No peer ${peerId} in this cluster`)
    }
    return metrics
  }

  /**
   * Every peer prints `rounds` documents, all peers concurrently
   */
  async runRounds(rounds: number): Promise<PromiseSettledResult<WorkReceipt>[]> {
    const jobs = this.peers.flatMap(peer =>
      Array.from({ length: rounds }, (_, round) =>
        this.engine(peer.peerId).submit({ content: `Document ${round + 1} from peer ${peer.peerId}` })
      )
    )
    return Promise.allSettled(jobs)
  }

  async stop(): Promise<void> {
    await Promise.all([...this.engines.values()].map(engine => engine.stop()))
    this.network.clear()
  }
}
