import { describe, it, expect, afterEach } from 'vitest'
import request from 'supertest'
import pino from 'pino'
import { PeerNode } from '../../peer/peer-node'
import { validateConfig, type ClusterConfig } from '../../config'
import { InMemoryResource } from '../../resource/in-memory-resource'
import { ServiceLifecycle } from '../../services/service'
import { InMemoryPeerNetwork } from '../../transport/in-memory-network'
import { MutexStatus } from '../../types'

const logger = pino({ level: 'silent' })

function clusterConfig(self: number, overrides: Record<string, unknown> = {}): ClusterConfig {
  return validateConfig({
    self,
    peers: [
      { id: 1, endpoint: 'http://localhost:50052' },
      { id: 2, endpoint: 'http://localhost:50053' },
      { id: 3, endpoint: 'http://localhost:50054' },
    ],
    ...overrides,
  })
}

describe('PeerNode', () => {
  const nodes: PeerNode[] = []

  afterEach(async () => {
    await Promise.all(nodes.map(node => node.stop()))
    await Promise.all(nodes.map(node => node.engine.stop()))
    nodes.length = 0
  })

  function createNodes(network: InMemoryPeerNetwork, resource: InMemoryResource): PeerNode[] {
    for (const id of [1, 2, 3]) {
      const node = new PeerNode({ config: clusterConfig(id), transport: network.transportFor(id), resource, logger })
      network.attach(id, node.engine)
      nodes.push(node)
    }
    return nodes
  }

  it('prints through the engine and counts protocol metrics', async () => {
    const network = new InMemoryPeerNetwork()
    const resource = new InMemoryResource()
    const [first, second] = createNodes(network, resource)

    await Promise.all([
      first.engine.submit({ content: 'Report from 1' }),
      second.engine.submit({ content: 'Report from 2' }),
    ])

    expect(resource.maxConcurrent).toBe(1)
    expect(resource.history).toHaveLength(2)

    const metrics = await first.getMetrics()
    expect(metrics).toMatchObject({
      'mutex.requests': 1,
      'mutex.critical_sections': 1,
      status: MutexStatus.RELEASED,
      state: ServiceLifecycle.INITIAL,
    })
    expect(metrics.workloadSubmitted).toBeUndefined()
  })

  it('serves the peer protocol on its app', async () => {
    const network = new InMemoryPeerNetwork()
    const [first] = createNodes(network, new InMemoryResource())

    const response = await request(first.app).post('/mutex/request').send({ requesterId: 3, timestamp: 1 })

    expect(response.status).toBe(200)
    expect(response.body).toEqual({ granterId: 1, granted: true, timestamp: 3 })
  })

  it('reports unhealthy until started', async () => {
    const network = new InMemoryPeerNetwork()
    const [first] = createNodes(network, new InMemoryResource())

    const response = await request(first.app).get('/health')

    expect(response.status).toBe(503)
    expect(response.body).toMatchObject({
      peerId: 1,
      status: 'unhealthy',
      message: 'Service is not running (state: initial)',
    })
  })

  it('starts and stops with a workload attached', async () => {
    const node = new PeerNode({
      config: validateConfig({
        self: 1,
        peers: [{ id: 1, endpoint: 'http://localhost:0' }],
        workload: { enabled: true, minIntervalMs: 60_000, maxIntervalMs: 60_000 },
      }),
      resource: new InMemoryResource(),
      logger,
    })
    nodes.push(node)

    await node.start()
    expect(node.state).toBe(ServiceLifecycle.RUNNING)

    const health = await request(node.app).get('/health')
    expect(health.status).toBe(200)
    expect(health.body).toMatchObject({ peerId: 1, status: 'healthy', details: { status: 'released' } })
    await expect(node.getMetrics()).resolves.toMatchObject({ workloadSubmitted: 0, workloadFailed: 0 })

    await node.stop()
    expect(node.state).toBe(ServiceLifecycle.STOPPED)
  })

  it('refuses a config whose self is missing', () => {
    expect(() => clusterConfig(4)).toThrow('self 4 is not listed in peers')
  })
})
