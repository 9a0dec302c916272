import { E_CANCELED, Mutex, type MutexInterface } from 'async-mutex'
import type { Logger } from 'pino'
import { v4 as uuidv4 } from 'uuid'
import {
  AcquireTimeoutError,
  EngineStoppedError,
  ProtocolViolation,
  ResourceError,
  TransportError,
  describeError,
} from '../errors'
import { obs, type Metrics } from '../observability'
import type { ResourceClient } from '../resource/resource-client'
import { LamportClock } from '../timing/lamport-clock'
import type { AccessResponder, PeerTransport } from '../transport/peer-transport'
import {
  MutexStatus,
  type AccessAck,
  type AccessReply,
  type AccessRequest,
  type ClockValue,
  type DeferredRequest,
  type MutexSnapshot,
  type PeerId,
  type PeerRecord,
  type ReleaseAck,
  type ReleaseNotice,
  type WorkItem,
  type WorkReceipt,
} from '../types'
import { PeerState } from './peer-state'

export interface MutexEngineOptions {
  selfId: PeerId
  /**
   * Full peer set, this peer included
   */
  peers: readonly PeerRecord[]
  transport: PeerTransport
  resource?: ResourceClient
  clock?: LamportClock
  /**
   * Abandon a request that has not collected every reply in time.
   * Unset means wait forever.
   */
  acquireTimeoutMs?: number
  logger?: Logger
  metrics?: Metrics
}

/**
 * Handed to the holder of the critical section
 */
export interface AccessGrant {
  roundId: string
  requestNumber: number
  timestamp: ClockValue
  waitedMs: number
}

interface ReplyWaiter {
  resolve: () => void
  reject: (error: Error) => void
}

/**
 * MutexEngine - Ricart-Agrawala mutual exclusion over Lamport clocks
 *
 * One engine per peer, acting both as initiator (acquire/release) and as
 * responder to the other peers (receiveRequest/receiveRelease).
 */
export class MutexEngine implements AccessResponder {
  readonly selfId: PeerId
  private readonly clock: LamportClock
  private readonly state: PeerState
  private readonly others: PeerRecord[]
  private readonly transport: PeerTransport
  private readonly resource?: ResourceClient
  private readonly acquireTimeoutMs?: number
  private readonly logger: Logger
  private readonly metrics: Metrics

  // Serializes local callers: one outstanding request per peer
  private readonly localQueue = new Mutex()
  private releaseLocal: MutexInterface.Releaser | null = null
  private waiter: ReplyWaiter | null = null
  private inflight = new Set<Promise<void>>()
  private stopped = false
  private requestsIssued = 0
  private criticalSectionsCompleted = 0

  constructor(options: MutexEngineOptions) {
    const { selfId, peers } = options
    if (!peers.some(peer => peer.peerId === selfId)) {
      throw new Error(`Peer ${selfId} is not part of the peer set`)
    }

    this.selfId = selfId
    this.clock = options.clock ?? new LamportClock()
    this.state = new PeerState(selfId, peers.map(peer => peer.peerId))
    this.others = peers.filter(peer => peer.peerId !== selfId)
    this.transport = options.transport
    this.resource = options.resource
    this.acquireTimeoutMs = options.acquireTimeoutMs
    this.logger = options.logger ?? obs.createChildLogger({ component: 'mutex-engine', peerId: selfId })
    this.metrics = options.metrics ?? obs.metrics
  }

  get status(): MutexStatus {
    return this.state.status
  }

  get time(): ClockValue {
    return this.clock.get()
  }

  /**
   * Enter the critical section. Resolves once every other peer has replied.
   */
  async acquire(): Promise<AccessGrant> {
    if (this.stopped) {
      throw new EngineStoppedError(`Peer ${this.selfId} is stopped`)
    }

    let releaseLocal: MutexInterface.Releaser
    try {
      releaseLocal = await this.localQueue.acquire()
    } catch (error) {
      if (error === E_CANCELED) {
        throw new EngineStoppedError(`Peer ${this.selfId} stopped while queued for access`)
      }
      throw error
    }

    const startedAt = Date.now()
    const roundId = uuidv4()
    const requestNumber = ++this.requestsIssued
    const timestamp = this.clock.stamp()
    const request: AccessRequest = { requesterId: this.selfId, timestamp }

    this.state.beginRequest(timestamp)
    this.metrics.increment('mutex.requests')
    this.logger.info(
      { roundId, requestNumber, timestamp, awaiting: this.state.pendingReplyCount },
      'Requesting critical section'
    )

    const replies = this.awaitReplies()
    for (const peer of this.others) {
      this.track(this.sendRequest(peer, request))
    }

    try {
      await this.withDeadline(replies, timestamp)
    } catch (error) {
      // Replies may have completed between the rejection and this handler
      if (this.state.status !== MutexStatus.RELEASED) {
        this.waiter = null
        const drained = this.state.release()
        this.logger.warn({ roundId, timestamp, error: describeError(error) }, 'Abandoning access request')
        releaseLocal()
        await this.answerDeferred(drained)
      } else {
        releaseLocal()
      }
      throw error
    }

    this.releaseLocal = releaseLocal
    const waitedMs = Date.now() - startedAt
    this.metrics.timing('mutex.wait_ms', waitedMs)
    this.logger.info({ roundId, requestNumber, timestamp, waitedMs }, 'Entered critical section')

    return { roundId, requestNumber, timestamp, waitedMs }
  }

  /**
   * Leave the critical section and answer every deferred requester
   */
  async release(): Promise<void> {
    if (this.state.status !== MutexStatus.HELD) {
      throw new Error(`Peer ${this.selfId} cannot release while ${this.state.status}`)
    }

    const drained = this.state.release()
    this.criticalSectionsCompleted++
    this.metrics.increment('mutex.critical_sections')
    this.logger.info(
      { clock: this.clock.get(), deferred: drained.map(d => d.requesterId) },
      'Released critical section'
    )

    const releaseLocal = this.releaseLocal
    this.releaseLocal = null
    releaseLocal?.()

    await this.answerDeferred(drained)
  }

  /**
   * Run `work` inside the critical section; always releases afterwards
   */
  async withAccess<T>(work: (grant: AccessGrant) => Promise<T>): Promise<T> {
    const grant = await this.acquire()
    try {
      return await work(grant)
    } finally {
      await this.release()
    }
  }

  /**
   * Submit one work item to the protected resource under mutual exclusion.
   * A failing resource still releases; the failure goes back to this caller only.
   */
  async submit(item: WorkItem): Promise<WorkReceipt> {
    const resource = this.resource
    if (!resource) {
      throw new Error(`Peer ${this.selfId} has no resource client configured`)
    }

    return this.withAccess(async grant => {
      const job = {
        peerId: this.selfId,
        requestNumber: grant.requestNumber,
        timestamp: this.clock.stamp(),
        content: item.content,
      }
      this.logger.info({ requestNumber: job.requestNumber, content: job.content }, 'Sending work to resource')

      try {
        const receipt = await resource.submitWork(job)
        this.clock.observe(receipt.timestamp)
        this.logger.info({ confirmation: receipt.confirmation }, 'Resource confirmed work')
        return receipt
      } catch (error) {
        this.metrics.increment('mutex.resource_failures')
        this.logger.error({ error: describeError(error) }, 'Resource failed; releasing anyway')
        if (error instanceof ResourceError) throw error
        throw new ResourceError(`Resource failed: ${describeError(error)}`, { cause: error })
      }
    })
  }

  /**
   * Inbound AccessRequest from another peer
   */
  receiveRequest(request: AccessRequest): AccessAck {
    const { requesterId, timestamp } = request
    if (!this.state.isKnownPeer(requesterId)) {
      this.metrics.increment('mutex.protocol_violations')
      throw new ProtocolViolation(`Access request from unknown peer ${requesterId}`, { peerId: requesterId })
    }

    this.clock.observe(timestamp)

    if (this.state.shouldGrant(request)) {
      this.metrics.increment('mutex.grants')
      this.logger.debug({ requesterId, timestamp }, 'Granted access')
      return { granterId: this.selfId, granted: true, timestamp: this.clock.stamp() }
    }

    this.state.defer(request)
    this.metrics.increment('mutex.deferrals')
    this.logger.info(
      { requesterId, timestamp, ownTimestamp: this.state.requestTimestamp, status: this.state.status },
      'Deferred access request'
    )
    return { granterId: this.selfId, granted: false, timestamp: this.clock.stamp() }
  }

  /**
   * Count one reply toward the outstanding request; the last one moves WANTED → HELD
   */
  receiveReply(reply: AccessReply): void {
    let complete: boolean
    try {
      complete = this.state.recordReply(reply)
    } catch (error) {
      if (error instanceof ProtocolViolation) {
        this.metrics.increment('mutex.protocol_violations')
      }
      throw error
    }

    this.logger.debug(
      { granterId: reply.granterId, pending: this.state.pendingReplyCount },
      'Received reply'
    )

    if (complete) {
      this.state.enterHeld()
      const waiter = this.waiter
      this.waiter = null
      waiter?.resolve()
    }
  }

  /**
   * Inbound deferred reply from a peer that just left its critical section
   */
  receiveRelease(notice: ReleaseNotice): ReleaseAck {
    this.receiveReply({ granterId: notice.releaserId, requestTimestamp: notice.requestTimestamp })
    this.clock.observe(notice.timestamp)
    return { acknowledged: true, timestamp: this.clock.stamp() }
  }

  snapshot(): MutexSnapshot {
    return {
      peerId: this.selfId,
      clock: this.clock.get(),
      ...this.state.snapshot(),
      requestsIssued: this.requestsIssued,
      criticalSectionsCompleted: this.criticalSectionsCompleted,
    }
  }

  /**
   * Stop taking part. A pending acquire rejects and its request is abandoned.
   */
  async stop(): Promise<void> {
    if (this.stopped) return
    this.stopped = true
    this.localQueue.cancel()

    const waiter = this.waiter
    this.waiter = null
    waiter?.reject(new EngineStoppedError(`Peer ${this.selfId} stopped while waiting for replies`))

    await Promise.allSettled([...this.inflight])
  }

  private awaitReplies(): Promise<void> {
    if (this.state.pendingReplyCount === 0) {
      this.state.enterHeld()
      return Promise.resolve()
    }
    return new Promise<void>((resolve, reject) => {
      this.waiter = { resolve, reject }
    })
  }

  private async withDeadline(replies: Promise<void>, timestamp: ClockValue): Promise<void> {
    const timeoutMs = this.acquireTimeoutMs
    if (timeoutMs === undefined) {
      return replies
    }

    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new AcquireTimeoutError(
            `Request ${timestamp} of peer ${this.selfId} still waiting on ${this.state.pendingReplyCount} replies after ${timeoutMs}ms`,
            { awaiting: this.state.snapshot().awaitingReplyFrom }
          )
        )
      }, timeoutMs)
    })

    try {
      await Promise.race([replies, deadline])
    } finally {
      clearTimeout(timer)
    }
  }

  private async sendRequest(peer: PeerRecord, request: AccessRequest): Promise<void> {
    try {
      const ack = await this.transport.requestAccess(peer, request)
      if (ack.granterId !== peer.peerId) {
        this.metrics.increment('mutex.protocol_violations')
        throw new ProtocolViolation(`Peer ${peer.peerId} answered as peer ${ack.granterId}`, {
          peerId: peer.peerId,
        })
      }

      this.clock.observe(ack.timestamp)
      if (ack.granted) {
        this.receiveReply({ granterId: ack.granterId, requestTimestamp: request.timestamp })
      } else {
        this.logger.debug({ peerId: peer.peerId }, 'Peer deferred our request')
      }
    } catch (error) {
      if (error instanceof ProtocolViolation) {
        this.logger.warn({ peerId: peer.peerId, error: error.message }, 'Ignored protocol violation')
        return
      }
      this.metrics.increment('mutex.transport_errors')
      const transportError =
        error instanceof TransportError
          ? error
          : new TransportError(`Request to peer ${peer.peerId} failed: ${describeError(error)}`, {
              peerId: peer.peerId,
              cause: error,
            })
      this.logger.error(
        { peerId: peer.peerId, timestamp: request.timestamp, error: transportError.message },
        'Access request not delivered; reply stays outstanding'
      )
    }
  }

  private async answerDeferred(drained: DeferredRequest[]): Promise<void> {
    const sends = drained.map(async deferred => {
      const peer = this.others.find(p => p.peerId === deferred.requesterId)
      if (!peer) return

      const notice: ReleaseNotice = {
        releaserId: this.selfId,
        requestTimestamp: deferred.timestamp,
        timestamp: this.clock.stamp(),
      }
      try {
        const ack = await this.transport.releaseAccess(peer, notice)
        this.clock.observe(ack.timestamp)
        this.logger.debug({ peerId: peer.peerId }, 'Granted deferred request')
      } catch (error) {
        // An abandoned request on the other side refuses its late reply
        if (error instanceof ProtocolViolation) {
          this.metrics.increment('mutex.protocol_violations')
          this.logger.warn({ peerId: peer.peerId, error: error.message }, 'Deferred reply rejected')
          return
        }
        this.metrics.increment('mutex.transport_errors')
        this.logger.error(
          { peerId: peer.peerId, error: describeError(error) },
          'Deferred reply not delivered'
        )
      }
    })

    const all = Promise.all(sends).then(() => undefined)
    this.track(all)
    await all
  }

  private track(operation: Promise<void>): void {
    this.inflight.add(operation)
    void operation.finally(() => {
      this.inflight.delete(operation)
    })
  }
}
