import { ProtocolViolation } from '../errors'
import {
  MutexStatus,
  type AccessReply,
  type AccessRequest,
  type ClockValue,
  type DeferredRequest,
  type PeerId,
} from '../types'

/**
 * Position of a request in the total order used to resolve contention
 */
export interface RequestPriority {
  timestamp: ClockValue
  peerId: PeerId
}

/**
 * True when `a` must enter the critical section before `b`:
 * lower timestamp wins, equal timestamps fall back to the lower peer id.
 */
export function precedes(a: RequestPriority, b: RequestPriority): boolean {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp < b.timestamp
  }
  return a.peerId < b.peerId
}

export interface PeerStateSnapshot {
  status: MutexStatus
  requestTimestamp: ClockValue | null
  pendingReplyCount: number
  awaitingReplyFrom: PeerId[]
  deferredRequesters: PeerId[]
}

/**
 * PeerState - Mutual-exclusion bookkeeping for one peer
 *
 * Every method is one complete transition. Callers never see a half-applied
 * update because each runs synchronously on the event loop.
 */
export class PeerState {
  private _status: MutexStatus = MutexStatus.RELEASED
  private _requestTimestamp: ClockValue | null = null
  private awaiting = new Set<PeerId>()
  private deferred = new Map<PeerId, ClockValue>()
  private readonly others: ReadonlySet<PeerId>

  constructor(
    readonly selfId: PeerId,
    peerIds: Iterable<PeerId>
  ) {
    this.others = new Set([...peerIds].filter(id => id !== selfId))
  }

  get status(): MutexStatus {
    return this._status
  }

  get requestTimestamp(): ClockValue | null {
    return this._requestTimestamp
  }

  get pendingReplyCount(): number {
    return this.awaiting.size
  }

  get peerCount(): number {
    return this.others.size + 1
  }

  /**
   * Known peer other than this one
   */
  isKnownPeer(peerId: PeerId): boolean {
    return this.others.has(peerId)
  }

  /**
   * RELEASED → WANTED
   */
  beginRequest(timestamp: ClockValue): void {
    if (this._status !== MutexStatus.RELEASED) {
      throw new Error(`Cannot request access while ${this._status}`)
    }
    this._status = MutexStatus.WANTED
    this._requestTimestamp = timestamp
    this.awaiting = new Set(this.others)
  }

  /**
   * Whether an inbound request is answered now rather than on release
   */
  shouldGrant(request: AccessRequest): boolean {
    if (this._status === MutexStatus.RELEASED || this._requestTimestamp === null) {
      return true
    }
    return precedes(
      { timestamp: request.timestamp, peerId: request.requesterId },
      { timestamp: this._requestTimestamp, peerId: this.selfId }
    )
  }

  defer(request: AccessRequest): void {
    if (this._status === MutexStatus.RELEASED) {
      throw new Error('Cannot defer a request while released')
    }
    this.deferred.set(request.requesterId, request.timestamp)
  }

  /**
   * Count one reply toward the outstanding request.
   *
   * @returns true when it was the last reply still awaited
   * @throws ProtocolViolation without changing any state
   */
  recordReply(reply: AccessReply): boolean {
    const from = reply.granterId
    if (!this.isKnownPeer(from)) {
      throw new ProtocolViolation(`Reply from unknown peer ${from}`, { peerId: from })
    }
    if (this._status !== MutexStatus.WANTED) {
      throw new ProtocolViolation(`Reply from peer ${from} with no outstanding request (${this._status})`, {
        peerId: from,
      })
    }
    if (reply.requestTimestamp !== this._requestTimestamp) {
      throw new ProtocolViolation(
        `Stale reply from peer ${from}: answers ${reply.requestTimestamp}, outstanding ${this._requestTimestamp}`,
        { peerId: from }
      )
    }
    if (!this.awaiting.has(from)) {
      throw new ProtocolViolation(`Duplicate reply from peer ${from}`, { peerId: from })
    }

    this.awaiting.delete(from)
    return this.awaiting.size === 0
  }

  /**
   * WANTED → HELD, only once every peer has replied
   */
  enterHeld(): void {
    if (this._status !== MutexStatus.WANTED || this.awaiting.size > 0) {
      throw new Error(
        `Cannot enter critical section: status ${this._status}, ${this.awaiting.size} replies pending`
      )
    }
    this._status = MutexStatus.HELD
  }

  /**
   * HELD → RELEASED, or an abandoned WANTED → RELEASED.
   * Hands back every deferred requester and clears the set in the same step.
   */
  release(): DeferredRequest[] {
    if (this._status === MutexStatus.RELEASED) {
      throw new Error('Cannot release: not requesting or holding')
    }
    const drained = [...this.deferred.entries()]
      .map(([requesterId, timestamp]) => ({ requesterId, timestamp }))
      .sort((a, b) => a.requesterId - b.requesterId)

    this.deferred.clear()
    this.awaiting.clear()
    this._requestTimestamp = null
    this._status = MutexStatus.RELEASED
    return drained
  }

  snapshot(): PeerStateSnapshot {
    return {
      status: this._status,
      requestTimestamp: this._requestTimestamp,
      pendingReplyCount: this.awaiting.size,
      awaitingReplyFrom: [...this.awaiting].sort((a, b) => a - b),
      deferredRequesters: [...this.deferred.keys()].sort((a, b) => a - b),
    }
  }
}
