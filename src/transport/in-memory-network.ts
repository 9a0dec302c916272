import { TransportError } from '../errors'
import type { AccessAck, AccessRequest, PeerId, PeerRecord, ReleaseAck, ReleaseNotice } from '../types'
import type { AccessResponder, PeerTransport } from './peer-transport'

export interface InMemoryNetworkOptions {
  /**
   * One-way delivery delay for a call from `from` to `to`. Defaults to 0 (next macrotask).
   */
  latencyMs?: (from: PeerId, to: PeerId) => number
}

export interface DeliveryRecord {
  kind: 'request' | 'release'
  from: PeerId
  to: PeerId
  delivered: boolean
}

/**
 * InMemoryPeerNetwork - Delivers peer calls inside one process
 *
 * Every call is asynchronous, so responders and initiators interleave the way
 * they would over a real network. Peers can be made unreachable to exercise
 * transport failures.
 */
export class InMemoryPeerNetwork {
  private responders = new Map<PeerId, AccessResponder>()
  private unreachable = new Set<PeerId>()
  readonly deliveries: DeliveryRecord[] = []

  constructor(private readonly options: InMemoryNetworkOptions = {}) {}

  attach(peerId: PeerId, responder: AccessResponder): void {
    this.responders.set(peerId, responder)
  }

  detach(peerId: PeerId): void {
    this.responders.delete(peerId)
  }

  setReachable(peerId: PeerId, reachable: boolean): void {
    if (reachable) {
      this.unreachable.delete(peerId)
    } else {
      this.unreachable.add(peerId)
    }
  }

  /**
   * Transport used by peer `from` to reach the others
   */
  transportFor(from: PeerId): PeerTransport {
    return {
      requestAccess: (peer: PeerRecord, request: AccessRequest): Promise<AccessAck> =>
        this.deliver('request', from, peer.peerId, responder => responder.receiveRequest(request)),
      releaseAccess: (peer: PeerRecord, notice: ReleaseNotice): Promise<ReleaseAck> =>
        this.deliver('release', from, peer.peerId, responder => responder.receiveRelease(notice)),
    }
  }

  clear(): void {
    this.responders.clear()
    this.unreachable.clear()
    this.deliveries.length = 0
  }

  private async deliver<T>(
    kind: DeliveryRecord['kind'],
    from: PeerId,
    to: PeerId,
    handle: (responder: AccessResponder) => T
  ): Promise<T> {
    const latency = this.options.latencyMs?.(from, to) ?? 0
    await new Promise(resolve => setTimeout(resolve, latency))

    const responder = this.responders.get(to)
    if (!responder || this.unreachable.has(from) || this.unreachable.has(to)) {
      this.deliveries.push({ kind, from, to, delivered: false })
      throw new TransportError(`Peer ${to} is unreachable from peer ${from}`, { peerId: to })
    }

    this.deliveries.push({ kind, from, to, delivered: true })
    const result = handle(responder)

    // Response travels back over the same link
    await new Promise(resolve => setTimeout(resolve, latency))
    return result
  }
}
