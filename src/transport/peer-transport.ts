import type {
  AccessAck,
  AccessRequest,
  PeerRecord,
  ReleaseAck,
  ReleaseNotice,
} from '../types'

/**
 * PeerTransport - Point-to-point calls from this peer to another
 *
 * Implementations reject with TransportError when the peer cannot be reached
 * and with ProtocolViolation when the peer rejected the message.
 */
export interface PeerTransport {
  /**
   * Deliver an access request to one peer
   */
  requestAccess(peer: PeerRecord, request: AccessRequest): Promise<AccessAck>

  /**
   * Deliver a deferred reply to a peer that was waiting on us
   */
  releaseAccess(peer: PeerRecord, notice: ReleaseNotice): Promise<ReleaseAck>
}

/**
 * AccessResponder - Inbound side of the protocol, served by every peer
 */
export interface AccessResponder {
  receiveRequest(request: AccessRequest): AccessAck
  receiveRelease(notice: ReleaseNotice): ReleaseAck
}
