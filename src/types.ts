/**
 * Peer identifier. Lower ids win timestamp ties.
 */
export type PeerId = number

/**
 * Lamport clock reading
 */
export type ClockValue = number

/**
 * A participant in the mutual-exclusion group
 */
export interface PeerRecord {
  peerId: PeerId
  endpoint: string
}

/**
 * Request for the critical section, broadcast to every other peer
 */
export interface AccessRequest {
  readonly requesterId: PeerId
  readonly timestamp: ClockValue
}

/**
 * Immediate answer to an AccessRequest call.
 * granted=false means the reply was deferred and will arrive as a ReleaseNotice.
 */
export interface AccessAck {
  granterId: PeerId
  granted: boolean
  timestamp: ClockValue
}

/**
 * Permission from one peer for one outstanding request
 */
export interface AccessReply {
  granterId: PeerId
  requestTimestamp: ClockValue
}

/**
 * Deferred reply, sent to a waiting requester once the sender leaves the critical section
 */
export interface ReleaseNotice {
  releaserId: PeerId
  requestTimestamp: ClockValue
  timestamp: ClockValue
}

export interface ReleaseAck {
  acknowledged: boolean
  timestamp: ClockValue
}

/**
 * Mutual-exclusion status of a single peer
 */
export enum MutexStatus {
  RELEASED = 'released',
  WANTED = 'wanted',
  HELD = 'held',
}

export interface DeferredRequest {
  requesterId: PeerId
  timestamp: ClockValue
}

export interface MutexSnapshot {
  peerId: PeerId
  status: MutexStatus
  clock: ClockValue
  requestTimestamp: ClockValue | null
  pendingReplyCount: number
  awaitingReplyFrom: PeerId[]
  deferredRequesters: PeerId[]
  requestsIssued: number
  criticalSectionsCompleted: number
}

/**
 * Work executed inside the critical section
 */
export interface WorkItem {
  content: string
}

/**
 * Job sent to the protected resource
 */
export interface ResourceJob {
  peerId: PeerId
  requestNumber: number
  timestamp: ClockValue
  content: string
}

export interface WorkReceipt {
  success: boolean
  confirmation: string
  timestamp: ClockValue
}
