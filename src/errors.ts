import type { PeerId } from './types'

export interface MutexErrorDetails {
  peerId?: PeerId
  cause?: unknown
  [key: string]: unknown
}

/**
 * Base class for everything the mutual-exclusion layer throws
 */
export abstract class MutexError extends Error {
  abstract readonly code: string
  public readonly details?: MutexErrorDetails

  constructor(message: string, details?: MutexErrorDetails) {
    super(message)
    this.name = new.target.name
    this.details = details
  }
}

/**
 * A peer could not be reached, or the call timed out.
 * The reply it owed stays outstanding; nothing retries it.
 */
export class TransportError extends MutexError {
  readonly code: string = 'TRANSPORT_ERROR'
}

/**
 * The configured acquire deadline passed before every peer replied
 */
export class AcquireTimeoutError extends TransportError {
  readonly code: string = 'ACQUIRE_TIMEOUT'
}

/**
 * The protected operation failed. The critical section is still released.
 */
export class ResourceError extends MutexError {
  readonly code: string = 'RESOURCE_ERROR'
}

/**
 * A message that does not fit the current protocol round: unknown sender,
 * duplicate or stale reply, release without a matching request.
 * Rejected without touching local state.
 */
export class ProtocolViolation extends MutexError {
  readonly code: string = 'PROTOCOL_VIOLATION'
}

export class EngineStoppedError extends MutexError {
  readonly code: string = 'ENGINE_STOPPED'
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
