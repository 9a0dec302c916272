// Core exports
export * from './types'
export * from './errors'
export { LamportClock } from './timing/lamport-clock'
export * from './mutex/peer-state'
export * from './mutex/mutex-engine'

// Transport and resource boundaries
export type { PeerTransport, AccessResponder } from './transport/peer-transport'
export * from './transport/in-memory-network'
export * from './transport/http-transport'
export type { ResourceClient } from './resource/resource-client'
export * from './resource/http-resource-client'
export * from './resource/in-memory-resource'
export * from './resource/print-service'

// Processes
export * from './api/peer-routes'
export * from './api/error-handler'
export * from './peer/peer-node'
export * from './peer/auto-requester'
export * from './simulation/local-cluster'
export * from './services/service'

export * from './config'
export * from './observability'
