/**
 * Environment Configuration with Validation
 *
 * Centralizes environment variable overrides so the rest of the code
 * never reads process.env directly.
 */

import type { ClusterConfig } from './schema'

export class ConfigurationError extends Error {
  public readonly details?: {
    key?: string
    errors?: string[]
    searchedPaths?: string[]
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

export interface EnvironmentOverrides {
  peerId?: number
  logLevel?: string
  printServerPort?: number
}

function parseInteger(key: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') return undefined
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`, { key })
  }
  return value
}

/**
 * Read PEER_ID, LOG_LEVEL and PRINT_SERVER_PORT
 */
export function loadEnvironmentOverrides(env: NodeJS.ProcessEnv = process.env): EnvironmentOverrides {
  return {
    peerId: parseInteger('PEER_ID', env.PEER_ID),
    logLevel: env.LOG_LEVEL || undefined,
    printServerPort: parseInteger('PRINT_SERVER_PORT', env.PRINT_SERVER_PORT),
  }
}

/**
 * Apply environment overrides on top of a validated config.
 * The chosen peer id must still be part of the peer set.
 */
export function applyEnvironmentOverrides(config: ClusterConfig, overrides: EnvironmentOverrides): ClusterConfig {
  const self = overrides.peerId ?? config.self
  if (!config.peers.some(peer => peer.id === self)) {
    throw new ConfigurationError(`PEER_ID ${self} is not listed in peers`, { key: 'PEER_ID' })
  }

  return {
    ...config,
    self,
    logging: overrides.logLevel ? { ...config.logging, level: toLevel(overrides.logLevel) } : config.logging,
    printService: overrides.printServerPort
      ? { ...config.printService, port: overrides.printServerPort }
      : config.printService,
  }
}

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

function toLevel(level: string): ClusterConfig['logging']['level'] {
  const match = LEVELS.find(candidate => candidate === level)
  if (!match) {
    throw new ConfigurationError(`LOG_LEVEL must be one of ${LEVELS.join(', ')}, got "${level}"`, { key: 'LOG_LEVEL' })
  }
  return match
}
