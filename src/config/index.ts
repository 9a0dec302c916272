/**
 * Configuration module
 * YAML config with Zod validation and environment overrides
 */

export * from './schema'
export * from './loader'
export * from './environment'
