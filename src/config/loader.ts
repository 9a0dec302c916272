/**
 * YAML configuration loader with type-safe parsing
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { ConfigurationError } from './environment'
import { validateConfigSafe, type ClusterConfig } from './schema'

export const DEFAULT_CONFIG_PATHS = [
  'peerlock.config.yaml',
  'peerlock.config.yml',
  '.peerlock.yaml',
  '.peerlock.yml',
  'config/peerlock.yaml',
  'config/peerlock.yml',
]

/**
 * Load and validate config from YAML file
 * @throws ConfigurationError if the file is missing, unreadable or invalid
 */
export function loadConfig(filePath: string): ClusterConfig {
  const result = loadConfigSafe(filePath)
  if (!result.success) {
    throw new ConfigurationError(
      `Failed to load config from ${filePath}:\n  - ${result.errors.join('\n  - ')}`,
      { errors: result.errors }
    )
  }
  return result.data
}

/**
 * Load config with detailed error reporting
 * Returns success/failure with error messages
 */
export function loadConfigSafe(filePath: string): { success: true; data: ClusterConfig } | { success: false; errors: string[] } {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    return {
      success: false,
      errors: [`Config file not found: ${absolutePath}`]
    }
  }

  let rawConfig: unknown
  try {
    rawConfig = yaml.load(readFileSync(absolutePath, 'utf-8'))
  } catch (error) {
    return {
      success: false,
      errors: [`Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`]
    }
  }

  return validateConfigSafe(rawConfig)
}

/**
 * Load config from PEERLOCK_CONFIG_PATH, else the first default location that exists
 * @throws ConfigurationError when nothing is found
 */
export function loadConfigAuto(env: NodeJS.ProcessEnv = process.env): ClusterConfig {
  const configPath = env.PEERLOCK_CONFIG_PATH
  if (configPath) {
    return loadConfig(configPath)
  }

  const found = DEFAULT_CONFIG_PATHS.find(path => existsSync(path))
  if (!found) {
    throw new ConfigurationError('No configuration file found', {
      searchedPaths: DEFAULT_CONFIG_PATHS.map(path => resolve(path)),
    })
  }
  return loadConfig(found)
}
