/**
 * Zod schemas for peer and print-service configuration
 * Validates YAML config files
 */

import { z } from 'zod'

export const PeerConfigSchema = z.object({
  id: z.number().int().positive(),
  endpoint: z.string().url(),
})

export type PeerConfig = z.infer<typeof PeerConfigSchema>

export const ResourceConfigSchema = z.object({
  endpoint: z.string().url().default('http://localhost:50051'),
  timeoutMs: z.number().int().positive().default(10000),
})

export const TransportConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(5000),
})

/**
 * No acquireTimeoutMs means a request waits for every peer indefinitely
 */
export const MutexConfigSchema = z.object({
  acquireTimeoutMs: z.number().int().positive().optional(),
})

export const DEFAULT_DOCUMENTS = [
  'Monthly financial report',
  'Project requirements document',
  'Team meeting minutes',
  'Service agreement',
  'Pending task list',
  'Operating cost spreadsheet',
  'Instruction manual',
  'Commercial proposal',
  'Certificate of completion',
  'Statement of responsibility',
]

export const WorkloadConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    minIntervalMs: z.number().int().min(0).default(5000),
    maxIntervalMs: z.number().int().min(0).default(15000),
    documents: z.array(z.string().min(1)).min(1).default(DEFAULT_DOCUMENTS),
  })
  .refine(workload => workload.minIntervalMs <= workload.maxIntervalMs, {
    message: 'minIntervalMs must not exceed maxIntervalMs',
    path: ['minIntervalMs'],
  })

export type WorkloadConfig = z.infer<typeof WorkloadConfigSchema>

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: z.boolean().default(false),
})

export const PrintServiceConfigSchema = z
  .object({
    port: z.number().int().positive().default(50051),
    minDelayMs: z.number().int().min(0).default(2000),
    maxDelayMs: z.number().int().min(0).default(3000),
  })
  .refine(printService => printService.minDelayMs <= printService.maxDelayMs, {
    message: 'minDelayMs must not exceed maxDelayMs',
    path: ['minDelayMs'],
  })

export type PrintServiceConfig = z.infer<typeof PrintServiceConfigSchema>

/**
 * Complete configuration of one peer process
 */
export const ClusterConfigSchema = z
  .object({
    self: z.number().int().positive(),
    peers: z.array(PeerConfigSchema).min(1),
    resource: ResourceConfigSchema.default({}),
    transport: TransportConfigSchema.default({}),
    mutex: MutexConfigSchema.default({}),
    workload: WorkloadConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
    printService: PrintServiceConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const ids = new Set<number>()
    const endpoints = new Set<string>()
    config.peers.forEach((peer, index) => {
      if (ids.has(peer.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate peer id ${peer.id}`, path: ['peers', index, 'id'] })
      }
      if (endpoints.has(peer.endpoint)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate endpoint ${peer.endpoint}`,
          path: ['peers', index, 'endpoint'],
        })
      }
      ids.add(peer.id)
      endpoints.add(peer.endpoint)
    })
    if (!ids.has(config.self)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `self ${config.self} is not listed in peers`, path: ['self'] })
    }
  })

export type ClusterConfig = z.infer<typeof ClusterConfigSchema>

/**
 * Validate and parse config with defaults
 */
export function validateConfig(config: unknown): ClusterConfig {
  return ClusterConfigSchema.parse(config)
}

/**
 * Validate config with detailed error messages
 */
export function validateConfigSafe(config: unknown): { success: true; data: ClusterConfig } | { success: false; errors: string[] } {
  const result = ClusterConfigSchema.safeParse(config)

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })

  return { success: false, errors }
}
