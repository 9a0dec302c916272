/**
 * Zod schemas for the peer wire protocol and the print resource
 */

import { z } from 'zod'

const PeerIdSchema = z.number().int().positive()
const ClockValueSchema = z.number().int().min(0)

export const AccessRequestSchema = z.object({
  requesterId: PeerIdSchema,
  timestamp: ClockValueSchema,
})

export const AccessAckSchema = z.object({
  granterId: PeerIdSchema,
  granted: z.boolean(),
  timestamp: ClockValueSchema,
})

export const ReleaseNoticeSchema = z.object({
  releaserId: PeerIdSchema,
  requestTimestamp: ClockValueSchema,
  timestamp: ClockValueSchema,
})

export const ReleaseAckSchema = z.object({
  acknowledged: z.boolean(),
  timestamp: ClockValueSchema,
})

export const ResourceJobSchema = z.object({
  peerId: PeerIdSchema,
  requestNumber: z.number().int().positive(),
  timestamp: ClockValueSchema,
  content: z.string().min(1),
})

export const WorkReceiptSchema = z.object({
  success: z.boolean(),
  confirmation: z.string(),
  timestamp: ClockValueSchema,
})

/**
 * Flatten zod issues into `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}
