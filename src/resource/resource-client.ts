import type { ResourceJob, WorkReceipt } from '../types'

/**
 * ResourceClient - Submits work to the protected resource
 *
 * Resolves once the resource reports completion; rejects with ResourceError otherwise.
 */
export interface ResourceClient {
  submitWork(job: ResourceJob): Promise<WorkReceipt>
}
