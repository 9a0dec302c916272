import axios, { type AxiosInstance } from 'axios'
import { ResourceError, describeError } from '../errors'
import { WorkReceiptSchema, formatIssues } from '../schemas/protocol'
import { resolveEndpoint } from '../transport/endpoint'
import type { ResourceJob, WorkReceipt } from '../types'
import type { ResourceClient } from './resource-client'

export interface HttpResourceClientOptions {
  endpoint: string
  timeoutMs: number
  http?: AxiosInstance
}

/**
 * HttpResourceClient - Sends print jobs to the print service
 */
export class HttpResourceClient implements ResourceClient {
  private readonly http: AxiosInstance

  constructor(private readonly options: HttpResourceClientOptions) {
    this.http = options.http ?? axios.create({ headers: { 'Content-Type': 'application/json' } })
  }

  async submitWork(job: ResourceJob): Promise<WorkReceipt> {
    const url = resolveEndpoint(this.options.endpoint, '/print')

    let data: unknown
    try {
      const response = await this.http.post(url, job, { timeout: this.options.timeoutMs })
      data = response.data
    } catch (error) {
      throw new ResourceError(`Print service at ${this.options.endpoint} failed: ${describeError(error)}`, {
        cause: error,
      })
    }

    const parsed = WorkReceiptSchema.safeParse(data)
    if (!parsed.success) {
      throw new ResourceError(`Malformed print receipt: ${formatIssues(parsed.error).join('; ')}`)
    }
    if (!parsed.data.success) {
      throw new ResourceError(`Print rejected: ${parsed.data.confirmation}`)
    }
    return parsed.data
  }
}
