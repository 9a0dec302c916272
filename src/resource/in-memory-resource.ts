import { ResourceError } from '../errors'
import { LamportClock } from '../timing/lamport-clock'
import type { PeerId, ResourceJob, WorkReceipt } from '../types'
import type { ResourceClient } from './resource-client'

export interface ExecutionRecord {
  peerId: PeerId
  requestNumber: number
  content: string
  // Positions in the resource's own event sequence
  startedAt: number
  finishedAt: number
  /**
   * Jobs already running when this one started
   */
  concurrentWith: number
  failed: boolean
}

export interface InMemoryResourceOptions {
  durationMs?: number
  /**
   * Return true to make a job fail
   */
  shouldFail?: (job: ResourceJob) => boolean
}

/**
 * InMemoryResource - Protected resource stand-in for tests and simulation
 *
 * Records every execution interval and how many jobs overlapped it.
 */
export class InMemoryResource implements ResourceClient {
  readonly history: ExecutionRecord[] = []
  private readonly clock = new LamportClock()
  private active = 0
  private sequence = 0
  private _maxConcurrent = 0

  constructor(private readonly options: InMemoryResourceOptions = {}) {}

  get maxConcurrent(): number {
    return this._maxConcurrent
  }

  get overlaps(): number {
    return this.history.filter(record => record.concurrentWith > 0).length
  }

  /**
   * Peer ids in the order their work started
   */
  get order(): PeerId[] {
    return [...this.history].sort((a, b) => a.startedAt - b.startedAt).map(record => record.peerId)
  }

  async submitWork(job: ResourceJob): Promise<WorkReceipt> {
    this.clock.observe(job.timestamp)
    const concurrentWith = this.active
    const record: ExecutionRecord = {
      peerId: job.peerId,
      requestNumber: job.requestNumber,
      content: job.content,
      startedAt: ++this.sequence,
      finishedAt: -1,
      concurrentWith,
      failed: false,
    }
    this.history.push(record)
    this.active++
    this._maxConcurrent = Math.max(this._maxConcurrent, this.active)

    try {
      await new Promise(resolve => setTimeout(resolve, this.options.durationMs ?? 0))
      if (this.options.shouldFail?.(job)) {
        record.failed = true
        throw new ResourceError(`Job ${job.requestNumber} of peer ${job.peerId} failed`, { peerId: job.peerId })
      }
      return {
        success: true,
        confirmation: `Print completed for peer ${job.peerId}`,
        timestamp: this.clock.tick(),
      }
    } finally {
      this.active--
      record.finishedAt = ++this.sequence
    }
  }
}
