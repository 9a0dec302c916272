import type { Logger } from 'pino'
import { describeError } from '../errors'
import { obs } from '../observability'
import type { WorkItem, WorkReceipt } from '../types'

/**
 * Anything that can run work under mutual exclusion
 */
export interface WorkSubmitter {
  submit(item: WorkItem): Promise<WorkReceipt>
}

export interface AutoRequesterOptions {
  minIntervalMs: number
  maxIntervalMs: number
  documents: readonly string[]
  /**
   * Stop after this many submissions
   */
  maxRequests?: number
  random?: () => number
  logger?: Logger
}

/**
 * AutoRequester - Prints a random document at random intervals
 */
export class AutoRequester {
  private running = false
  private sleeper: { timer: NodeJS.Timeout; wake: () => void } | null = null
  private readonly random: () => number
  private readonly logger: Logger
  private _submitted = 0
  private _failed = 0

  constructor(
    private readonly submitter: WorkSubmitter,
    private readonly options: AutoRequesterOptions
  ) {
    if (options.documents.length === 0) {
      throw new Error('AutoRequester needs at least one document')
    }
    this.random = options.random ?? Math.random
    this.logger = options.logger ?? obs.createChildLogger({ component: 'auto-requester' })
  }

  get submitted(): number {
    return this._submitted
  }

  get failed(): number {
    return this._failed
  }

  /**
   * Loop until stopped or maxRequests is reached
   */
  async run(): Promise<void> {
    this.running = true
    const { minIntervalMs, maxIntervalMs, documents, maxRequests } = this.options

    while (this.running && (maxRequests === undefined || this._submitted < maxRequests)) {
      const waitMs = Math.round(minIntervalMs + (maxIntervalMs - minIntervalMs) * this.random())
      this.logger.debug({ waitMs }, 'Next request scheduled')
      await this.sleep(waitMs)
      if (!this.running) break

      const content = documents[Math.min(documents.length - 1, Math.floor(this.random() * documents.length))]
      this._submitted++
      try {
        const receipt = await this.submitter.submit({ content })
        this.logger.info({ total: this._submitted, confirmation: receipt.confirmation }, 'Print request completed')
      } catch (error) {
        this._failed++
        this.logger.error({ content, error: describeError(error) }, 'Print request failed')
      }
    }

    this.running = false
  }

  stop(): void {
    this.running = false
    const sleeper = this.sleeper
    this.sleeper = null
    if (sleeper) {
      clearTimeout(sleeper.timer)
      sleeper.wake()
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.sleeper = null
        resolve()
      }, ms)
      this.sleeper = { timer, wake: resolve }
    })
  }
}
