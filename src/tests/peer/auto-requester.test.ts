import { describe, it, expect } from 'vitest'
import pino from 'pino'
import { AutoRequester, type WorkSubmitter } from '../../peer/auto-requester'
import type { WorkItem, WorkReceipt } from '../../types'

const logger = pino({ level: 'silent' })

class RecordingSubmitter implements WorkSubmitter {
  items: WorkItem[] = []

  constructor(private readonly fail = false) {}

  async submit(item: WorkItem): Promise<WorkReceipt> {
    this.items.push(item)
    if (this.fail) {
      throw new Error('printer offline')
    }
    return { success: true, confirmation: 'ok', timestamp: this.items.length }
  }
}

describe('AutoRequester', () => {
  it('submits documents until maxRequests is reached', async () => {
    const submitter = new RecordingSubmitter()
    const requester = new AutoRequester(submitter, {
      minIntervalMs: 0,
      maxIntervalMs: 0,
      documents: ['Report', 'Invoice', 'Minutes'],
      maxRequests: 3,
      random: () => 0.99,
      logger,
    })

    await requester.run()

    expect(requester.submitted).toBe(3)
    expect(requester.failed).toBe(0)
    expect(submitter.items).toEqual([{ content: 'Minutes' }, { content: 'Minutes' }, { content: 'Minutes' }])
  })

  it('picks documents with the injected random source', async () => {
    const values = [0, 0, 0, 0.5]
    const submitter = new RecordingSubmitter()
    const requester = new AutoRequester(submitter, {
      minIntervalMs: 0,
      maxIntervalMs: 0,
      documents: ['Report', 'Invoice'],
      maxRequests: 2,
      random: () => values.shift() ?? 0,
      logger,
    })

    await requester.run()

    // interval, document, interval, document
    expect(submitter.items.map(item => item.content)).toEqual(['Report', 'Invoice'])
  })

  it('counts failures and keeps going', async () => {
    const requester = new AutoRequester(new RecordingSubmitter(true), {
      minIntervalMs: 0,
      maxIntervalMs: 0,
      documents: ['Report'],
      maxRequests: 2,
      logger,
    })

    await requester.run()

    expect(requester.submitted).toBe(2)
    expect(requester.failed).toBe(2)
  })

  it('stops while sleeping', async () => {
    const submitter = new RecordingSubmitter()
    const requester = new AutoRequester(submitter, {
      minIntervalMs: 60_000,
      maxIntervalMs: 60_000,
      documents: ['Report'],
      logger,
    })

    const running = requester.run()
    requester.stop()
    await running

    expect(requester.submitted).toBe(0)
    expect(submitter.items).toEqual([])
  })

  it('needs at least one document', () => {
    expect(
      () => new AutoRequester(new RecordingSubmitter(), { minIntervalMs: 0, maxIntervalMs: 0, documents: [], logger })
    ).toThrow('AutoRequester needs at least one document')
  })
})
