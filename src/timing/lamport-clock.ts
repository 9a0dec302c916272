import type { ClockValue } from '../types'

/**
 * Lamport Clock - Logical timestamp for distributed ordering
 *
 * Provides happens-before relationship tracking across peers.
 * Clock increments on local events and sends, and synchronizes on every message receipt.
 *
 * Usage:
 *   const clock = new LamportClock();
 *   const t1 = clock.tick();      // Local event
 *   const t2 = clock.stamp();     // Outbound message
 *   const t3 = clock.observe(9);  // Message received carrying timestamp 9
 */
export class LamportClock {
  private clock: ClockValue

  constructor(initialTime: ClockValue = 0) {
    this.clock = initialTime
  }

  /**
   * Increment clock for a local event
   *
   * @returns New timestamp after increment
   */
  tick(): ClockValue {
    this.clock += 1
    return this.clock
  }

  /**
   * Timestamp for an outgoing message
   */
  stamp(): ClockValue {
    return this.tick()
  }

  /**
   * Sync with a received timestamp: max(local, received) + 1
   */
  observe(receivedTime: ClockValue): ClockValue {
    this.clock = Math.max(this.clock, receivedTime) + 1
    return this.clock
  }

  /**
   * Get current time without incrementing
   */
  get(): ClockValue {
    return this.clock
  }
}
