import { describe, it, expect } from 'vitest';
import { LamportClock } from '../../src/timing/lamport-clock';

describe('LamportClock', () => {
  describe('Local events', () => {
    it('should start at 0 by default', () => {
      const clock = new LamportClock();
      expect(clock.get()).toBe(0);
    });

    it('should start at provided initial time', () => {
      const clock = new LamportClock(42);
      expect(clock.get()).toBe(42);
    });

    it('should increment on local event', () => {
      const clock = new LamportClock();

      expect(clock.tick()).toBe(1);
      expect(clock.tick()).toBe(2);
      expect(clock.tick()).toBe(3);
    });

    it('should stamp outgoing messages like a local event', () => {
      const clock = new LamportClock(7);

      expect(clock.stamp()).toBe(8);
      expect(clock.tick()).toBe(9);
      expect(clock.stamp()).toBe(10);
    });

    it('should not change time on get()', () => {
      const clock = new LamportClock();
      clock.tick();

      expect(clock.get()).toBe(1);
      expect(clock.get()).toBe(1);
    });
  });

  describe('Message synchronization', () => {
    it('should sync with received timestamp when received > local', () => {
      const clock = new LamportClock();
      clock.tick();
      clock.tick();

      const newTime = clock.observe(5);

      expect(newTime).toBe(6);  // max(2, 5) + 1
      expect(clock.get()).toBe(6);
    });

    it('should increment when received < local', () => {
      const clock = new LamportClock(10);

      expect(clock.observe(3)).toBe(11);  // max(10, 3) + 1
    });

    it('should handle received === local', () => {
      const clock = new LamportClock(2);

      expect(clock.observe(2)).toBe(3);
    });

    it('should be strictly increasing across any mix of events', () => {
      const clock = new LamportClock();
      const readings: number[] = [];
      const remotes = [0, 9, 3, 3, 20, 1];

      for (const remote of remotes) {
        const before = clock.get();
        readings.push(clock.tick());
        const observed = clock.observe(remote);
        expect(observed).toBeGreaterThanOrEqual(Math.max(remote, before + 1) + 1);
        readings.push(observed);
        readings.push(clock.stamp());
      }

      for (let i = 1; i < readings.length; i++) {
        expect(readings[i]).toBeGreaterThan(readings[i - 1]);
      }
    });
  });

  describe('Multi-peer scenario', () => {
    it('should maintain causality between two peers', () => {
      const clockA = new LamportClock();
      const clockB = new LamportClock();

      clockA.tick();  // A = 1
      clockA.tick();  // A = 2
      const sent = clockA.stamp();  // A = 3, carried on the message

      clockB.observe(sent);  // B = max(0, 3) + 1 = 4
      const reply = clockB.stamp();  // B = 5

      clockA.observe(reply);  // A = max(3, 5) + 1 = 6

      expect(clockA.get()).toBe(6);
      expect(clockB.get()).toBe(5);
    });

    it('should give concurrent events equal timestamps', () => {
      const clockA = new LamportClock();
      const clockB = new LamportClock();

      clockA.tick();
      clockB.tick();

      expect(clockA.get()).toBe(clockB.get());
    });
  });
});
