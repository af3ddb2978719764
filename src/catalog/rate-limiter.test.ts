import { describe, expect, it } from 'vitest'
import { RateLimiter } from './rate-limiter'

function fakeClock() {
  let time = 1000
  const sleeps: number[] = []
  return {
    sleeps,
    now: () => time,
    advance: (ms: number) => {
      time += ms
    },
    sleep: async (ms: number) => {
      sleeps.push(ms)
      time += ms
    }
  }
}

describe('RateLimiter', () => {
  it('lets the first call through without waiting', async () => {
    const clock = fakeClock()
    const limiter = new RateLimiter({ minIntervalMs: 200, now: clock.now, sleep: clock.sleep })

    await limiter.acquire()

    expect(clock.sleeps).toEqual([])
  })

  it('waits out the rest of the interval', async () => {
    const clock = fakeClock()
    const limiter = new RateLimiter({ minIntervalMs: 200, now: clock.now, sleep: clock.sleep })

    await limiter.acquire()
    clock.advance(50)
    await limiter.acquire()

    expect(clock.sleeps).toEqual([150])
  })

  it('does not wait once the interval has passed', async () => {
    const clock = fakeClock()
    const limiter = new RateLimiter({ minIntervalMs: 200, now: clock.now, sleep: clock.sleep })

    await limiter.acquire()
    clock.advance(500)
    await limiter.acquire()

    expect(clock.sleeps).toEqual([])
    expect(limiter.timeUntilNext()).toBe(200)
  })

  it('spaces out concurrent callers', async () => {
    const clock = fakeClock()
    const limiter = new RateLimiter({ minIntervalMs: 100, now: clock.now, sleep: clock.sleep })

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()])

    expect(clock.sleeps).toEqual([100, 100])
  })

  it('defaults to 200ms', () => {
    expect(new RateLimiter().minIntervalMs).toBe(200)
  })
})
