import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { DEFAULT_REAPER_INTERVAL_MS, Reaper } from './reaper.js'

describe('Reaper', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('sweeps every interval while running', () => {
    const sweep = vi.fn(() => 0)
    const reaper = new Reaper({ sweep })

    reaper.start()
    vi.advanceTimersByTime(DEFAULT_REAPER_INTERVAL_MS * 3)
    expect(sweep).toHaveBeenCalledTimes(3)

    reaper.stop()
    vi.advanceTimersByTime(DEFAULT_REAPER_INTERVAL_MS * 3)
    expect(sweep).toHaveBeenCalledTimes(3)
  })

  it('start is idempotent', () => {
    const sweep = vi.fn(() => 0)
    const reaper = new Reaper({ sweep, intervalMs: 100 })

    reaper.start()
    reaper.start()
    vi.advanceTimersByTime(100)
    expect(sweep).toHaveBeenCalledTimes(1)
    expect(reaper.running).toBe(true)

    reaper.stop()
    reaper.stop()
    expect(reaper.running).toBe(false)
  })

  it('reports evictions only when something was swept', () => {
    const onSwept = vi.fn()
    const counts = [0, 2]
    const reaper = new Reaper({ sweep: () => counts.shift() ?? 0, onSwept })

    expect(reaper.tick()).toBe(0)
    expect(reaper.tick()).toBe(2)
    expect(onSwept).toHaveBeenCalledTimes(1)
    expect(onSwept).toHaveBeenCalledWith(2)
  })
})
