/**
 * Timeout policies: decide when a registered executor stops being routable.
 *
 * The registry consults `hasExpired` before dispatch and calls
 * `incrementUses` once per dispatched interaction; a `true` return means the
 * entry is exhausted and gets removed straight away. The reaper catches
 * everything that expires by time alone.
 */

import { UsesDepletedError } from './errors.js'

// ==================== Contract ====================

export interface Timeout {
  /** Pure check; never mutates. */
  readonly hasExpired: boolean
  /**
   * Record a use. Returns whether this use exhausted the policy.
   * Throws UsesDepletedError when already expired.
   */
  incrementUses(): boolean
}

export interface TimeoutOptions {
  /** Maximum uses before expiring. -1 = unlimited. */
  maxUses?: number
  /** Injectable clock (ms since epoch). */
  now?: () => number
}

export const DEFAULT_TIMEOUT_MS = 2 * 60 * 1000

// ==================== Sliding ====================

/** Expires after `timeoutMs` without a use, or after `maxUses` uses. */
export class SlidingTimeout implements Timeout {
  private lastTriggered: number
  private usesLeft: number
  private now: () => number

  constructor(
    private timeoutMs: number,
    options: TimeoutOptions = {},
  ) {
    this.now = options.now ?? Date.now
    this.usesLeft = options.maxUses ?? -1
    this.lastTriggered = this.now()
  }

  get hasExpired(): boolean {
    return this.expiredAt(this.now())
  }

  incrementUses(): boolean {
    const now = this.now()
    if (this.expiredAt(now)) throw new UsesDepletedError()

    if (this.usesLeft > 0) this.usesLeft--
    this.lastTriggered = now
    return this.usesLeft === 0
  }

  private expiredAt(now: number): boolean {
    return this.usesLeft === 0 || now - this.lastTriggered > this.timeoutMs
  }
}

// ==================== Static ====================

/** Expires at a fixed deadline or after `maxUses` uses, whichever is first. */
export class StaticTimeout implements Timeout {
  private expiresAt: number
  private usesLeft: number
  private now: () => number

  constructor(deadline: Date | number, options: TimeoutOptions = {}) {
    this.expiresAt = deadline instanceof Date ? deadline.getTime() : deadline
    this.usesLeft = options.maxUses ?? -1
    this.now = options.now ?? Date.now
  }

  get hasExpired(): boolean {
    return this.usesLeft === 0 || this.now() >= this.expiresAt
  }

  incrementUses(): boolean {
    if (this.hasExpired) throw new UsesDepletedError()

    if (this.usesLeft > 0) this.usesLeft--
    return this.usesLeft === 0
  }
}

// ==================== Never ====================

export class NeverTimeout implements Timeout {
  get hasExpired(): boolean {
    return false
  }

  incrementUses(): boolean {
    return false
  }
}
