/**
 * Error taxonomy for the dispatch core.
 *
 * Contract violations (state misuse, duplicate registration, depleted uses)
 * are plain thrown errors. ExecutorClosed and InteractionError are control
 * signals: the registry catches them instead of letting them propagate.
 */

import type { ResponseState } from './types.js'

// ==================== Timeouts ====================

export class UsesDepletedError extends Error {
  constructor() {
    super('Uses already depleted')
    this.name = 'UsesDepletedError'
  }
}

// ==================== Responses ====================

export type StateErrorReason = 'already-responded' | 'must-edit' | 'not-responded'

const STATE_MESSAGES: Record<StateErrorReason, string> = {
  'already-responded': 'Interaction has already been responded to',
  'must-edit': 'editInitialResponse must be used to set the initial response after an interaction has been deferred',
  'not-responded': 'Interaction has no initial response yet',
}

export class InteractionStateError extends Error {
  constructor(
    public reason: StateErrorReason,
    public state: ResponseState,
  ) {
    super(STATE_MESSAGES[reason])
    this.name = 'InteractionStateError'
  }
}

/** No previous response to edit, delete or fetch. */
export class NoResponseError extends Error {
  constructor(action: string) {
    super(`Interaction has no response to ${action}`)
    this.name = 'NoResponseError'
  }
}

export class DeleteAfterError extends Error {
  constructor(
    public deleteAfterMs: number,
    public remainingMs: number,
  ) {
    super('This interaction will have expired before deleteAfterMs is reached')
    this.name = 'DeleteAfterError'
  }
}

// ==================== Registry ====================

export class DuplicateCustomIdError extends Error {
  constructor(
    public customId: string,
    public existing: 'exact' | 'prefix',
  ) {
    super(`'${customId}' is already registered as ${existing === 'prefix' ? 'a prefix match' : 'a custom id'}`)
    this.name = 'DuplicateCustomIdError'
  }
}

export class CustomIdNotFoundError extends Error {
  constructor(public customId: string) {
    super(`'${customId}' is not registered`)
    this.name = 'CustomIdNotFoundError'
  }
}

export class InvalidCustomIdError extends Error {
  constructor(public customId: string) {
    super(`'${customId}' has an empty match segment`)
    this.name = 'InvalidCustomIdError'
  }
}

/** The registry picked an executor that has no callback for the id. */
export class RoutingError extends Error {
  constructor(public customId: string) {
    super(`No callback found for custom id '${customId}'`)
    this.name = 'RoutingError'
  }
}

// ==================== Modal fields ====================

export class MissingFieldError extends Error {
  constructor(public key: string, public customId: string) {
    super(`Missing required field '${key}' (${customId})`)
    this.name = 'MissingFieldError'
  }
}

export class FieldTypeError extends Error {
  constructor(
    public key: string,
    public expected: number,
    public received: number,
  ) {
    super(`Field '${key}' expected component type ${expected} but received ${received}`)
    this.name = 'FieldTypeError'
  }
}

// ==================== Signals ====================

/** Thrown by an executor mid-invocation to say it should be evicted. */
export class ExecutorClosed extends Error {
  constructor() {
    super('Executor closed')
    this.name = 'ExecutorClosed'
  }
}
