import { vi } from 'vitest'
import { ComponentType } from 'discord-api-types/v10'
import type { APIMessage } from 'discord-api-types/v10'
import type {
  ComponentInteraction,
  InteractionRef,
  InteractionResponder,
  ModalFieldPayload,
  ModalInteraction,
} from '../types.js'

let nextId = 1

export function resetCounters() {
  nextId = 1
}

/** Snowflake for 2024-01-01T00:00:00Z. */
export const SNOWFLAKE_2024 = '1191168914227200000'

export function componentInteraction(customId: string, overrides?: Partial<ComponentInteraction>): ComponentInteraction {
  return {
    kind: 'component',
    id: SNOWFLAKE_2024,
    applicationId: 'app-1',
    token: `token-${nextId++}`,
    customId,
    user: { id: 'user-1', username: 'alice' },
    componentType: ComponentType.Button,
    values: [],
    ...overrides,
  }
}

export function modalInteraction(
  customId: string,
  fields: ModalFieldPayload[],
  overrides?: Partial<ModalInteraction>,
): ModalInteraction {
  return {
    kind: 'modal',
    id: SNOWFLAKE_2024,
    applicationId: 'app-1',
    token: `token-${nextId++}`,
    customId,
    user: { id: 'user-1', username: 'alice' },
    fields,
    ...overrides,
  }
}

export function message(id: string): APIMessage {
  return { id } as APIMessage
}

/** Responder whose every method is a vi.fn resolving to a stub message. */
export function mockResponder() {
  return {
    createInteractionResponse: vi.fn(async () => {}),
    fetchOriginalResponse: vi.fn(async () => message('original')),
    editOriginalResponse: vi.fn(async () => message('original')),
    deleteOriginalResponse: vi.fn(async () => {}),
    createFollowup: vi.fn(async () => message('followup-1')),
    fetchFollowup: vi.fn(async (_i: InteractionRef, id: string) => message(id)),
    editFollowup: vi.fn(async (_i: InteractionRef, id: string) => message(id)),
    deleteFollowup: vi.fn(async () => {}),
  } satisfies InteractionResponder
}
