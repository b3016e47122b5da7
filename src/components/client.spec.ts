import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { pino } from 'pino'
import { InteractionResponseType, MessageFlags } from 'discord-api-types/v10'
import { InteractionGateway } from '../connectors/discord/gateway.js'
import { buttonPayload } from '../connectors/discord/__tests__/fixtures.js'
import { Deferred } from '../core/deferred.js'
import {
  CustomIdNotFoundError,
  DuplicateCustomIdError,
  ExecutorClosed,
  InvalidCustomIdError,
} from '../core/errors.js'
import { InteractionError } from '../core/interaction-error.js'
import { SlidingTimeout, StaticTimeout } from '../core/timeouts.js'
import type { InteractionKind, PullListeners, PullTransport } from '../core/types.js'
import { componentInteraction, mockResponder, resetCounters } from '../core/__tests__/fixtures.js'
import { ComponentClient, COMPONENT_TIMED_OUT_MESSAGE } from './client.js'
import type { ComponentContext } from './context.js'
import { ComponentExecutor, type IComponentExecutor } from './executor.js'

// ==================== Helpers ====================

class FakePull implements PullTransport {
  listeners: Partial<PullListeners> = {}

  setListener<K extends InteractionKind>(kind: K, listener: PullListeners[K] | undefined): void {
    this.listeners[kind] = listener
  }
}

function callbackExecutor(callback: (ctx: ComponentContext) => Promise<void>): IComponentExecutor {
  return { customIds: [], prefixIds: [], execute: callback }
}

const TIMED_OUT = {
  type: InteractionResponseType.ChannelMessageWithSource,
  data: { content: COMPONENT_TIMED_OUT_MESSAGE, flags: MessageFlags.Ephemeral },
}

function makeClient(overrides: { pullDeferAfterMs?: number | null } = {}) {
  const responder = mockResponder()
  const client = new ComponentClient({ responder, pullDeferAfterMs: null, ...overrides })
  return { client, responder }
}

beforeEach(() => {
  resetCounters()
})

// ==================== Registry ====================

describe('ComponentClient registry', () => {
  it('returns the effective custom id', () => {
    const { client } = makeClient()
    expect(client.register('vote:poll-1', callbackExecutor(async () => {}))).toBe('vote:poll-1')
    expect(client.registeredIds()).toEqual({ exact: ['vote'], prefix: [] })
  })

  it('generates unique ids when none is given', () => {
    const { client } = makeClient()
    const a = client.register(undefined, callbackExecutor(async () => {}))
    const b = client.register(undefined, callbackExecutor(async () => {}))

    expect(a).not.toBe(b)
    expect(client.lookup(a)).toBeDefined()
    expect(client.lookup(b)).toBeDefined()
  })

  it('rejects duplicates across both tables', () => {
    const { client } = makeClient()
    client.register('page', callbackExecutor(async () => {}), { prefixMatch: true })

    expect(() => client.register('page', callbackExecutor(async () => {}))).toThrow(DuplicateCustomIdError)
    expect(() => client.register('page:2', callbackExecutor(async () => {}))).toThrow(
      "'page' is already registered as a prefix match",
    )
  })

  it('rejects an empty match segment', () => {
    const { client } = makeClient()
    expect(() => client.register(':meta', callbackExecutor(async () => {}))).toThrow(InvalidCustomIdError)
  })

  it('prefers exact matches, then the longest prefix', () => {
    const { client } = makeClient()
    const short = callbackExecutor(async () => {})
    const long = callbackExecutor(async () => {})
    const exact = callbackExecutor(async () => {})
    client.register('pa', short, { prefixMatch: true })
    client.register('page', long, { prefixMatch: true })
    client.register('pages', exact)

    expect(client.lookup('pages:1')?.executor).toBe(exact)
    expect(client.lookup('page-next')?.executor).toBe(long)
    expect(client.lookup('pan')?.executor).toBe(short)
    expect(client.lookup('other')).toBeUndefined()
  })

  it('unregisters and reports unknown ids', () => {
    const { client } = makeClient()
    client.register('vote', callbackExecutor(async () => {}))

    client.unregister('vote:anything')
    expect(client.lookup('vote')).toBeUndefined()
    expect(() => client.unregister('vote')).toThrow(CustomIdNotFoundError)
  })

  it('sweeps expired entries', () => {
    const { client } = makeClient()
    let now = 0
    client.register('a', callbackExecutor(async () => {}), { timeout: new StaticTimeout(10, { now: () => now }) })
    client.register('b', callbackExecutor(async () => {}), { timeout: new StaticTimeout(20, { now: () => now }) })

    now = 15
    expect(client.sweep()).toBe(1)
    expect(client.registeredIds().exact).toEqual(['b'])
  })

  it('registers every id of an executor under one shared entry', async () => {
    const { client } = makeClient()
    const seen: string[] = []
    const executor = new ComponentExecutor()
      .add('yes', async (ctx) => { seen.push(ctx.idMatch) })
      .add('no', async (ctx) => { seen.push(ctx.idMatch) })
      .add('opt-', async (ctx) => { seen.push(ctx.interaction.customId) }, { prefixMatch: true })

    client.registerExecutor(executor, { timeout: new SlidingTimeout(60_000, { maxUses: 1 }) })
    expect(client.registeredIds()).toEqual({ exact: ['yes', 'no'], prefix: ['opt-'] })

    await client.onPushEvent(componentInteraction('no'))

    expect(seen).toEqual(['no'])
    expect(client.registeredIds()).toEqual({ exact: [], prefix: [] })
  })

  it('rejects executors that declare no ids', () => {
    const { client } = makeClient()

    expect(() => client.registerExecutor(callbackExecutor(async () => {}))).toThrow(InvalidCustomIdError)
    expect(client.registeredIds()).toEqual({ exact: [], prefix: [] })
  })

  it('keeps constant ids forever until removed', async () => {
    const { client } = makeClient()
    const callback = vi.fn(async () => {})
    client.setConstantId('help', callback)

    for (let i = 0; i < 5; i++) await client.onPushEvent(componentInteraction('help:topic'))
    expect(callback).toHaveBeenCalledTimes(5)

    client.removeConstantId('help')
    expect(client.lookup('help')).toBeUndefined()
  })

  it('routes prefix constant ids', async () => {
    const { client } = makeClient()
    const callback = vi.fn(async () => {})
    client.setConstantId('role-', callback, { prefixMatch: true })

    await client.onPushEvent(componentInteraction('role-admin'))
    expect(callback).toHaveBeenCalledTimes(1)
  })
})

// ==================== Push ====================

describe('ComponentClient push dispatch', () => {
  it('hands the executor a context for the interaction', async () => {
    const { client } = makeClient()
    const execute = vi.fn(async (_ctx: ComponentContext) => {})
    client.register('vote', callbackExecutor(execute))

    await client.onPushEvent(componentInteraction('vote:poll-1'))

    const ctx = execute.mock.calls[0][0]
    expect(ctx.idMatch).toBe('vote')
    expect(ctx.idMetadata).toBe('poll-1')
    expect(ctx.deliveryKind).toBe('push')
    expect(ctx.selectedValues).toEqual([])
  })

  it('answers the third use of a two-use timeout as timed out', async () => {
    const { client, responder } = makeClient()
    const execute = vi.fn(async (ctx: ComponentContext) => { await ctx.createInitialResponse('ok') })
    client.register('vote', callbackExecutor(execute), { timeout: new SlidingTimeout(30_000, { maxUses: 2 }) })

    await client.onPushEvent(componentInteraction('vote'))
    await client.onPushEvent(componentInteraction('vote'))
    const third = componentInteraction('vote')
    await client.onPushEvent(third)

    expect(execute).toHaveBeenCalledTimes(2)
    expect(responder.createInteractionResponse).toHaveBeenLastCalledWith(third, TIMED_OUT)
    expect(client.lookup('vote')).toBeUndefined()
  })

  it('answers unknown ids as timed out', async () => {
    const { client, responder } = makeClient()
    const interaction = componentInteraction('missing')

    await client.onPushEvent(interaction)

    expect(responder.createInteractionResponse).toHaveBeenCalledWith(interaction, TIMED_OUT)
  })

  it('evicts and answers when the executor closes', async () => {
    const { client, responder } = makeClient()
    client.register('wait', callbackExecutor(async () => { throw new ExecutorClosed() }))
    const interaction = componentInteraction('wait')

    await client.onPushEvent(interaction)

    expect(client.lookup('wait')).toBeUndefined()
    expect(responder.createInteractionResponse).toHaveBeenCalledWith(interaction, TIMED_OUT)
  })

  it('edits the deferral when the executor closes after deferring', async () => {
    const { client, responder } = makeClient()
    client.register('wait', callbackExecutor(async (ctx) => {
      await ctx.defer()
      throw new ExecutorClosed()
    }))
    const interaction = componentInteraction('wait')

    await client.onPushEvent(interaction)

    expect(responder.editOriginalResponse).toHaveBeenCalledWith(interaction, { content: COMPONENT_TIMED_OUT_MESSAGE })
  })

  it('sends nothing more when the executor closes after responding', async () => {
    const { client, responder } = makeClient()
    client.register('wait', callbackExecutor(async (ctx) => {
      await ctx.createInitialResponse('ok')
      throw new ExecutorClosed()
    }))

    await client.onPushEvent(componentInteraction('wait'))

    expect(responder.createInteractionResponse).toHaveBeenCalledTimes(1)
    expect(responder.editOriginalResponse).not.toHaveBeenCalled()
  })

  it('answers as timed out when the window closes between check and use', async () => {
    const { client, responder } = makeClient()
    const readings = [0, 10, 11]
    const execute = vi.fn(async () => {})
    client.register('vote', callbackExecutor(execute), {
      timeout: new SlidingTimeout(10, { now: () => readings.shift() ?? 11 }),
    })
    const interaction = componentInteraction('vote')

    await client.onPushEvent(interaction)

    expect(execute).not.toHaveBeenCalled()
    expect(responder.createInteractionResponse).toHaveBeenCalledWith(interaction, TIMED_OUT)
    expect(client.lookup('vote')).toBeUndefined()
  })

  it('sends InteractionError content to the user', async () => {
    const { client, responder } = makeClient()
    client.register('admin', callbackExecutor(async () => { throw new InteractionError('Admins only') }))
    const interaction = componentInteraction('admin')

    await client.onPushEvent(interaction)

    expect(responder.createInteractionResponse).toHaveBeenCalledWith(interaction, {
      type: InteractionResponseType.ChannelMessageWithSource,
      data: { content: 'Admins only', flags: MessageFlags.Ephemeral },
    })
  })

  it('propagates other executor errors', async () => {
    const { client } = makeClient()
    client.register('boom', callbackExecutor(async () => { throw new Error('boom') }))

    await expect(client.onPushEvent(componentInteraction('boom'))).rejects.toThrow('boom')
  })
})

// ==================== Pull ====================

describe('ComponentClient pull dispatch', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('returns the timed-out response for unknown ids', async () => {
    const { client, responder } = makeClient()

    await expect(client.onPullRequest(componentInteraction('missing'))).resolves.toEqual(TIMED_OUT)
    expect(responder.createInteractionResponse).not.toHaveBeenCalled()
  })

  it('resolves with the initial response while the executor keeps running', async () => {
    const { client, responder } = makeClient()
    const gate = new Deferred<void>()
    const finished = new Deferred<void>()
    client.register('vote', callbackExecutor(async (ctx) => {
      await ctx.createInitialResponse({ content: 'Counting...' })
      await gate.promise
      await ctx.createFollowup('Counted')
      finished.resolve()
    }))
    const interaction = componentInteraction('vote')

    const response = await client.onPullRequest(interaction)

    expect(response).toEqual({
      type: InteractionResponseType.ChannelMessageWithSource,
      data: { content: 'Counting...' },
    })
    expect(responder.createFollowup).not.toHaveBeenCalled()

    gate.resolve()
    await finished.promise
    expect(responder.createFollowup).toHaveBeenCalledWith(interaction, { content: 'Counted' })
    expect(responder.createInteractionResponse).not.toHaveBeenCalled()
  })

  it('rejects when the executor fails before responding', async () => {
    const { client } = makeClient()
    client.register('boom', callbackExecutor(async () => { throw new Error('boom') }))

    await expect(client.onPullRequest(componentInteraction('boom'))).rejects.toThrow('boom')
  })

  it('returns a modal response', async () => {
    const { client } = makeClient()
    const modal = { custom_id: 'report', title: 'Report', components: [] }
    client.register('open', callbackExecutor((ctx) => ctx.createModalResponse(modal)))

    await expect(client.onPullRequest(componentInteraction('open'))).resolves.toEqual({
      type: InteractionResponseType.Modal,
      data: modal,
    })
  })

  it('defers automatically when the executor is slow', async () => {
    vi.useFakeTimers()
    const { client, responder } = makeClient({ pullDeferAfterMs: 2_500 })
    const gate = new Deferred<void>()
    const finished = new Deferred<void>()
    client.register('slow', callbackExecutor(async (ctx) => {
      await gate.promise
      await ctx.respond('done')
      finished.resolve()
    }))
    const interaction = componentInteraction('slow')

    const pending = client.onPullRequest(interaction)
    await vi.advanceTimersByTimeAsync(2_500)

    await expect(pending).resolves.toEqual({ type: InteractionResponseType.DeferredChannelMessageWithSource })

    gate.resolve()
    await finished.promise
    expect(responder.editOriginalResponse).toHaveBeenCalledWith(interaction, { content: 'done' })
  })
})

// ==================== Lifecycle ====================

describe('ComponentClient lifecycle', () => {
  it('subscribes to both transports while open', () => {
    const gateway = new InteractionGateway()
    const pull = new FakePull()
    const client = new ComponentClient({ responder: mockResponder(), push: gateway, pull })

    client.open()
    client.open()
    expect(client.isOpen).toBe(true)
    expect(gateway.listenerCount('component')).toBe(1)
    expect(pull.listeners.component).toBeTypeOf('function')

    client.close()
    client.close()
    expect(client.isOpen).toBe(false)
    expect(gateway.listenerCount('component')).toBe(0)
    expect(pull.listeners.component).toBeUndefined()
  })

  it('keeps registrations across close', () => {
    const { client } = makeClient()
    client.register('vote', callbackExecutor(async () => {}))
    client.open()
    client.close()

    expect(client.lookup('vote')).toBeDefined()
  })

  it('logs push errors at the subscription boundary', async () => {
    const lines: string[] = []
    const logger = pino({ level: 'error' }, { write: (line: string) => { lines.push(line) } })
    const gateway = new InteractionGateway()
    const client = new ComponentClient({ responder: mockResponder(), push: gateway, logger })
    const failed = new Deferred<void>()
    client.register('boom', callbackExecutor(async () => {
      failed.resolve()
      throw new Error('boom')
    }))
    client.open()

    gateway.dispatch(buttonPayload('boom'))
    await failed.promise
    await vi.waitFor(() => expect(lines).toHaveLength(1))
    client.close()

    const entry = JSON.parse(lines[0])
    expect(entry.msg).toBe('interaction handler failed')
    expect(entry.customId).toBe('boom')
    expect(entry.module).toBe('components')
    expect(entry.err.message).toBe('boom')
  })
})

// ==================== Delayed deletes ====================

describe('ComponentClient delayed deletes', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  function registerBye(client: ComponentClient) {
    client.register('bye', callbackExecutor((ctx) => ctx.createInitialResponse({ content: 'bye', deleteAfterMs: 1_000 })))
  }

  it('deletes the response while open', async () => {
    const { client, responder } = makeClient()
    registerBye(client)
    client.open()
    const interaction = componentInteraction('bye')

    await client.onPushEvent(interaction)
    await vi.advanceTimersByTimeAsync(1_000)
    client.close()

    expect(responder.deleteOriginalResponse).toHaveBeenCalledWith(interaction)
  })

  it('cancels pending deletes on close', async () => {
    const { client, responder } = makeClient()
    registerBye(client)
    client.open()

    await client.onPushEvent(componentInteraction('bye'))
    client.close()
    await vi.advanceTimersByTimeAsync(1_000)

    expect(responder.deleteOriginalResponse).not.toHaveBeenCalled()
  })
})
