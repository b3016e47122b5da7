import type { DeliveryMode } from '../core/context.js'
import { splitCustomId } from '../core/custom-id.js'
import { InvalidCustomIdError } from '../core/errors.js'
import { InteractionClient, type InteractionClientOptions } from '../core/interaction-client.js'
import { NeverTimeout, type Timeout } from '../core/timeouts.js'
import type { ComponentInteraction } from '../core/types.js'
import { ComponentContext } from './context.js'
import { ComponentExecutor, type ComponentCallback, type IComponentExecutor } from './executor.js'

export const COMPONENT_TIMED_OUT_MESSAGE = 'This message has timed-out.'

/** Registry and dispatcher for message component interactions. */
export class ComponentClient extends InteractionClient<ComponentInteraction, ComponentContext, IComponentExecutor> {
  protected readonly timedOutMessage = COMPONENT_TIMED_OUT_MESSAGE

  constructor(options: InteractionClientOptions) {
    super({ ...options, logger: options.logger?.child({ module: 'components' }) })
  }

  /**
   * Register an executor under every id it declares. All ids share one entry,
   * so they expire together and exhaustion evicts them all.
   */
  registerExecutor(executor: IComponentExecutor, options: { timeout?: Timeout } = {}): this {
    if (executor.customIds.length === 0 && executor.prefixIds.length === 0) throw new InvalidCustomIdError('')

    this.addEntry(
      { exact: executor.customIds, prefix: executor.prefixIds },
      { timeout: options.timeout ?? this.newDefaultTimeout(), executor },
    )
    return this
  }

  /** Register a callback that never times out (persistent buttons and menus). */
  setConstantId(customId: string, callback: ComponentCallback, options: { prefixMatch?: boolean } = {}): this {
    const executor = new ComponentExecutor().add(splitCustomId(customId).match, callback, options)
    this.register(customId, executor, { timeout: new NeverTimeout(), prefixMatch: options.prefixMatch })
    return this
  }

  removeConstantId(customId: string): this {
    this.unregister(customId)
    return this
  }

  protected createContext(interaction: ComponentInteraction, delivery: DeliveryMode): ComponentContext {
    return new ComponentContext({ interaction, delivery, ...this.contextDeps() })
  }

  protected attachTransports(): Array<() => void> {
    const detach: Array<() => void> = []
    const { push, pull } = this

    if (push) detach.push(push.subscribe('component', (interaction) => this.dispatchPush(interaction)))
    if (pull) {
      pull.setListener('component', (interaction) => this.onPullRequest(interaction))
      detach.push(() => pull.setListener('component', undefined))
    }
    return detach
  }
}
