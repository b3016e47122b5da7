/**
 * Action row executor: builds one row of components and routes their
 * callbacks, so the payload and the handlers are declared in one place.
 *
 *   const row = new ActionRowExecutor()
 *     .addButton(ButtonStyle.Success, 'confirm', onConfirm, { label: 'Confirm' })
 *     .addLinkButton('https://example.com/docs', { label: 'Docs' })
 *   client.registerExecutor(row)
 *   await ctx.respond({ content: 'Sure?', components: [row.build()] })
 */

import { ButtonStyle, ComponentType } from 'discord-api-types/v10'
import type {
  APIActionRowComponent,
  APIMessageActionRowComponent,
  APIMessageComponentEmoji,
  APISelectMenuOption,
} from 'discord-api-types/v10'
import { generateCustomId } from '../core/custom-id.js'
import { ComponentExecutor, type ComponentCallback } from './executor.js'

export const MAX_ROW_BUTTONS = 5

export type InteractiveButtonStyle = ButtonStyle.Primary | ButtonStyle.Secondary | ButtonStyle.Success | ButtonStyle.Danger

export interface ButtonOptions {
  label?: string
  emoji?: APIMessageComponentEmoji
  disabled?: boolean
}

export interface StringSelectOptions {
  options: APISelectMenuOption[]
  placeholder?: string
  minValues?: number
  maxValues?: number
  disabled?: boolean
}

export type ActionRow = APIActionRowComponent<APIMessageActionRowComponent>

export class ActionRowExecutor extends ComponentExecutor {
  private readonly components: APIMessageActionRowComponent[] = []

  /** Custom id is generated when omitted. */
  addButton(
    style: InteractiveButtonStyle,
    customId: string | undefined,
    callback: ComponentCallback,
    options: ButtonOptions = {},
  ): this {
    this.checkRoom('button')
    const id = this.addCallback(customId, callback)
    this.components.push({ type: ComponentType.Button, style, custom_id: id, ...options })
    return this
  }

  /** Link buttons open a URL client-side and never reach the bot. */
  addLinkButton(url: string, options: ButtonOptions = {}): this {
    this.checkRoom('button')
    this.components.push({ type: ComponentType.Button, style: ButtonStyle.Link, url, ...options })
    return this
  }

  addStringSelect(customId: string | undefined, callback: ComponentCallback, options: StringSelectOptions): this {
    this.checkRoom('select')
    const id = this.addCallback(customId, callback)
    this.components.push({
      type: ComponentType.StringSelect,
      custom_id: id,
      options: options.options,
      placeholder: options.placeholder,
      min_values: options.minValues,
      max_values: options.maxValues,
      disabled: options.disabled,
    })
    return this
  }

  build(): ActionRow {
    return { type: ComponentType.ActionRow, components: [...this.components] }
  }

  private addCallback(customId: string | undefined, callback: ComponentCallback): string {
    const { match, customId: effective } = generateCustomId(customId)
    this.add(match, callback)
    return effective
  }

  /** A row holds up to five buttons or a single select menu. */
  private checkRoom(kind: 'button' | 'select'): void {
    const hasSelect = this.components.some((c) => c.type !== ComponentType.Button)
    if (hasSelect || (kind === 'select' && this.components.length > 0)) {
      throw new Error('A select menu must be the only component in its action row')
    }
    if (this.components.length >= MAX_ROW_BUTTONS) {
      throw new Error(`An action row holds at most ${MAX_ROW_BUTTONS} buttons`)
    }
  }
}
