import type { z } from 'zod'
import type { Executor } from '../core/interaction-client.js'
import type { ModalResponseData } from '../core/types.js'
import type { ModalContext } from './context.js'
import type { ModalTemplate, ModalValues } from './template.js'

export type ModalCallback<S extends z.ZodRawShape> = (ctx: ModalContext, values: ModalValues<S>) => Promise<void>

export interface ModalOptions {
  ephemeralDefault?: boolean
}

export type IModal = Executor<ModalContext>

/**
 * Single-callback modal executor. Field values are extracted and validated
 * before the callback runs; extraction errors propagate to the client.
 */
export class Modal<S extends z.ZodRawShape = z.ZodRawShape> implements IModal {
  private readonly ephemeralDefault: boolean

  constructor(
    readonly template: ModalTemplate<S>,
    private readonly callback: ModalCallback<S>,
    options: ModalOptions = {},
  ) {
    this.ephemeralDefault = options.ephemeralDefault ?? false
  }

  /** Custom ids of the template's fields, in declaration order. */
  get customIds(): string[] {
    return this.template.fields.map((f) => f.customId)
  }

  async execute(ctx: ModalContext): Promise<void> {
    ctx.setEphemeralDefault(this.ephemeralDefault)
    const values = this.template.extract(ctx.fields)
    await this.callback(ctx, values)
  }

  build(customId: string, title: string): ModalResponseData {
    return this.template.build(customId, title)
  }
}
