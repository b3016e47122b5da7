import type { ComponentContext } from './context.js'
import { RoutingError } from '../core/errors.js'
import type { ActionRow } from './action-row.js'
import { ActionRowExecutor } from './action-row.js'
import type { IComponentExecutor } from './executor.js'

/**
 * Several executors registered as one view. Ids of every child share the
 * client entry (and its timeout); each interaction goes to the child that
 * declares its id, exact ids before the longest prefix.
 */
export class MultiComponentExecutor implements IComponentExecutor {
  private readonly executors: IComponentExecutor[] = []
  private readonly rows: Array<ActionRowExecutor | ActionRow> = []

  get customIds(): string[] {
    return this.executors.flatMap((e) => [...e.customIds])
  }

  get prefixIds(): string[] {
    return this.executors.flatMap((e) => [...e.prefixIds])
  }

  /** Child executors in the order they were added. */
  get children(): IComponentExecutor[] {
    return [...this.executors]
  }

  addExecutor(executor: IComponentExecutor): this {
    this.executors.push(executor)
    return this
  }

  /** Adds the row both as a child executor and as a component row. */
  addActionRow(row: ActionRowExecutor): this {
    this.rows.push(row)
    return this.addExecutor(row)
  }

  /** Adds a row with no callbacks, such as a row of link buttons. */
  addStaticRow(row: ActionRow): this {
    this.rows.push(row)
    return this
  }

  /** Component rows to send with the message. */
  build(): ActionRow[] {
    return this.rows.map((row) => (row instanceof ActionRowExecutor ? row.build() : row))
  }

  async execute(ctx: ComponentContext): Promise<void> {
    const child = this.route(ctx)
    if (!child) throw new RoutingError(ctx.interaction.customId)

    await child.execute(ctx)
  }

  private route(ctx: ComponentContext): IComponentExecutor | undefined {
    const exact = this.executors.find((e) => e.customIds.includes(ctx.idMatch))
    if (exact) return exact

    let best: { length: number; executor: IComponentExecutor } | undefined
    for (const executor of this.executors) {
      for (const prefix of executor.prefixIds) {
        if (ctx.interaction.customId.startsWith(prefix) && (!best || prefix.length > best.length)) {
          best = { length: prefix.length, executor }
        }
      }
    }
    return best?.executor
  }
}
