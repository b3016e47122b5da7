export { ComponentClient, COMPONENT_TIMED_OUT_MESSAGE } from './client.js'
export { ComponentContext } from './context.js'
export { ComponentExecutor } from './executor.js'
export { ActionRowExecutor, MAX_ROW_BUTTONS } from './action-row.js'
export type { ActionRow, ButtonOptions, InteractiveButtonStyle, StringSelectOptions } from './action-row.js'
export { MultiComponentExecutor } from './multi.js'
export type { ComponentCallback, ComponentExecutorOptions, IComponentExecutor } from './executor.js'
export { WaitForExecutor, WaitForTimeoutError, NOT_ALLOWED_MESSAGE, NOT_READY_MESSAGE } from './wait-for.js'
export type { WaitForOptions } from './wait-for.js'
