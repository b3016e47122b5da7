export { ModalClient, MODAL_TIMED_OUT_MESSAGE } from './client.js'
export { ModalContext } from './context.js'
export { Modal } from './modal.js'
export type { IModal, ModalCallback, ModalOptions } from './modal.js'
export { ModalTemplate } from './template.js'
export type { FieldDescriptor, ModalValues, SelectOptions, TextInputOptions } from './template.js'
