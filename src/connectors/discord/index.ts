export { DiscordRestClient, DiscordApiError } from './client.js'
export type { DiscordRestClientOptions } from './client.js'
export { parseInteraction, flattenModalFields } from './handler.js'
export type { ParsedInteraction } from './handler.js'
export { InteractionGateway } from './gateway.js'
export type { DispatchResult } from './gateway.js'
export { InteractionServer } from './interaction-server.js'
export type { HandleResult, InteractionServerOptions } from './interaction-server.js'
export { verifyInteractionSignature, importPublicKey, SIGNATURE_HEADER, TIMESTAMP_HEADER } from './verify.js'
