/**
 * Custom ID codec: routing key + opaque metadata packed into one string.
 *
 * Wire format: `<match>[:<metadata>]`. The match segment is what the
 * registries key on; metadata is round-tripped untouched to the handler
 * (session ids, page numbers, target user ids...).
 */

import { randomUUID } from 'node:crypto'

export const CUSTOM_ID_DELIMITER = ':'

export interface SplitCustomId {
  match: string
  metadata: string
}

/** Split on the first delimiter. Metadata is '' when there is none. */
export function splitCustomId(customId: string): SplitCustomId {
  const idx = customId.indexOf(CUSTOM_ID_DELIMITER)
  if (idx === -1) return { match: customId, metadata: '' }

  return {
    match: customId.slice(0, idx),
    metadata: customId.slice(idx + CUSTOM_ID_DELIMITER.length),
  }
}

export function joinCustomId(match: string, metadata?: string): string {
  return metadata ? `${match}${CUSTOM_ID_DELIMITER}${metadata}` : match
}

/**
 * Resolve the id a registration will use.
 * Without an explicit id a random UUID is both the match and the full id.
 */
export function generateCustomId(customId?: string): { match: string; customId: string } {
  if (customId === undefined) {
    const id = randomUUID()
    return { match: id, customId: id }
  }

  return { match: splitCustomId(customId).match, customId }
}
