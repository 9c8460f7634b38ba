import { deepFreeze } from '@hashlink/utils'
import { PLACEHOLDERS } from '../../constants'
import type { CreateHeaderOptions, Header } from '../../types'

/**
 * Assembles a header from its linkage fields. Placeholders are always the
 * opaque defaults; nothing carries over from a parent.
 */
export function buildHeader(
  parent: Uint8Array,
  height: bigint,
  opts: CreateHeaderOptions = {},
): Header {
  const header: Header = { parent, height, ...PLACEHOLDERS }
  return opts.freeze === false ? header : deepFreeze(header)
}
