import { type Safe, safeSyncTry } from '@hashlink/utils'
import type { CreateHeaderOptions, Header, HeaderData } from '../../types'
import { fromHeaderData } from './from-header-data'
import { fromJSON } from './from-json'
import { fromRLP } from './from-rlp'

/*
 * Tuple variants of the throwing creators, for input that arrives from
 * outside the process.
 */

export function safeFromHeaderData(
  headerData: HeaderData = {},
  opts: CreateHeaderOptions = {},
): Safe<Header> {
  return safeSyncTry(() => fromHeaderData(headerData, opts))
}

export function safeFromRLP(
  serializedHeader: Uint8Array,
  opts: CreateHeaderOptions = {},
): Safe<Header> {
  return safeSyncTry(() => fromRLP(serializedHeader, opts))
}

export function safeFromJSON(
  json: unknown,
  opts: CreateHeaderOptions = {},
): Safe<Header> {
  return safeSyncTry(() => fromJSON(json, opts))
}
