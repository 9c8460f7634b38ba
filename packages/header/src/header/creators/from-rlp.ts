import { RLP } from '@hashlink/rlp'
import type { CreateHeaderOptions, Header } from '../../types'
import { invalidHeader } from '../../validation'
import { fromBytesArray } from './from-bytes-array'

export function fromRLP(
  serializedHeader: Uint8Array,
  opts: CreateHeaderOptions = {},
): Header {
  const values = RLP.decode(serializedHeader)
  if (!Array.isArray(values)) {
    throw invalidHeader('Invalid serialized header input. Must be array')
  }
  return fromBytesArray(values, opts)
}
