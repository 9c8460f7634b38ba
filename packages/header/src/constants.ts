import { DIGEST_LENGTH } from '@hashlink/utils'
import type {
  Digest,
  PlaceholderField,
  Placeholders,
  Unimplemented,
} from './types'

/**
 * Parent digest of the genesis header: 32 zero bytes. Every call returns a
 * fresh buffer, so writes to one never reach genesis or isGenesis.
 */
export const sentinelDigest = (): Digest => new Uint8Array(DIGEST_LENGTH)

/**
 * Number of fields in the raw header layout.
 */
export const HEADER_FIELD_COUNT = 5

export const PLACEHOLDER_FIELDS: readonly PlaceholderField[] = [
  'extrinsicsRoot',
  'stateRoot',
  'consensusDigest',
]

const unimplemented = <F extends PlaceholderField>(
  field: F,
): Unimplemented<F> => Object.freeze({ _tag: 'unimplemented', field })

export const PLACEHOLDERS: Placeholders = Object.freeze({
  extrinsicsRoot: unimplemented('extrinsicsRoot'),
  stateRoot: unimplemented('stateRoot'),
  consensusDigest: unimplemented('consensusDigest'),
})
