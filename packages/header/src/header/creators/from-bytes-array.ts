import type { NestedUint8Array } from '@hashlink/rlp'
import { bytesToBigInt, copyBytes, DIGEST_LENGTH } from '@hashlink/utils'
import { HEADER_FIELD_COUNT, PLACEHOLDER_FIELDS } from '../../constants'
import type { CreateHeaderOptions, Header } from '../../types'
import { invalidHeader } from '../../validation'
import { buildHeader } from './finalize'

export function fromBytesArray(
  values: ReadonlyArray<Uint8Array | NestedUint8Array>,
  opts: CreateHeaderOptions = {},
): Header {
  if (values.length !== HEADER_FIELD_COUNT) {
    throw invalidHeader(
      `Invalid header. Expected ${HEADER_FIELD_COUNT} fields, got ${values.length}`,
    )
  }
  const [parent, height, ...placeholders] = values

  if (!(parent instanceof Uint8Array) || parent.length !== DIGEST_LENGTH) {
    throw invalidHeader('Invalid header. parent must be a 32-byte digest')
  }
  if (!(height instanceof Uint8Array)) {
    throw invalidHeader('Invalid header. height must be a byte string')
  }
  if (height.length > 0 && height[0] === 0) {
    throw invalidHeader('Invalid header. height must not have leading zeros')
  }
  placeholders.forEach((value, i) => {
    if (!(value instanceof Uint8Array) || value.length !== 0) {
      throw invalidHeader(
        `Invalid header. ${PLACEHOLDER_FIELDS[i]} must be empty`,
      )
    }
  })

  return buildHeader(copyBytes(parent), bytesToBigInt(height), opts)
}
