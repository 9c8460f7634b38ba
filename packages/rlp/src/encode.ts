import { concatBytes } from '@hashlink/utils'
import type { Input } from './types'
import { lengthToBytes, toBytes } from './utils'

const STRING_OFFSET = 0x80
const LIST_OFFSET = 0xc0
const SHORT_LIMIT = 56

export function encode(input: Input): Uint8Array {
  if (Array.isArray(input)) {
    const payload = concatBytes(...input.map((item) => encode(item)))
    return concatBytes(encodeLength(payload.length, LIST_OFFSET), payload)
  }
  const bytes = toBytes(input)
  if (bytes.length === 1 && bytes[0] < STRING_OFFSET) {
    return bytes
  }
  return concatBytes(encodeLength(bytes.length, STRING_OFFSET), bytes)
}

function encodeLength(length: number, offset: number): Uint8Array {
  if (length < SHORT_LIMIT) {
    return Uint8Array.from([offset + length])
  }
  const lengthBytes = lengthToBytes(length)
  return concatBytes(
    Uint8Array.from([offset + SHORT_LIMIT - 1 + lengthBytes.length]),
    lengthBytes,
  )
}
