import type { Decoded, Input, NestedUint8Array } from './types'
import { bytesToLength, invalidRLP, safeSlice, toBytes } from './utils'

export function decode(
  input: Exclude<Input, Input[]>,
  stream?: false,
): Uint8Array | NestedUint8Array
export function decode(input: Exclude<Input, Input[]>, stream: true): Decoded
export function decode(
  input: Exclude<Input, Input[]>,
  stream = false,
): Uint8Array | NestedUint8Array | Decoded {
  const inputBytes = toBytes(input)
  if (inputBytes.length === 0) {
    return new Uint8Array(0)
  }

  const decoded = _decode(inputBytes)

  if (stream) {
    return {
      data: decoded.data,
      remainder: decoded.remainder.slice(),
    }
  }
  if (decoded.remainder.length !== 0) {
    throw invalidRLP('remainder must be zero')
  }

  return decoded.data
}

function decodeList(payload: Uint8Array): NestedUint8Array {
  const items: NestedUint8Array = []
  let rest = payload
  while (rest.length > 0) {
    const item = _decode(rest)
    items.push(item.data)
    rest = item.remainder
  }
  return items
}

function _decode(input: Uint8Array): Decoded {
  const firstByte = input[0]

  // single byte
  if (firstByte <= 0x7f) {
    return {
      data: input.slice(0, 1),
      remainder: input.subarray(1),
    }
  }

  // short string
  if (firstByte <= 0xb7) {
    const length = firstByte - 0x80
    const data = safeSlice(input, 1, 1 + length)
    if (length === 1 && data[0] < 0x80) {
      throw invalidRLP('single byte < 0x80 must not be prefixed')
    }
    return {
      data,
      remainder: input.subarray(1 + length),
    }
  }

  // long string
  if (firstByte <= 0xbf) {
    const lLength = firstByte - 0xb7
    const length = bytesToLength(safeSlice(input, 1, 1 + lLength))
    if (length <= 55) {
      throw invalidRLP('expected string length to be greater than 55')
    }
    const end = 1 + lLength + length
    return {
      data: safeSlice(input, 1 + lLength, end),
      remainder: input.subarray(end),
    }
  }

  // short list
  if (firstByte <= 0xf7) {
    const length = firstByte - 0xc0
    return {
      data: decodeList(safeSlice(input, 1, 1 + length)),
      remainder: input.subarray(1 + length),
    }
  }

  // long list
  const lLength = firstByte - 0xf7
  const length = bytesToLength(safeSlice(input, 1, 1 + lLength))
  if (length < 56) {
    throw invalidRLP('encoded list too short')
  }
  const end = 1 + lLength + length
  return {
    data: decodeList(safeSlice(input, 1 + lLength, end)),
    remainder: input.subarray(end),
  }
}
