import {
  bigIntToUnpaddedBytes,
  ErrorCode,
  HashlinkError,
  hexToBytes,
  isHexString,
} from '@hashlink/utils'
import type { Input } from './types'

export const invalidRLP = (message: string): HashlinkError =>
  new HashlinkError(ErrorCode.INVALID_RLP, `invalid RLP: ${message}`)

/**
 * Normalizes a scalar input to bytes. Prefixed hex strings are decoded,
 * any other string is taken as UTF-8.
 */
export function toBytes(v: Exclude<Input, Input[]>): Uint8Array {
  if (v instanceof Uint8Array) return v
  if (v === null || v === undefined) return new Uint8Array(0)
  if (typeof v === 'string') {
    return isHexString(v) ? hexToBytes(v) : new TextEncoder().encode(v)
  }
  if (typeof v === 'number') {
    if (!Number.isSafeInteger(v) || v < 0) {
      throw invalidRLP(`cannot encode number ${v}`)
    }
    return bigIntToUnpaddedBytes(BigInt(v))
  }
  if (v < 0n) throw invalidRLP(`cannot encode negative bigint ${v}`)
  return bigIntToUnpaddedBytes(v)
}

/**
 * Big-endian length prefix bytes, without leading zeros.
 */
export function lengthToBytes(length: number): Uint8Array {
  return bigIntToUnpaddedBytes(BigInt(length))
}

export function bytesToLength(bytes: Uint8Array): number {
  if (bytes[0] === 0) throw invalidRLP('extra zeros')
  let length = 0
  for (const byte of bytes) {
    length = length * 256 + byte
  }
  return length
}

export function safeSlice(input: Uint8Array, start: number, end: number) {
  if (end > input.length) {
    throw invalidRLP('end slice of Uint8Array out-of-bounds')
  }
  return input.slice(start, end)
}
