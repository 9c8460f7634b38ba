import {
  bytesToHex as bytesToUnprefixed,
  concatBytes as _concatBytes,
  equalsBytes as _equalsBytes,
  hexToBytes as _hexToBytes,
} from 'ethereum-cryptography/utils.js'
import { BIGINT_0 } from './constants'

export type PrefixedHexString = `0x${string}`

export const isHexString = (value: string): value is PrefixedHexString =>
  /^0x[0-9a-fA-F]*$/.test(value)

export const stripHexPrefix = (value: string): string =>
  value.startsWith('0x') ? value.slice(2) : value

export const padToEven = (value: string): string =>
  value.length % 2 ? `0${value}` : value

export const bytesToHex = (bytes: Uint8Array): PrefixedHexString =>
  `0x${bytesToUnprefixed(bytes)}`

/**
 * Accepts prefixed or unprefixed hex. Odd-length input is left-padded
 * with a single zero nibble.
 */
export const hexToBytes = (hex: string): Uint8Array =>
  _hexToBytes(padToEven(stripHexPrefix(hex)))

export const equalsBytes = (a: Uint8Array, b: Uint8Array): boolean =>
  _equalsBytes(a, b)

export const concatBytes = (...arrays: Uint8Array[]): Uint8Array =>
  _concatBytes(...arrays)

export const bytesToBigInt = (bytes: Uint8Array): bigint => {
  if (bytes.length === 0) return BIGINT_0
  return BigInt(`0x${bytesToUnprefixed(bytes)}`)
}

export const bigIntToHex = (value: bigint): PrefixedHexString =>
  `0x${value.toString(16)}`

export const bigIntToBytes = (value: bigint): Uint8Array => {
  if (value < BIGINT_0) {
    throw new Error(`Cannot convert negative bigint to bytes: ${value}`)
  }
  return hexToBytes(value.toString(16))
}

/**
 * Minimal big-endian encoding: zero becomes the empty byte string.
 */
export const bigIntToUnpaddedBytes = (value: bigint): Uint8Array =>
  value === BIGINT_0 ? new Uint8Array(0) : bigIntToBytes(value)

export const copyBytes = (bytes: Uint8Array): Uint8Array =>
  Uint8Array.from(bytes)
