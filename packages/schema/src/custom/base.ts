import { bigIntToBytes, copyBytes } from '@hashlink/utils'
import { type Hex, hexToBytes } from 'viem'
import { z } from 'zod'
import type { FlexibleTypeInput, FlexibleTypeOptions } from './types'

const HEX_PATTERN = /^(0x)?[a-fA-F0-9]*$/

function isFlexibleInput(val: unknown, hasDefault: boolean): boolean {
  if (val === null || val === undefined) return hasDefault
  if (val instanceof Uint8Array) return true
  if (typeof val === 'bigint') return val >= 0n
  if (typeof val === 'number') return Number.isSafeInteger(val) && val >= 0
  if (typeof val === 'string') return HEX_PATTERN.test(val)
  return false
}

function toBytes(
  val: FlexibleTypeInput,
  defaultValue: Uint8Array | undefined,
): Uint8Array {
  if (val === null || val === undefined) {
    return defaultValue ? copyBytes(defaultValue) : new Uint8Array(0)
  }
  if (val instanceof Uint8Array) return val
  if (typeof val === 'bigint') return bigIntToBytes(val)
  if (typeof val === 'number') return bigIntToBytes(BigInt(val))
  const hex: Hex = val.startsWith('0x') ? `0x${val.slice(2)}` : `0x${val}`
  return hexToBytes(hex)
}

/**
 * Accepts bytes, unsigned integers or hex strings and normalizes them
 * to a Uint8Array.
 */
export function zFlexibleType(options: FlexibleTypeOptions = {}) {
  const { errorMessage, defaultValue, byteLength } = options

  return z
    .custom<FlexibleTypeInput>(
      (val) => isFlexibleInput(val, defaultValue !== undefined),
      {
        message:
          errorMessage ??
          'Invalid input: must be Uint8Array, unsigned integer, or hex string',
      },
    )
    .transform((val, ctx) => {
      const bytes = toBytes(val, defaultValue)
      if (byteLength !== undefined && bytes.length !== byteLength) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message:
            errorMessage ?? `Expected ${byteLength} bytes, got ${bytes.length}`,
        })
        return z.NEVER
      }
      return bytes
    })
}
