import { bigIntToBytes, bytesToBigInt } from '@hashlink/utils'
import { zFlexibleType } from './base'

export const zBigInt = (
  options: { defaultValue?: bigint; errorMessage?: string } = {},
) =>
  zFlexibleType({
    defaultValue:
      options.defaultValue === undefined
        ? undefined
        : bigIntToBytes(options.defaultValue),
    errorMessage: options.errorMessage,
  }).transform(bytesToBigInt)

/**
 * Header heights are unsigned; negative or fractional input fails.
 */
export const zHeight = (options: { defaultValue?: bigint } = {}) =>
  zBigInt({
    defaultValue: options.defaultValue,
    errorMessage: 'height must be an unsigned integer',
  })
