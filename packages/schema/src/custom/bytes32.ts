import { z } from 'zod'
import { zFlexibleType } from './base'

export const zUint8Array32 = z
  .instanceof(Uint8Array)
  .refine((val) => val.length === 32, {
    message: 'Uint8Array must be exactly 32 bytes',
  })

export const zBytes32 = (
  options: { defaultValue?: Uint8Array; errorMessage?: string } = {},
) =>
  zFlexibleType({
    byteLength: 32,
    defaultValue: options.defaultValue,
    errorMessage: options.errorMessage,
  })

export const zBytes = (byteLength: number, errorMessage?: string) =>
  zFlexibleType({ byteLength, errorMessage })
