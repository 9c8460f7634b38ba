import { z, zBytes32, zHeight } from '@hashlink/schema'
import { BIGINT_0 } from '@hashlink/utils'
import { sentinelDigest } from '../../constants'

const PARENT_ERROR = 'parent must be a 32-byte digest'

export const zHeaderDataSchema = z
  .object({
    parent: zBytes32({
      defaultValue: sentinelDigest(),
      errorMessage: PARENT_ERROR,
    }),
    height: zHeight({ defaultValue: BIGINT_0 }),
  })
  .strict()

export const zJSONHeaderSchema = z
  .object({
    parent: z.string().pipe(zBytes32({ errorMessage: PARENT_ERROR })),
    height: z.string().pipe(zHeight()),
    extrinsicsRoot: z.null(),
    stateRoot: z.null(),
    consensusDigest: z.null(),
  })
  .strict()

export type ValidatedHeaderData = z.infer<typeof zHeaderDataSchema>
