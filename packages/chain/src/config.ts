import { getHasher, HASHER_NAMES } from '@hashlink/header'
import { formatIssues, z } from '@hashlink/schema'
import {
  deepFreeze,
  ErrorCode,
  HashlinkError,
  type Safe,
  safeSyncTry,
} from '@hashlink/utils'
import type { FrozenChainConfig } from './types'

export const zChainConfigSchema = z
  .object({
    hasher: z.enum(HASHER_NAMES).default('keccak256'),
    freeze: z.boolean().default(true),
  })
  .strict()

/**
 * Validates a plain config object and resolves the hasher by name.
 *
 * @example
 * ```ts
 * const config = createChainConfig({ hasher: 'sha256' })
 * ```
 */
export function createChainConfig(input: unknown = {}): FrozenChainConfig {
  const result = zChainConfigSchema.safeParse(input)
  if (!result.success) {
    const details = formatIssues(result.error)
    throw new HashlinkError(
      ErrorCode.INVALID_CONFIG,
      `Invalid chain config: ${details.join('; ')}`,
      details,
    )
  }
  return deepFreeze({
    hasherName: result.data.hasher,
    hasher: getHasher(result.data.hasher),
    freeze: result.data.freeze,
  })
}

export function safeCreateChainConfig(
  input: unknown = {},
): Safe<FrozenChainConfig> {
  return safeSyncTry(() => createChainConfig(input))
}
