export const BIGINT_0 = BigInt(0)
export const BIGINT_1 = BigInt(1)

/**
 * Width in bytes of every header digest.
 */
export const DIGEST_LENGTH = 32
