import { BIGINT_0, equalsBytes } from '@hashlink/utils'
import { sentinelDigest } from '../../constants'
import type { Header } from '../../types'

export function isGenesis(header: Header): boolean {
  return header.height === BIGINT_0 && equalsBytes(header.parent, sentinelDigest())
}

export function equalsHeader(a: Header, b: Header): boolean {
  return a.height === b.height && equalsBytes(a.parent, b.parent)
}

/**
 * Structural check for values that reach the verifier from untyped
 * sources. Placeholders are not inspected.
 */
export function isHeader(value: unknown): value is Header {
  if (typeof value !== 'object' || value === null) return false
  if (!('parent' in value) || !('height' in value)) return false
  const { parent, height } = value
  return (
    parent instanceof Uint8Array &&
    typeof height === 'bigint' &&
    height >= BIGINT_0
  )
}
