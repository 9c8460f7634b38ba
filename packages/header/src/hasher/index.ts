import { keccak256 } from 'ethereum-cryptography/keccak.js'
import { sha256 } from 'ethereum-cryptography/sha256.js'
import { serialize } from '../header/helpers/serialize-helpers'
import type { DigestFunction, HeaderHasher } from '../types'

/**
 * Lifts a bytes digest to a header hasher over the canonical RLP encoding.
 */
export function createHeaderHasher(digest: DigestFunction): HeaderHasher {
  return (header) => digest(serialize(header))
}

export const keccak256Hasher: HeaderHasher = createHeaderHasher(keccak256)
export const sha256Hasher: HeaderHasher = createHeaderHasher(sha256)

export const HASHER_NAMES = ['keccak256', 'sha256'] as const
export type HasherName = (typeof HASHER_NAMES)[number]

const HASHERS: Record<HasherName, HeaderHasher> = {
  keccak256: keccak256Hasher,
  sha256: sha256Hasher,
}

export function getHasher(name: HasherName): HeaderHasher {
  return HASHERS[name]
}

/**
 * Default hasher used wherever none is injected.
 */
export const hashHeader: HeaderHasher = keccak256Hasher
