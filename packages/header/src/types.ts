import type { FlexibleTypeInput } from '@hashlink/schema'
import type { PrefixedHexString } from '@hashlink/utils'

/**
 * Fixed-width output of a header hasher.
 */
export type Digest = Uint8Array

export type PlaceholderField = 'extrinsicsRoot' | 'stateRoot' | 'consensusDigest'

/**
 * Commitment reserved for a later layer. Carries no data; it only marks
 * which slot of the header it stands in for.
 */
export interface Unimplemented<F extends PlaceholderField> {
  readonly _tag: 'unimplemented'
  readonly field: F
}

export interface Placeholders {
  readonly extrinsicsRoot: Unimplemented<'extrinsicsRoot'>
  readonly stateRoot: Unimplemented<'stateRoot'>
  readonly consensusDigest: Unimplemented<'consensusDigest'>
}

export interface Header extends Placeholders {
  /** Digest of the preceding header, the sentinel digest for genesis. */
  readonly parent: Digest
  readonly height: bigint
}

export type HeaderHasher = (header: Header) => Digest

/**
 * Maps raw bytes to a digest. Wrapped by createHeaderHasher.
 */
export type DigestFunction = (bytes: Uint8Array) => Uint8Array

export interface CreateHeaderOptions {
  /** Defaults to true. */
  readonly freeze?: boolean
}

export interface ChildHeaderOptions extends CreateHeaderOptions {
  readonly hasher?: HeaderHasher
}

export interface VerifyOptions {
  readonly hasher?: HeaderHasher
}

/**
 * Loosely typed header input, validated by fromHeaderData.
 */
export interface HeaderData {
  parent?: FlexibleTypeInput
  height?: FlexibleTypeInput
}

/**
 * Canonical raw layout: parent, height, then the three placeholders.
 */
export type HeaderBytes = Uint8Array[]

export interface JSONHeader {
  parent: PrefixedHexString
  height: PrefixedHexString
  extrinsicsRoot: null
  stateRoot: null
  consensusDigest: null
}

export const LinkFailure = {
  MalformedHeader: 'malformed-header',
  ParentMismatch: 'parent-mismatch',
  HeightMismatch: 'height-mismatch',
} as const

export type LinkFailure = (typeof LinkFailure)[keyof typeof LinkFailure]

/**
 * First link of a candidate sequence that failed. `index` is the position
 * in the candidate sequence; index 0 is the link to the trusted header.
 */
export interface InvalidLink {
  readonly index: number
  readonly reason: LinkFailure
}
