import type {
  HasherName,
  Header,
  HeaderHasher,
  InvalidLink,
} from '@hashlink/header'
import type { HashlinkError, Safe } from '@hashlink/utils'
import type { EventEmitter } from 'eventemitter3'

export type HeaderChainEvent = {
  headerAppended: (header: Header) => void
  chainRejected: (candidates: readonly Header[], invalid: InvalidLink) => void
}

export interface ChainConfigInput {
  hasher?: HasherName
  freeze?: boolean
}

export interface FrozenChainConfig {
  readonly hasherName: HasherName
  readonly hasher: HeaderHasher
  /** Whether headers created by the chain are frozen. */
  readonly freeze: boolean
}

/**
 * In-memory chain that owns an ordered sequence of headers starting at
 * genesis. Extension happens only at the tip. Every header it hands out,
 * events included, is a copy of the owned one.
 */
export interface HeaderChainManager {
  readonly config: FrozenChainConfig
  readonly events: EventEmitter<HeaderChainEvent>

  readonly genesis: Header
  readonly tip: Header
  /** Height of the tip. */
  readonly height: bigint
  /** Number of owned headers, genesis included. */
  readonly length: number

  headers(): readonly Header[]
  getHeader(height: bigint): Header | undefined

  /** Derives a child of the tip and appends it. */
  append(): Header
  /**
   * Appends `candidates` if they extend the tip, otherwise appends nothing.
   * Resolves to the new tip.
   */
  extend(candidates: readonly Header[]): Safe<Header, HashlinkError>
  /** Re-verifies every owned header from genesis. */
  verify(): boolean
}
