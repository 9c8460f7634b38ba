/**
 * HeaderChainManager - stateful shell over the pure header operations.
 * Immutable config + an owned, append-only header sequence. Headers cross
 * the boundary only as copies, in either direction.
 */

import {
  childOf,
  cloneHeader,
  findInvalidLink,
  genesis,
  type Header,
  verifySubChain,
} from '@hashlink/header'
import {
  BIGINT_0,
  ErrorCode,
  HashlinkError,
  type Safe,
  safeError,
  safeResult,
} from '@hashlink/utils'
import debug from 'debug'
import { EventEmitter } from 'eventemitter3'
import { createChainConfig } from './config'
import type {
  ChainConfigInput,
  FrozenChainConfig,
  HeaderChainEvent,
  HeaderChainManager,
} from './types'

const log = debug('hashlink:chain')

class HeaderChainManagerImpl implements HeaderChainManager {
  readonly config: FrozenChainConfig
  readonly events: EventEmitter<HeaderChainEvent>

  private _headers: Header[]

  constructor(config: FrozenChainConfig) {
    this.config = config
    this.events = new EventEmitter<HeaderChainEvent>()
    this._headers = [genesis({ freeze: config.freeze })]
  }

  // ============================================================================
  // Accessors
  // ============================================================================

  get genesis(): Header {
    return this._copy(this._headers[0])
  }

  get tip(): Header {
    return this._copy(this._tip)
  }

  get height(): bigint {
    return this._tip.height
  }

  get length(): number {
    return this._headers.length
  }

  headers(): readonly Header[] {
    return this._headers.map((header) => this._copy(header))
  }

  getHeader(height: bigint): Header | undefined {
    if (height < BIGINT_0 || height >= BigInt(this._headers.length)) {
      return undefined
    }
    return this._copy(this._headers[Number(height)])
  }

  // ============================================================================
  // Extension
  // ============================================================================

  append(): Header {
    const child = childOf(this._tip, {
      hasher: this.config.hasher,
      freeze: this.config.freeze,
    })
    this._push(child)
    return this._copy(child)
  }

  extend(candidates: readonly Header[]): Safe<Header, HashlinkError> {
    const invalid = findInvalidLink(this._tip, candidates, {
      hasher: this.config.hasher,
    })
    if (invalid !== undefined) {
      log(
        'rejected %d candidates at index %d: %s',
        candidates.length,
        invalid.index,
        invalid.reason,
      )
      this.events.emit('chainRejected', candidates, invalid)
      return safeError(
        new HashlinkError(
          ErrorCode.INVALID_CHAIN,
          `Candidate ${invalid.index} does not extend the chain: ${invalid.reason}`,
        ),
      )
    }

    for (const header of candidates) {
      this._push(this._copy(header))
    }
    return safeResult(this.tip)
  }

  verify(): boolean {
    return verifySubChain(this.genesis, this._headers.slice(1), {
      hasher: this.config.hasher,
    })
  }

  private get _tip(): Header {
    return this._headers[this._headers.length - 1]
  }

  private _copy(header: Header): Header {
    return cloneHeader(header, { freeze: this.config.freeze })
  }

  private _push(header: Header): void {
    this._headers.push(header)
    log('appended header at height %s', header.height)
    this.events.emit('headerAppended', this._copy(header))
  }
}

/**
 * Creates an in-memory header chain holding only its genesis header.
 *
 * @param input - Plain config, validated by createChainConfig
 */
export function createHeaderChain(
  input: ChainConfigInput = {},
): HeaderChainManager {
  const config = createChainConfig(input)
  log('creating header chain with %s hasher', config.hasherName)
  return new HeaderChainManagerImpl(config)
}
