import { BIGINT_1, copyBytes } from '@hashlink/utils'
import { hashHeader } from '../../hasher'
import type { ChildHeaderOptions, Header } from '../../types'
import { buildHeader } from './finalize'

/**
 * Derives the header that directly follows `parent`. The parent is only
 * read, never re-verified.
 */
export function childOf(parent: Header, opts: ChildHeaderOptions = {}): Header {
  const hasher = opts.hasher ?? hashHeader
  return buildHeader(
    copyBytes(hasher(parent)),
    parent.height + BIGINT_1,
    opts,
  )
}
