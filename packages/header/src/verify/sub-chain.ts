import { BIGINT_1, equalsBytes } from '@hashlink/utils'
import debug from 'debug'
import { hashHeader } from '../hasher'
import { isHeader } from '../header/helpers'
import {
  type Header,
  type HeaderHasher,
  type InvalidLink,
  LinkFailure,
  type VerifyOptions,
} from '../types'

const log = debug('hashlink:header:verify')

function checkLink(
  parent: Header,
  child: unknown,
  hasher: HeaderHasher,
): LinkFailure | undefined {
  if (!isHeader(child)) {
    return LinkFailure.MalformedHeader
  }
  if (!equalsBytes(hasher(parent), child.parent)) {
    return LinkFailure.ParentMismatch
  }
  if (child.height !== parent.height + BIGINT_1) {
    return LinkFailure.HeightMismatch
  }
  return undefined
}

/**
 * Walks `candidates` from `trusted` and returns the first link that does not
 * hold, or undefined when every link does. The walk stops at the first
 * failure, so no later link is ever inspected past a break.
 *
 * `trusted` is assumed valid. A trusted value that is not even shaped like
 * a header fails link 0.
 */
export function findInvalidLink(
  trusted: Header,
  candidates: readonly Header[],
  opts: VerifyOptions = {},
): InvalidLink | undefined {
  if (candidates.length === 0) {
    return undefined
  }
  if (!isHeader(trusted)) {
    log('trusted header is malformed')
    return { index: 0, reason: LinkFailure.MalformedHeader }
  }

  const hasher = opts.hasher ?? hashHeader
  let parent = trusted
  for (const [index, child] of candidates.entries()) {
    const reason = checkLink(parent, child, hasher)
    if (reason !== undefined) {
      log('link %d rejected: %s', index, reason)
      return { index, reason }
    }
    parent = child
  }
  return undefined
}

/**
 * Returns true iff `candidates` is a gap-free, correctly hash-linked
 * extension of `trusted`. An empty sequence is a valid extension. Never
 * throws for malformed candidates; they make the result false.
 */
export function verifySubChain(
  trusted: Header,
  candidates: readonly Header[],
  opts: VerifyOptions = {},
): boolean {
  return findInvalidLink(trusted, candidates, opts) === undefined
}

export function verifyLink(
  parent: Header,
  child: Header,
  opts: VerifyOptions = {},
): boolean {
  return verifySubChain(parent, [child], opts)
}
