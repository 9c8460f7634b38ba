import { BIGINT_0 } from '@hashlink/utils'
import { sentinelDigest } from '../../constants'
import type { CreateHeaderOptions, Header } from '../../types'
import { buildHeader } from './finalize'

/**
 * Returns the genesis header: height 0, parent the sentinel digest.
 */
export function genesis(opts: CreateHeaderOptions = {}): Header {
  return buildHeader(sentinelDigest(), BIGINT_0, opts)
}
