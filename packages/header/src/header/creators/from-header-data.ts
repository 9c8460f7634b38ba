import { formatIssues } from '@hashlink/schema'
import { copyBytes } from '@hashlink/utils'
import type { CreateHeaderOptions, Header, HeaderData } from '../../types'
import { invalidHeader, zHeaderDataSchema } from '../../validation'
import { buildHeader } from './finalize'

export function fromHeaderData(
  headerData: HeaderData = {},
  opts: CreateHeaderOptions = {},
): Header {
  const result = zHeaderDataSchema.safeParse(headerData)
  if (!result.success) {
    throw invalidHeader('Invalid header data', formatIssues(result.error))
  }
  return buildHeader(copyBytes(result.data.parent), result.data.height, opts)
}

/**
 * Copies a header into a fresh value that shares no buffer with the input.
 */
export function cloneHeader(
  header: Header,
  opts: CreateHeaderOptions = {},
): Header {
  return buildHeader(copyBytes(header.parent), header.height, opts)
}
