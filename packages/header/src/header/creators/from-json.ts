import { formatIssues } from '@hashlink/schema'
import type { CreateHeaderOptions, Header } from '../../types'
import { invalidHeader, zJSONHeaderSchema } from '../../validation'
import { buildHeader } from './finalize'

export function fromJSON(json: unknown, opts: CreateHeaderOptions = {}): Header {
  const result = zJSONHeaderSchema.safeParse(json)
  if (!result.success) {
    throw invalidHeader('Invalid JSON header', formatIssues(result.error))
  }
  return buildHeader(result.data.parent, result.data.height, opts)
}
