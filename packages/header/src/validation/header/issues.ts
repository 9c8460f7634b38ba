import { ErrorCode, HashlinkError } from '@hashlink/utils'

export function invalidHeader(
  message: string,
  details?: readonly string[],
): HashlinkError {
  const suffix = details && details.length > 0 ? `: ${details.join('; ')}` : ''
  return new HashlinkError(
    ErrorCode.INVALID_HEADER,
    `${message}${suffix}`,
    details,
  )
}
