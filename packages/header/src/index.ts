export * from './constants'
export {
  createHeaderHasher,
  getHasher,
  HASHER_NAMES,
  type HasherName,
  hashHeader,
  keccak256Hasher,
  sha256Hasher,
} from './hasher'
export * from './header'
export * from './types'
export {
  type ValidatedHeaderData,
  zHeaderDataSchema,
  zJSONHeaderSchema,
} from './validation'
export * from './verify'
