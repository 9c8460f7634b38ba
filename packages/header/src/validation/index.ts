export { invalidHeader } from './header/issues'
export {
  type ValidatedHeaderData,
  zHeaderDataSchema,
  zJSONHeaderSchema,
} from './header/schema'
