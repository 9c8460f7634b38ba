export { equalsHeader, isGenesis, isHeader } from './getters'
export { serialize, toJSON, toRaw } from './serialize-helpers'
