export {
  childOf,
  cloneHeader,
  fromBytesArray,
  fromHeaderData,
  fromJSON,
  fromRLP,
  genesis,
  safeFromHeaderData,
  safeFromJSON,
  safeFromRLP,
} from './creators'
export {
  equalsHeader,
  isGenesis,
  isHeader,
  serialize,
  toJSON,
  toRaw,
} from './helpers'
