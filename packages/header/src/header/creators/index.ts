export { childOf } from './child-of'
export { fromBytesArray } from './from-bytes-array'
export { cloneHeader, fromHeaderData } from './from-header-data'
export { fromJSON } from './from-json'
export { fromRLP } from './from-rlp'
export { genesis } from './genesis'
export { safeFromHeaderData, safeFromJSON, safeFromRLP } from './safe'
