import { decode } from './decode'
import { encode } from './encode'

export { decode } from './decode'
export { encode } from './encode'
export type { Decoded, Input, NestedUint8Array } from './types'

export const RLP = { encode, decode }
