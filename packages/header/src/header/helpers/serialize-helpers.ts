import { RLP } from '@hashlink/rlp'
import {
  bigIntToHex,
  bigIntToUnpaddedBytes,
  bytesToHex,
} from '@hashlink/utils'
import type { Header, HeaderBytes, JSONHeader } from '../../types'

/**
 * Placeholders carry no data and always encode as empty byte strings, so
 * a digest depends on parent and height alone.
 */
export function toRaw(header: Header): HeaderBytes {
  return [
    header.parent,
    bigIntToUnpaddedBytes(header.height),
    new Uint8Array(0),
    new Uint8Array(0),
    new Uint8Array(0),
  ]
}

export function serialize(header: Header): Uint8Array {
  return RLP.encode(toRaw(header))
}

export function toJSON(header: Header): JSONHeader {
  return {
    parent: bytesToHex(header.parent),
    height: bigIntToHex(header.height),
    extrinsicsRoot: null,
    stateRoot: null,
    consensusDigest: null,
  }
}
