/**
 * Values `encode` accepts. Strings are UTF-8 unless 0x-prefixed hex; numbers
 * and bigints are written big-endian without leading zeros.
 */
export type Input =
  | string
  | number
  | bigint
  | Uint8Array
  | Array<Input>
  | null
  | undefined

/** Decoded list: byte strings and nested lists, nothing else. */
export type NestedUint8Array = Array<Uint8Array | NestedUint8Array>

/**
 * Result of decoding one item in streaming mode; `remainder` holds the
 * bytes after it.
 */
export interface Decoded {
  readonly data: Uint8Array | NestedUint8Array
  readonly remainder: Uint8Array
}
