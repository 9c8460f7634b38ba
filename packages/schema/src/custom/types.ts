export type FlexibleTypeInput =
  | Uint8Array
  | bigint
  | number
  | string
  | null
  | undefined

export interface FlexibleTypeOptions {
  errorMessage?: string
  /** Used when the input is null or undefined. Without it such input fails. */
  defaultValue?: Uint8Array
  /** Exact byte length the decoded value must have. */
  byteLength?: number
}
