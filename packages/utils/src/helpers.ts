/**
 * Recursively freezes plain objects and arrays. Typed arrays are left
 * as they are: the runtime refuses to freeze a view with elements.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (
    value === null ||
    typeof value !== 'object' ||
    ArrayBuffer.isView(value) ||
    Object.isFrozen(value)
  ) {
    return value
  }
  for (const key of Reflect.ownKeys(value)) {
    deepFreeze(Reflect.get(value, key))
  }
  return Object.freeze(value)
}
