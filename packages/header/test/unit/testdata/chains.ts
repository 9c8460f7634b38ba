import {
  childOf,
  genesis,
  hashHeader,
  type Header,
  type HeaderHasher,
} from '../../../src/index.ts'

/**
 * Genesis followed by `length - 1` children, every link built by childOf.
 */
export function buildValidChain(
  length: number,
  hasher: HeaderHasher = hashHeader,
): Header[] {
  const chain: Header[] = [genesis()]
  while (chain.length < length) {
    chain.push(childOf(chain[chain.length - 1], { hasher }))
  }
  return chain
}

/**
 * Starts with a proper genesis, but the header at index 1 commits to its own
 * digest instead of its parent's. The header after it is derived normally
 * from the corrupted one.
 */
export function buildInvalidChain(): Header[] {
  const g = genesis()
  const b1 = childOf(g)
  const corrupted: Header = { ...b1, parent: hashHeader(b1) }
  return [g, corrupted, childOf(corrupted)]
}

/**
 * Deterministic stand-in hasher: height + 1 in the first byte, then the
 * first 31 bytes of the parent digest.
 */
export const mockHasher: HeaderHasher = (header) => {
  const digest = new Uint8Array(32)
  digest[0] = Number((header.height + 1n) % 256n)
  digest.set(header.parent.subarray(0, 31), 1)
  return digest
}
