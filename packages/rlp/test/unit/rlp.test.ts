import { bytesToHex, hexToBytes } from '@hashlink/utils'
import { assert, describe, it } from 'vitest'
import { RLP } from '../../src/index.ts'

const utf8 = (value: string) => new TextEncoder().encode(value)

describe('[RLP]: encode', () => {
  it('should encode strings', () => {
    assert.strictEqual(bytesToHex(RLP.encode('dog')), '0x83646f67')
    assert.strictEqual(bytesToHex(RLP.encode('')), '0x80')
    assert.strictEqual(bytesToHex(RLP.encode(new Uint8Array(0))), '0x80')
  })

  it('should encode single bytes below 0x80 as themselves', () => {
    assert.strictEqual(bytesToHex(RLP.encode(Uint8Array.from([0x0f]))), '0x0f')
    assert.strictEqual(bytesToHex(RLP.encode(Uint8Array.from([0x80]))), '0x8180')
  })

  it('should encode integers without leading zeros', () => {
    assert.strictEqual(bytesToHex(RLP.encode(0)), '0x80')
    assert.strictEqual(bytesToHex(RLP.encode(15)), '0x0f')
    assert.strictEqual(bytesToHex(RLP.encode(1024n)), '0x820400')
  })

  it('should encode lists', () => {
    assert.strictEqual(bytesToHex(RLP.encode([])), '0xc0')
    assert.strictEqual(
      bytesToHex(RLP.encode(['cat', 'dog'])),
      '0xc88363617483646f67',
    )
    assert.strictEqual(
      bytesToHex(RLP.encode([[], [[]], [[], [[]]]])),
      '0xc7c0c1c0c3c0c1c0',
    )
  })

  it('should use a length prefix for long strings', () => {
    const encoded = RLP.encode(utf8('a'.repeat(56)))
    assert.strictEqual(encoded.length, 58)
    assert.strictEqual(encoded[0], 0xb8)
    assert.strictEqual(encoded[1], 56)
  })

  it('should reject negative numbers', () => {
    assert.throws(() => RLP.encode(-1), 'cannot encode number')
    assert.throws(() => RLP.encode(-1n), 'cannot encode negative bigint')
  })
})

describe('[RLP]: decode', () => {
  it('should decode strings and lists', () => {
    assert.deepEqual(RLP.decode(hexToBytes('0x83646f67')), utf8('dog'))
    assert.deepEqual(RLP.decode('0xc88363617483646f67'), [
      utf8('cat'),
      utf8('dog'),
    ])
    assert.deepEqual(RLP.decode(hexToBytes('0xc0')), [])
  })

  it('should decode long strings', () => {
    const value = utf8('b'.repeat(60))
    assert.deepEqual(RLP.decode(RLP.encode(value)), value)
  })

  it('should return the remainder in stream mode', () => {
    const decoded = RLP.decode(Uint8Array.from([0x80, 0x05]), true)
    assert.deepEqual(decoded.data, new Uint8Array(0))
    assert.deepEqual(decoded.remainder, Uint8Array.from([0x05]))
  })

  it('should reject non-canonical input', () => {
    assert.throws(
      () => RLP.decode(Uint8Array.from([0x81, 0x01])),
      'single byte < 0x80 must not be prefixed',
    )
    assert.throws(
      () => RLP.decode(Uint8Array.from([0xb8, 0x05, 1, 2, 3, 4, 5])),
      'expected string length to be greater than 55',
    )
    assert.throws(
      () => RLP.decode(Uint8Array.from([0xb9, 0x00, 0x38])),
      'extra zeros',
    )
  })

  it('should reject truncated or trailing bytes', () => {
    assert.throws(
      () => RLP.decode(Uint8Array.from([0x83, 0x61])),
      'out-of-bounds',
    )
    assert.throws(
      () => RLP.decode(Uint8Array.from([0x80, 0x80])),
      'remainder must be zero',
    )
  })
})
