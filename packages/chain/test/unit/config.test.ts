import { keccak256Hasher, sha256Hasher } from '@hashlink/header'
import { ErrorCode, isHashlinkError } from '@hashlink/utils'
import { assert, describe, expect, it } from 'vitest'
import { createChainConfig, safeCreateChainConfig } from '../../src/index.ts'

function configError(input: unknown) {
  try {
    createChainConfig(input)
  } catch (err) {
    if (isHashlinkError(err)) return err
    throw err
  }
  throw new Error('expected createChainConfig to throw')
}

describe('[ChainConfig]: defaults', () => {
  it('should default to keccak256 and frozen headers', () => {
    const config = createChainConfig()
    assert.equal(config.hasherName, 'keccak256')
    assert.equal(config.hasher, keccak256Hasher)
    assert.isTrue(config.freeze)
  })

  it('should treat an empty object like no input', () => {
    const config = createChainConfig({})
    assert.equal(config.hasherName, 'keccak256')
    assert.isTrue(config.freeze)
  })

  it('should resolve the sha256 hasher by name', () => {
    const config = createChainConfig({ hasher: 'sha256', freeze: false })
    assert.equal(config.hasherName, 'sha256')
    assert.equal(config.hasher, sha256Hasher)
    assert.isFalse(config.freeze)
  })

  it('should return a frozen config', () => {
    assert.isTrue(Object.isFrozen(createChainConfig()))
  })
})

describe('[ChainConfig]: validation', () => {
  it('should reject an unknown hasher name', () => {
    const err = configError({ hasher: 'md5' })
    assert.equal(err.code, ErrorCode.INVALID_CONFIG)
    expect(err.message).toMatch(/^Invalid chain config: hasher: /)
    assert.lengthOf(err.details ?? [], 1)
  })

  it('should reject a non-boolean freeze flag', () => {
    const err = configError({ freeze: 'yes' })
    assert.equal(err.code, ErrorCode.INVALID_CONFIG)
    expect(err.message).toMatch(/^Invalid chain config: freeze: /)
  })

  it('should reject unknown keys', () => {
    const err = configError({ hasher: 'sha256', difficulty: 1 })
    assert.equal(err.code, ErrorCode.INVALID_CONFIG)
    expect(err.message).toContain('difficulty')
  })

  it('should reject input that is not an object', () => {
    const err = configError('sha256')
    assert.equal(err.code, ErrorCode.INVALID_CONFIG)
  })
})

describe('[ChainConfig]: safeCreateChainConfig', () => {
  it('should return the config on valid input', () => {
    const [err, config] = safeCreateChainConfig({ hasher: 'sha256' })
    assert.isUndefined(err)
    assert.equal(config?.hasher, sha256Hasher)
  })

  it('should return the config error instead of throwing', () => {
    const [err, config] = safeCreateChainConfig({ freeze: 1 })
    assert.isUndefined(config)
    assert.isTrue(isHashlinkError(err) && err.code === ErrorCode.INVALID_CONFIG)
    expect(err?.message).toMatch(/^Invalid chain config: freeze: /)
  })
})
