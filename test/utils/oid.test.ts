import { describe, it, expect } from 'vitest'
import {
  assertValidOid,
  assertValidSize,
  describeInvalidOid,
  EMPTY_OID,
  isValidOid,
  isValidSize,
  parseSize,
} from '../../src/utils/oid'
import { StorageError } from '../../src/errors'

const HELLO_OID = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'

describe('oid validation', () => {
  describe('isValidOid', () => {
    it('should accept 64 lowercase hex characters', () => {
      expect(isValidOid(HELLO_OID)).toBe(true)
      expect(isValidOid(EMPTY_OID)).toBe(true)
    })

    it('should reject uppercase, short and non-string values', () => {
      expect(isValidOid(HELLO_OID.toUpperCase())).toBe(false)
      expect(isValidOid(HELLO_OID.slice(1))).toBe(false)
      expect(isValidOid(HELLO_OID + '0')).toBe(false)
      expect(isValidOid('g'.repeat(64))).toBe(false)
      expect(isValidOid(42)).toBe(false)
      expect(isValidOid(null)).toBe(false)
    })
  })

  describe('describeInvalidOid', () => {
    it('should return undefined for a valid oid', () => {
      expect(describeInvalidOid(HELLO_OID)).toBeUndefined()
    })

    it('should explain each kind of problem', () => {
      expect(describeInvalidOid(7)).toBe('oid must be a string, got number')
      expect(describeInvalidOid(HELLO_OID.toUpperCase())).toBe(
        'oid must be lowercase hexadecimal characters (got uppercase)'
      )
      expect(describeInvalidOid('abc')).toBe('oid must be 64 lowercase hexadecimal characters, got "abc"')
    })
  })

  describe('assertValidOid', () => {
    it('should throw INVALID_ARGUMENT for a bad oid', () => {
      let caught: unknown
      try {
        assertValidOid('abc')
      } catch (error) {
        caught = error
      }
      expect(caught).toBeInstanceOf(StorageError)
      expect(caught).toMatchObject({
        code: 'INVALID_ARGUMENT',
        message: 'Invalid oid: oid must be 64 lowercase hexadecimal characters, got "abc"',
      })
    })

    it('should not throw for a good oid', () => {
      expect(() => assertValidOid(HELLO_OID)).not.toThrow()
    })
  })

  describe('sizes', () => {
    it('should accept non-negative safe integers', () => {
      expect(isValidSize(0)).toBe(true)
      expect(isValidSize(2048)).toBe(true)
      expect(isValidSize(Number.MAX_SAFE_INTEGER)).toBe(true)
    })

    it('should reject negatives, fractions and non-numbers', () => {
      expect(isValidSize(-1)).toBe(false)
      expect(isValidSize(1.5)).toBe(false)
      expect(isValidSize('10')).toBe(false)
      expect(isValidSize(Number.MAX_SAFE_INTEGER + 1)).toBe(false)
    })

    it('assertValidSize should name the bad value', () => {
      expect(() => assertValidSize(-3)).toThrow('Invalid size: -3')
    })
  })

  describe('parseSize', () => {
    it('should parse canonical decimals', () => {
      expect(parseSize('0')).toBe(0)
      expect(parseSize('2048')).toBe(2048)
    })

    it('should reject anything else', () => {
      expect(parseSize('')).toBeUndefined()
      expect(parseSize('007')).toBeUndefined()
      expect(parseSize('-1')).toBeUndefined()
      expect(parseSize('1e3')).toBeUndefined()
      expect(parseSize(' 12')).toBeUndefined()
      expect(parseSize('99999999999999999999')).toBeUndefined()
    })
  })
})
