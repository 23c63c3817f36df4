/**
 * Shared test content with precomputed oids.
 */

const encoder = new TextEncoder()

/** 2048 bytes: "A\n" repeated 1024 times */
export const A_LINES = encoder.encode('A\n'.repeat(1024))
export const A_LINES_OID = 'ab02c2a1923c8eb11cb3ddab70320746d71d32ad63f255698dc67c3295757746'

/** 2048 bytes of "A" */
export const A_BLOCK = encoder.encode('A'.repeat(2048))
export const A_BLOCK_OID = '3a34c8dc4aec1554c04e0d0e61179d08362b329029db4632f5f086c37be74caa'

/** 100 bytes of "B" */
export const B_BLOCK = encoder.encode('B'.repeat(100))
export const B_BLOCK_OID = 'cfbe7d2db2f3dcdec7c2799f0b7c611e5bdfc145a7639516e8ec1e51a65c70ac'

export const HELLO = encoder.encode('hello')
export const HELLO_OID = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'

export const EMPTY = new Uint8Array(0)
export const EMPTY_OID = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
