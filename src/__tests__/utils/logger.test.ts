/**
 * Tests for log sanitizing
 */
import { describe, it, expect } from 'vitest'
import { sanitizeLog } from '../../utils/logger'

describe('sanitizeLog', () => {
  it('should redact credentials and card data at any depth', () => {
    const result = sanitizeLog({
      Authorization: 'K',
      orderId: 'O1',
      nested: { maskedPan: '400000******0002', amount: 5 },
      list: [{ secretKey: 'test-secret', code: '00000' }],
    })

    expect(result).toEqual({
      Authorization: '***REDACTED***',
      orderId: 'O1',
      nested: { maskedPan: '***REDACTED***', amount: 5 },
      list: [{ secretKey: '***REDACTED***', code: '00000' }],
    })
  })

  it('should only redact card number keys that match exactly', () => {
    const result = sanitizeLog({ pan: '400000******0002', company: 'Test Co', expand: true, panel: 'main' })

    expect(result).toEqual({ pan: '***REDACTED***', company: 'Test Co', expand: true, panel: 'main' })
  })

  it('should return primitives unchanged', () => {
    expect(sanitizeLog('plain')).toBe('plain')
    expect(sanitizeLog(42)).toBe(42)
    expect(sanitizeLog(null)).toBeNull()
  })
})
