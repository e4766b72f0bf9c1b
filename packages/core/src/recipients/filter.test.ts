import { describe, it, expect } from 'vitest'
import { filterRecipients, isValidPhone } from './filter'
import { CapturingLogger } from '../../test/providerHarness'

describe('isValidPhone', () => {
  it('accepts a plus sign followed by digits only', () => {
    expect(isValidPhone('+15551234567')).toBe(true)
    expect(isValidPhone('+1')).toBe(true)
  })

  it('rejects anything else', () => {
    for (const phone of ['15551234567', '+1 555 123', '+1-555-1234', 'bad-phone', '+', '', '+1555x', ' +1555']) {
      expect(isValidPhone(phone)).toBe(false)
    }
  })
})

describe('filterRecipients', () => {
  const alice = { name: 'Alice', phone: '+15551234567' }
  const bob = { name: 'Bob', phone: 'bad-phone' }
  const carl = { name: 'Carl', phone: '+15559876543' }

  it('skips invalid and opted-out numbers and keeps input order', () => {
    const result = filterRecipients([alice, bob, carl], new Set(['+15559876543']))
    expect(result.eligible).toEqual([{ index: 0, recipient: alice }])
    expect(result.skipped).toEqual([
      { index: 1, recipient: bob, outcome: { kind: 'skipped_invalid_phone' } },
      { index: 2, recipient: carl, outcome: { kind: 'skipped_opted_out' } },
    ])
  })

  it('reports an invalid phone as invalid even when it is on the opt-out list', () => {
    const result = filterRecipients([bob], new Set(['bad-phone']))
    expect(result.skipped[0].outcome).toEqual({ kind: 'skipped_invalid_phone' })
  })

  it('keeps duplicate phone numbers as separate jobs', () => {
    const twin = { name: 'Alice again', phone: alice.phone }
    const result = filterRecipients([alice, twin], new Set())
    expect(result.eligible.map((e) => e.index)).toEqual([0, 1])
  })

  it('logs each skip with its severity', () => {
    const logger = new CapturingLogger()
    filterRecipients([alice, bob, carl], new Set([carl.phone]), logger)
    expect(logger.lines).toEqual([
      { level: 'warn', message: 'Invalid phone number skipped', details: { name: 'Bob', phone: 'bad-phone' } },
      { level: 'info', message: 'Skipping opted-out number', details: { name: 'Carl', phone: '+15559876543' } },
    ])
  })
})
