/**
 * Retention Policy Tests
 *
 * Threshold predicates and their boundaries, domain protection, and option
 * validation. Zero disables a threshold; it never means "zero tolerance".
 */

import { describe, it, expect } from 'vitest'
import { ConfigurationError } from '../lib/purge/errors'
import { RetentionPolicy, parseRetentionOptions } from '../lib/purge/retention-policy'
import { day } from './helpers/fake-account-client'

function policy(maxReposts: number, staleLimitDays: number, protectedDomains: string[] = []) {
  return new RetentionPolicy({ maxReposts, staleLimitDays, protectedDomains })
}

describe('RetentionPolicy construction', () => {
  it('refuses a policy with both thresholds disabled', () => {
    expect(() => policy(0, 0)).toThrow(ConfigurationError)
    expect(() => policy(0, 0)).toThrow(/No deletion threshold configured/)
  })

  it('allows an inert archive-only policy when asked explicitly', () => {
    const archiveOnly = new RetentionPolicy(
      { maxReposts: 0, staleLimitDays: 0, protectedDomains: [] },
      { allowArchiveOnly: true }
    )
    expect(archiveOnly.isActive).toBe(false)
  })

  it('is active when either threshold is set', () => {
    expect(policy(5, 0).isActive).toBe(true)
    expect(policy(0, 5).isActive).toBe(true)
  })
})

describe('parseRetentionOptions', () => {
  it('fills defaults', () => {
    expect(parseRetentionOptions({ staleLimitDays: 3 })).toEqual({
      maxReposts: 0,
      staleLimitDays: 3,
      protectedDomains: [],
      autoConfirm: false,
    })
  })

  it('rejects negative thresholds with the field name', () => {
    try {
      parseRetentionOptions({ maxReposts: -1, staleLimitDays: 2 })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError)
      const issues = err instanceof ConfigurationError ? err.issues : []
      expect(issues).toHaveLength(1)
      expect(issues[0]).toMatch(/^maxReposts: /)
    }
  })

  it('rejects fractional days', () => {
    expect(() => RetentionPolicy.fromInput({ staleLimitDays: 1.5 })).toThrow(ConfigurationError)
  })

  it('rejects an empty fixed likes cursor', () => {
    expect(() => parseRetentionOptions({ staleLimitDays: 1, fixedLikesCursor: '' })).toThrow(
      ConfigurationError
    )
  })
})

describe('isStale', () => {
  const p = policy(0, 2)
  const now = day(100)

  it('is stale at exactly the limit', () => {
    expect(p.isStale(day(98), now)).toBe(true)
  })

  it('is not stale one day under the limit', () => {
    expect(p.isStale(day(99), now)).toBe(false)
  })

  it('counts whole days only', () => {
    expect(p.isStale(new Date(day(98).getTime() + 1), now)).toBe(false)
  })

  it('is stale well past the limit', () => {
    expect(p.isStale(day(1), now)).toBe(true)
  })

  it('never marks future or unparseable timestamps stale', () => {
    expect(p.isStale(day(120), now)).toBe(false)
    expect(p.isStale(new Date('not a date'), now)).toBe(false)
  })

  it('is disabled at 0', () => {
    expect(policy(10, 0).isStale(day(0), now)).toBe(false)
  })
})

describe('isViral', () => {
  const p = policy(100, 0)

  it('keeps a count equal to the limit', () => {
    expect(p.isViral(100)).toBe(false)
  })

  it('flags one above the limit', () => {
    expect(p.isViral(101)).toBe(true)
  })

  it('treats 0 as disabled, not zero tolerance', () => {
    const disabled = policy(0, 30)
    expect(disabled.isViral(0)).toBe(false)
    expect(disabled.isViral(1_000_000)).toBe(false)
  })
})

describe('touchesProtectedDomain', () => {
  const p = policy(1, 0, [' Example.COM ', '', 'news.test'])

  it('normalizes configured domains', () => {
    expect([...p.protectedDomains]).toEqual(['example.com', 'news.test'])
  })

  it('matches case-insensitively', () => {
    expect(p.touchesProtectedDomain(['EXAMPLE.com'])).toBe(true)
  })

  it('matches subdomains', () => {
    expect(p.touchesProtectedDomain(['blog.example.com'])).toBe(true)
    expect(p.touchesProtectedDomain(['example.com.'])).toBe(true)
  })

  it('does not match lookalike hosts', () => {
    expect(p.touchesProtectedDomain(['badexample.com'])).toBe(false)
    expect(p.touchesProtectedDomain(['example.com.evil.net'])).toBe(false)
  })

  it('needs only one protected domain among many', () => {
    expect(p.touchesProtectedDomain(['other.org', 'news.test'])).toBe(true)
    expect(p.touchesProtectedDomain([])).toBe(false)
  })

  it('protects nothing when no domains are configured', () => {
    expect(policy(1, 0).touchesProtectedDomain(['example.com'])).toBe(false)
  })
})
