/**
 * Retention Policy
 *
 * Validated thresholds and the pure predicates the selection engine applies.
 * A threshold of 0 means "disabled", never "zero tolerance".
 *
 * @module retention-policy
 */

import { z } from 'zod'
import { ConfigurationError } from '@/lib/purge/errors'

const DAY_MS = 24 * 60 * 60 * 1000

export const RetentionOptionsSchema = z.object({
  maxReposts: z.number()
    .int()
    .min(0)
    .default(0)
    .describe('Repost count above which a post is deleted. 0 disables'),
  staleLimitDays: z.number()
    .int()
    .min(0)
    .default(0)
    .describe('Age in whole days at which posts and likes are removed. 0 disables'),
  protectedDomains: z.array(z.string()).default([]),
  fixedLikesCursor: z.string().min(1).optional(),
  autoConfirm: z.boolean().default(false),
})

export type RetentionOptionsInput = z.input<typeof RetentionOptionsSchema>
export type RetentionOptions = z.output<typeof RetentionOptionsSchema>

export function parseRetentionOptions(input: unknown): RetentionOptions {
  const result = RetentionOptionsSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid retention options',
      result.error.issues.map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    )
  }
  return result.data
}

export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/\.$/, '')
}

export class RetentionPolicy {
  readonly maxReposts: number
  readonly staleLimitDays: number
  readonly protectedDomains: ReadonlySet<string>

  /**
   * Throws ConfigurationError when both thresholds are disabled, unless the
   * caller opts into an inert archive-only policy.
   */
  constructor(
    options: Pick<RetentionOptions, 'maxReposts' | 'staleLimitDays' | 'protectedDomains'>,
    { allowArchiveOnly = false }: { allowArchiveOnly?: boolean } = {}
  ) {
    this.maxReposts = options.maxReposts
    this.staleLimitDays = options.staleLimitDays
    this.protectedDomains = new Set(
      options.protectedDomains.map(normalizeDomain).filter(d => d.length > 0)
    )

    if (!this.isActive && !allowArchiveOnly) {
      throw new ConfigurationError(
        'No deletion threshold configured: set maxReposts or staleLimitDays, or request an archive-only run'
      )
    }
  }

  static fromInput(input: unknown, opts?: { allowArchiveOnly?: boolean }): RetentionPolicy {
    return new RetentionPolicy(parseRetentionOptions(input), opts)
  }

  /** False for an archive-only policy, which selects nothing */
  get isActive(): boolean {
    return this.maxReposts > 0 || this.staleLimitDays > 0
  }

  isStale(timestamp: Date, now: Date): boolean {
    if (this.staleLimitDays === 0) return false
    const ageMs = now.getTime() - timestamp.getTime()
    if (Number.isNaN(ageMs)) return false
    return Math.floor(ageMs / DAY_MS) >= this.staleLimitDays
  }

  /** Strictly greater: a count equal to the limit is kept */
  isViral(repostCount: number): boolean {
    if (this.maxReposts === 0) return false
    return repostCount > this.maxReposts
  }

  /** Matches exact hosts and their subdomains, case-insensitively */
  touchesProtectedDomain(domains: readonly string[]): boolean {
    if (this.protectedDomains.size === 0) return false
    return domains.some(raw => {
      const host = normalizeDomain(raw)
      for (const protectedDomain of this.protectedDomains) {
        if (host === protectedDomain || host.endsWith(`.${protectedDomain}`)) return true
      }
      return false
    })
  }
}
