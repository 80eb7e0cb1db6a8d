/**
 * Bluesky Account Purge
 *
 * Archives the account, then unlikes stale likes and deletes posts, replies
 * and reposts that are stale or viral. Posts the account liked itself, and
 * posts linking to protected domains, are kept.
 *
 * Credentials come from BLUESKY_USERNAME / BLUESKY_PASSWORD (or .env).
 *
 * Usage: npx tsx scripts/purge.ts -l 100 -s 2 -d example.com -v -y
 *        npm run purge -- --archive-only
 */

// Must stay first: PURGE_CONFIG reads the environment when it loads
import 'dotenv/config'
import { randomUUID } from 'node:crypto'
import { Command, InvalidArgumentError } from 'commander'
import { PURGE_CONFIG } from '@/lib/config/purge.config'
import { ConfigurationError } from '@/lib/purge/errors'
import { runPurge } from '@/lib/purge/purge-run'
import type { Credentials } from '@/lib/purge/types'
import { BlueskyAccountClient } from '@/lib/services/bluesky-client'
import { promptYesNo } from '@/lib/utils/confirm-prompt'
import { logPurge, type Verbosity } from '@/lib/utils/purge-logger'

interface CliOptions {
  maxReposts: number
  staleLimit: number
  domainsToProtect: string
  fixedLikesCursor: string
  verbose?: boolean
  veryVerbose?: boolean
  yes: boolean
  archiveOnly: boolean
  archiveDir: string
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

function parseDomainList(value: string): string[] {
  return value
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0)
}

function readCredentials(): Credentials {
  const identifier = process.env[PURGE_CONFIG.CREDENTIALS_ENV.USERNAME]
  const password = process.env[PURGE_CONFIG.CREDENTIALS_ENV.PASSWORD]
  if (!identifier || !password) {
    throw new ConfigurationError(
      `${PURGE_CONFIG.CREDENTIALS_ENV.USERNAME} and ${PURGE_CONFIG.CREDENTIALS_ENV.PASSWORD} required`
    )
  }
  return { identifier, password }
}

function createProgram(): Command {
  return new Command()
    .name('purge')
    .description('Archive a Bluesky account, then delete stale or viral posts and stale likes')
    .option(
      '-l, --max-reposts <n>',
      'Repost count above which a post is deleted. 0 disables the limit.',
      parseNonNegativeInt,
      0
    )
    .option(
      '-s, --stale-limit <days>',
      'Age in days at which posts and likes are removed. 0 disables the limit.',
      parseNonNegativeInt,
      0
    )
    .option(
      '-d, --domains-to-protect <list>',
      'Comma separated domains; posts linking to them are never deleted.',
      ''
    )
    .option(
      '-c, --fixed-likes-cursor <cursor>',
      'Stop paging likes at this cursor. Each run logs the last likes cursor it saw.',
      ''
    )
    .option('-v, --verbose', 'Log progress and API calls')
    .option('--very-verbose', 'Also log every item as it is handled')
    .option('-y, --yes', 'Skip confirmation prompts (needed for automation)', false)
    .option('--archive-only', 'Allow a run with no thresholds: archive and delete nothing', false)
    .option('--archive-dir <dir>', 'Directory for repository and media archives', PURGE_CONFIG.ARCHIVE_DIR)
}

async function main(): Promise<void> {
  const program = createProgram()
  await program.parseAsync(process.argv)
  const opts = program.opts<CliOptions>()

  const verbosity: Verbosity = opts.veryVerbose ? 2 : opts.verbose ? 1 : 0
  const logger = logPurge(randomUUID(), { verbosity }, {
    maxReposts: opts.maxReposts,
    staleLimitDays: opts.staleLimit,
    archiveOnly: opts.archiveOnly,
  })

  try {
    const report = await runPurge({
      client: new BlueskyAccountClient(),
      credentials: readCredentials(),
      options: {
        maxReposts: opts.maxReposts,
        staleLimitDays: opts.staleLimit,
        protectedDomains: parseDomainList(opts.domainsToProtect),
        fixedLikesCursor: opts.fixedLikesCursor || undefined,
        autoConfirm: opts.yes,
      },
      archiveOnly: opts.archiveOnly,
      archiveDir: opts.archiveDir,
      logger,
      confirm: promptYesNo,
    })
    process.exitCode = report.exitCode
  } catch (err) {
    logger.error(err, err instanceof Error ? err.name : undefined)
    process.exitCode = 1
  }
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
