/**
 * Purge Run
 *
 * One scheduled maintenance pass: validate policy, authenticate, archive,
 * collect, select, execute, report. Nothing is deleted unless the archive
 * was written and both collections came back complete.
 *
 * @module purge-run
 */

import { archiveAccount, type ArchiveResult } from '@/lib/purge/archiver'
import { collectCandidates, type CandidateSets } from '@/lib/purge/candidate-collector'
import { executePlan, type ConfirmFn, type ExecutionTally } from '@/lib/purge/execution-driver'
import { ConfigurationError } from '@/lib/purge/errors'
import { RetentionPolicy, parseRetentionOptions, type RetentionOptionsInput } from '@/lib/purge/retention-policy'
import {
  guardIncompleteCollections,
  selectForDeletion,
  type DeletionPlan,
} from '@/lib/purge/selection-engine'
import type { AccountClient, Credentials } from '@/lib/purge/types'
import type { PurgeLogger } from '@/lib/utils/purge-logger'

export interface PurgeRunParams {
  client: AccountClient
  credentials: Credentials
  options: RetentionOptionsInput
  /** Permit a run with both thresholds disabled; it archives and deletes nothing */
  archiveOnly?: boolean
  archiveDir: string
  logger: PurgeLogger
  confirm?: ConfirmFn
  mutationDelayMs?: number
  now?: Date
}

export interface PurgeReport {
  exitCode: 0 | 1
  archive: ArchiveResult
  collections?: {
    likes: { count: number; complete: boolean; lastCursor?: string }
    authored: { count: number; complete: boolean; lastCursor?: string }
  }
  plan?: DeletionPlan
  execution?: ExecutionTally
}

/** The like set is complete only if the scan past the ceiling finished too */
function likesComplete(candidates: CandidateSets): boolean {
  return candidates.likes.complete && (candidates.selfLikesPastCeiling?.complete ?? true)
}

function summarizeCollections(candidates: CandidateSets): NonNullable<PurgeReport['collections']> {
  return {
    likes: {
      count: candidates.likes.items.length,
      complete: likesComplete(candidates),
      lastCursor: candidates.likes.lastCursor,
    },
    authored: {
      count: candidates.authored.items.length,
      complete: candidates.authored.complete,
      lastCursor: candidates.authored.lastCursor,
    },
  }
}

export async function runPurge(params: PurgeRunParams): Promise<PurgeReport> {
  const { client, logger } = params
  const now = params.now ?? new Date()

  // ConfigurationError surfaces here, before any network call
  const options = parseRetentionOptions(params.options)
  const policy = new RetentionPolicy(options, { allowArchiveOnly: params.archiveOnly === true })
  if (policy.isActive && !options.autoConfirm && !params.confirm) {
    throw new ConfigurationError('A confirm function is required when autoConfirm is off')
  }

  const session = await client.authenticate(params.credentials)
  logger.setHandle(session.handle)
  logger.milestone('authenticated', { did: session.did })

  const archive = await archiveAccount(client, session, {
    archiveDir: params.archiveDir,
    now,
    logger,
  })

  if (!policy.isActive) {
    logger.complete({ mode: 'archive-only', archive: archive.carPath, blobs: archive.blobCount })
    return { exitCode: 0, archive }
  }

  const candidates = await collectCandidates(client, session, {
    fixedLikesCursor: options.fixedLikesCursor,
    logger,
  })
  const collections = summarizeCollections(candidates)

  const plan = guardIncompleteCollections(
    selectForDeletion(policy, candidates.likes.items, candidates.authored.items, now, session.did, {
      preservationLikes: candidates.selfLikesPastCeiling?.items,
    }),
    { likesComplete: collections.likes.complete, postsComplete: collections.authored.complete }
  )
  logger.milestone('plan', {
    likesToRemove: plan.likesToRemove.length,
    postsToDelete: plan.postsToDelete.length,
    retained: plan.retained,
  })
  if (plan.suppressed) {
    logger.warn('Deletions withheld on incomplete data', { ...plan.suppressed })
  }

  const execution = await executePlan(client, session, plan, {
    autoConfirm: options.autoConfirm,
    confirm: params.confirm,
    mutationDelayMs: params.mutationDelayMs,
    logger,
  })

  const failed = execution.likes.failed + execution.posts.failed
  const incomplete = !collections.likes.complete || !collections.authored.complete
  const exitCode = failed > 0 || incomplete ? 1 : 0

  logger.complete({
    exitCode,
    retained: plan.retained,
    unliked: execution.likes.succeeded,
    deleted: execution.posts.succeeded,
    failed,
    declined: execution.likes.declined + execution.posts.declined,
    withheld: plan.suppressed ?? null,
    likesCursor: collections.likes.lastCursor ?? null,
  })

  return { exitCode, archive, collections, plan, execution }
}
