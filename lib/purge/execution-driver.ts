/**
 * Execution Driver
 *
 * Applies a deletion plan one record at a time, unlikes first.
 * A failed mutation is logged and counted; the rest of the plan still runs.
 *
 * @module execution-driver
 */

import { ConfigurationError, errorMessage } from '@/lib/purge/errors'
import type { DeletionPlan } from '@/lib/purge/selection-engine'
import type { AccountClient, AccountSession } from '@/lib/purge/types'
import type { PurgeLogger } from '@/lib/utils/purge-logger'
import { PURGE_CONFIG } from '@/lib/config/purge.config'

export type ConfirmFn = (question: string) => Promise<boolean>

export interface ExecutionOptions {
  autoConfirm: boolean
  /** Required unless autoConfirm is set */
  confirm?: ConfirmFn
  mutationDelayMs?: number
  logger?: PurgeLogger
}

export interface PhaseTally {
  attempted: number
  succeeded: number
  failed: number
  declined: number
}

export interface ExecutionTally {
  likes: PhaseTally
  posts: PhaseTally
}

interface PhaseItem {
  id: string
  label: string
}

function plural(n: number): string {
  return `${n} post${n === 1 ? '' : 's'}`
}

export function confirmationQuestion(verb: 'unlike' | 'delete', count: number): string {
  return `Proceed to ${verb} ${plural(count)}? WARNING: THIS IS DESTRUCTIVE AND CANNOT BE UNDONE. Y/n: `
}

async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

function emptyPhase(): PhaseTally {
  return { attempted: 0, succeeded: 0, failed: 0, declined: 0 }
}

async function runPhase(
  verb: 'unlike' | 'delete',
  items: readonly PhaseItem[],
  mutate: (id: string) => Promise<void>,
  options: ExecutionOptions
): Promise<PhaseTally> {
  const tally = emptyPhase()
  if (items.length === 0) return tally

  const { logger } = options

  if (!options.autoConfirm) {
    if (!options.confirm) {
      throw new ConfigurationError('A confirm function is required when autoConfirm is off')
    }
    const approved = await options.confirm(confirmationQuestion(verb, items.length))
    if (!approved) {
      tally.declined = items.length
      logger?.milestone(`execute.${verb}.declined`, { count: items.length })
      return tally
    }
  }

  const delayMs = options.mutationDelayMs ?? PURGE_CONFIG.MUTATION_DELAY_MS
  logger?.milestone(`execute.${verb}.start`, { count: items.length })

  for (const [index, item] of items.entries()) {
    if (index > 0 && delayMs > 0) await sleep(delayMs)

    tally.attempted++
    logger?.detail(`execute.${verb}`, { id: item.id, item: item.label })
    try {
      await mutate(item.id)
      tally.succeeded++
    } catch (err) {
      tally.failed++
      logger?.api('bluesky', verb, 'error', { id: item.id, message: errorMessage(err) })
    }

    if (tally.attempted % PURGE_CONFIG.PROGRESS_INTERVAL === 0) {
      logger?.progress(`execute.${verb}`, {
        done: tally.attempted,
        total: items.length,
        failed: tally.failed,
      })
    }
  }

  logger?.milestone(`execute.${verb}.done`, { ...tally })
  return tally
}

export async function executePlan(
  client: AccountClient,
  session: AccountSession,
  plan: DeletionPlan,
  options: ExecutionOptions
): Promise<ExecutionTally> {
  const likes = await runPhase(
    'unlike',
    plan.likesToRemove.map(l => ({ id: l.id, label: l.targetId })),
    id => client.unlike(session, id),
    options
  )

  const posts = await runPhase(
    'delete',
    plan.postsToDelete.map(p => ({ id: p.id, label: `${p.kind} (${p.reasons.join(', ')})` })),
    id => client.deletePost(session, id),
    options
  )

  return { likes, posts }
}
