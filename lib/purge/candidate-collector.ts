/**
 * Candidate Collector
 *
 * Pages through the account's like records and authored feed.
 * Likes pagination supports a stop cursor because the remote collection has
 * no date bound and full lookback is slow. The stop cursor bounds unlike
 * candidates only: likes past it are still scanned for self-likes, which
 * mark posts as preserved.
 *
 * @module candidate-collector
 */

import { CollectionError, type CollectionName } from '@/lib/purge/errors'
import { isOwnedBy } from '@/lib/purge/selection-engine'
import type { AccountClient, AccountSession, Like, Page, Post } from '@/lib/purge/types'
import type { PurgeLogger } from '@/lib/utils/purge-logger'

export type FetchPage<T> = (cursor?: string) => Promise<Page<T>>

export interface PaginateOptions {
  /** Stop before requesting the page at this cursor */
  stopCursor?: string
  /** Cursor of the first page to request */
  startCursor?: string
}

export interface PageStep<T> {
  items: readonly T[]
  /** Cursor that fetched this page; undefined for the first page */
  requestCursor?: string
  nextCursor?: string
  reachedCeiling: boolean
}

export interface CollectionResult<T> {
  items: T[]
  complete: boolean
  /** Last next-page cursor observed, for resuming or setting a ceiling */
  lastCursor?: string
  pagesFetched: number
  reachedCeiling: boolean
  error?: CollectionError
}

/**
 * Lazily yield pages until the collection is exhausted or the stop cursor is
 * reached. A cursor the server already handed out throws, so the collection
 * is reported incomplete rather than looping.
 */
export async function* paginate<T>(
  fetchPage: FetchPage<T>,
  { stopCursor, startCursor }: PaginateOptions = {}
): AsyncGenerator<PageStep<T>> {
  const seen = new Set<string>()
  let cursor = startCursor || undefined
  if (cursor) seen.add(cursor)

  while (true) {
    const page = await fetchPage(cursor)
    const nextCursor = page.cursor || undefined
    const reachedCeiling = nextCursor !== undefined && nextCursor === stopCursor

    yield { items: page.items, requestCursor: cursor, nextCursor, reachedCeiling }

    if (!nextCursor || reachedCeiling) return
    if (seen.has(nextCursor)) throw new Error(`Cursor ${nextCursor} was returned twice`)
    seen.add(nextCursor)
    cursor = nextCursor
  }
}

export async function collectPages<T extends { id: string }>(
  collection: CollectionName,
  fetchPage: FetchPage<T>,
  options: PaginateOptions & { logger?: PurgeLogger } = {}
): Promise<CollectionResult<T>> {
  const result: CollectionResult<T> = {
    items: [],
    complete: false,
    pagesFetched: 0,
    reachedCeiling: false,
  }
  const seenIds = new Set<string>()
  let requested = options.startCursor

  try {
    for await (const step of paginate(fetchPage, options)) {
      result.pagesFetched++
      for (const item of step.items) {
        // pinned posts show up twice in the author feed
        if (seenIds.has(item.id)) continue
        seenIds.add(item.id)
        result.items.push(item)
      }
      if (step.nextCursor) result.lastCursor = step.nextCursor
      requested = step.nextCursor
      result.reachedCeiling = step.reachedCeiling

      options.logger?.progress(`collect.${collection}.page`, {
        page: result.pagesFetched,
        items: step.items.length,
        cursor: step.nextCursor,
      })
    }
    result.complete = true
  } catch (err) {
    result.error = new CollectionError(collection, requested, err)
    options.logger?.warn(`Collection of ${collection} stopped early`, {
      message: result.error.message,
      gathered: result.items.length,
    })
  }

  return result
}

export interface CandidateSets {
  likes: CollectionResult<Like>
  authored: CollectionResult<Post>
  /** Self-likes found past the fixed likes cursor; never unlike candidates */
  selfLikesPastCeiling?: CollectionResult<Like>
}

/**
 * Page the likes behind the ceiling to the end, keeping only likes on the
 * account's own records.
 */
async function collectSelfLikesFrom(
  client: AccountClient,
  session: AccountSession,
  startCursor: string,
  logger?: PurgeLogger
): Promise<CollectionResult<Like>> {
  const tail = await collectPages(
    'likes',
    cursor => client.fetchLikesPage(session, cursor),
    { startCursor, logger }
  )
  const selfLikes = tail.items.filter(like => isOwnedBy(like.targetId, session.did))
  logger?.milestone('collect.self-likes', {
    scanned: tail.items.length,
    selfLikes: selfLikes.length,
    pages: tail.pagesFetched,
    complete: tail.complete,
  })
  return { ...tail, items: selfLikes }
}

export async function collectCandidates(
  client: AccountClient,
  session: AccountSession,
  { fixedLikesCursor, logger }: { fixedLikesCursor?: string; logger?: PurgeLogger } = {}
): Promise<CandidateSets> {
  const likes = await collectPages(
    'likes',
    cursor => client.fetchLikesPage(session, cursor),
    { stopCursor: fixedLikesCursor, logger }
  )
  logger?.milestone('collect.likes', {
    count: likes.items.length,
    pages: likes.pagesFetched,
    complete: likes.complete,
    reachedCeiling: likes.reachedCeiling,
    lastCursor: likes.lastCursor,
  })

  const selfLikesPastCeiling = likes.reachedCeiling && fixedLikesCursor
    ? await collectSelfLikesFrom(client, session, fixedLikesCursor, logger)
    : undefined

  const authored = await collectPages(
    'authored',
    cursor => client.fetchAuthoredPage(session, cursor),
    { logger }
  )
  logger?.milestone('collect.authored', {
    count: authored.items.length,
    pages: authored.pagesFetched,
    complete: authored.complete,
    lastCursor: authored.lastCursor,
  })

  return { likes, authored, selfLikesPastCeiling }
}
