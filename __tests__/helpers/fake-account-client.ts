/**
 * In-memory AccountClient for purge tests.
 *
 * Pages are addressed by cursor: the first page has no cursor, page i is
 * fetched with cursor `c<i>`, and the last page returns no cursor.
 */

import { AuthError, MutationError } from '@/lib/purge/errors'
import type {
  AccountClient,
  AccountSession,
  BlobData,
  Credentials,
  Like,
  Page,
  Post,
} from '@/lib/purge/types'
import type { LogSink, Verbosity } from '@/lib/utils/purge-logger'
import { PurgeLogger } from '@/lib/utils/purge-logger'

export const OWNER_DID = 'did:plc:owner'
export const OTHER_DID = 'did:plc:other'

const DAY_MS = 24 * 60 * 60 * 1000
const EPOCH = Date.UTC(2024, 0, 1)

/** Midnight UTC, `n` days after 2024-01-01 */
export function day(n: number): Date {
  return new Date(EPOCH + n * DAY_MS)
}

export function ownPostUri(rkey: string): string {
  return `at://${OWNER_DID}/app.bsky.feed.post/${rkey}`
}

export function otherPostUri(rkey: string): string {
  return `at://${OTHER_DID}/app.bsky.feed.post/${rkey}`
}

export function makePost(rkey: string, overrides: Partial<Post> = {}): Post {
  const id = ownPostUri(rkey)
  return {
    id,
    subjectId: id,
    kind: 'post',
    createdAt: day(100),
    repostCount: 0,
    domains: [],
    ...overrides,
  }
}

export function makeRepost(rkey: string, subjectId: string, overrides: Partial<Post> = {}): Post {
  return {
    id: `at://${OWNER_DID}/app.bsky.feed.repost/${rkey}`,
    subjectId,
    kind: 'repost',
    createdAt: day(100),
    repostCount: 0,
    domains: [],
    ...overrides,
  }
}

export function makeLike(rkey: string, targetId: string, createdAt: Date = day(100)): Like {
  return {
    id: `at://${OWNER_DID}/app.bsky.feed.like/${rkey}`,
    targetId,
    createdAt,
  }
}

function pageIndex(cursor?: string): number {
  return cursor ? Number(cursor.slice(1)) : 0
}

function pageAt<T>(pages: T[][], cursor?: string): Page<T> {
  const index = pageIndex(cursor)
  const items = pages[index] ?? []
  return index + 1 < pages.length ? { items, cursor: `c${index + 1}` } : { items }
}

export class FakeAccountClient implements AccountClient {
  likePages: Like[][] = [[]]
  authoredPages: Post[][] = [[]]
  blobPages: string[][] = [[]]
  blobs = new Map<string, BlobData>()
  archive = new Uint8Array([1, 2, 3])

  /** Fetching the page at this index throws */
  failLikesAtPage?: number
  failAuthoredAtPage?: number
  failingMutations = new Set<string>()
  rejectLogin = false

  readonly calls: string[] = []
  readonly session: AccountSession = { did: OWNER_DID, handle: 'owner.test' }

  async authenticate(credentials: Credentials): Promise<AccountSession> {
    this.calls.push('authenticate')
    if (this.rejectLogin) {
      throw new AuthError(credentials.identifier, new Error('Invalid identifier or password'))
    }
    return this.session
  }

  async fetchLikesPage(_session: AccountSession, cursor?: string): Promise<Page<Like>> {
    this.calls.push(`likes:${cursor ?? ''}`)
    if (this.failLikesAtPage === pageIndex(cursor)) throw new Error('likes unavailable')
    return pageAt(this.likePages, cursor)
  }

  async fetchAuthoredPage(_session: AccountSession, cursor?: string): Promise<Page<Post>> {
    this.calls.push(`authored:${cursor ?? ''}`)
    if (this.failAuthoredAtPage === pageIndex(cursor)) throw new Error('feed unavailable')
    return pageAt(this.authoredPages, cursor)
  }

  async fetchArchive(): Promise<Uint8Array> {
    this.calls.push('archive')
    return this.archive
  }

  async listBlobsPage(_session: AccountSession, cursor?: string): Promise<Page<string>> {
    return pageAt(this.blobPages, cursor)
  }

  async fetchBlob(_session: AccountSession, cid: string): Promise<BlobData> {
    const blob = this.blobs.get(cid)
    if (!blob) throw new Error(`blob ${cid} not found`)
    return blob
  }

  async unlike(_session: AccountSession, likeId: string): Promise<void> {
    this.calls.push(`unlike:${likeId}`)
    if (this.failingMutations.has(likeId)) {
      throw new MutationError('unlike', likeId, new Error('rate limited'))
    }
  }

  async deletePost(_session: AccountSession, postId: string): Promise<void> {
    this.calls.push(`delete:${postId}`)
    if (this.failingMutations.has(postId)) {
      throw new MutationError('delete', postId, new Error('rate limited'))
    }
  }

  mutationCalls(): string[] {
    return this.calls.filter(c => c.startsWith('unlike:') || c.startsWith('delete:'))
  }
}

export interface CapturedLogs {
  logger: PurgeLogger
  lines: Array<Record<string, unknown>>
  errors: Array<Record<string, unknown>>
}

export function captureLogger(verbosity: Verbosity = 0): CapturedLogs {
  const lines: Array<Record<string, unknown>> = []
  const errors: Array<Record<string, unknown>> = []
  const sink: LogSink = {
    log: line => lines.push(JSON.parse(line)),
    error: line => errors.push(JSON.parse(line)),
  }
  return { logger: new PurgeLogger({ runId: 'test-run' }, { verbosity, sink }), lines, errors }
}
