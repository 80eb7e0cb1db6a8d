/**
 * Bluesky AT Protocol Client
 *
 * Wrapper around @atproto/api implementing the purge AccountClient surface.
 * Handles authentication, like-record and author-feed pagination, repository
 * and blob export, and single-record deletion.
 *
 * @module bluesky-client
 */

import { AtpAgent, AtUri, AppBskyFeedDefs } from '@atproto/api'
import { PURGE_CONFIG } from '@/lib/config/purge.config'
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

type UnknownRecord = Record<string, unknown>

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null
}

function asRecord(value: unknown): UnknownRecord | undefined {
  return isRecord(value) ? value : undefined
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : []
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

export function hostnameOf(uri: string): string | undefined {
  if (!URL.canParse(uri)) return undefined
  const host = new URL(uri).hostname.toLowerCase()
  return host.length > 0 ? host : undefined
}

function externalUri(embed: UnknownRecord | undefined): string | undefined {
  if (!embed) return undefined
  const type = asString(embed.$type)
  if (type === 'app.bsky.embed.external#view' || type === 'app.bsky.embed.external') {
    return asString(asRecord(embed.external)?.uri)
  }
  if (type === 'app.bsky.embed.recordWithMedia#view' || type === 'app.bsky.embed.recordWithMedia') {
    return externalUri(asRecord(embed.media))
  }
  return undefined
}

/**
 * Hostnames linked from a post: link cards (directly or beside a quoted
 * record) and link facets in the text.
 */
export function extractLinkedDomains(post: AppBskyFeedDefs.PostView): string[] {
  const uris: string[] = []
  const record = asRecord(post.record)

  const viewLink = externalUri(asRecord(post.embed))
  if (viewLink) uris.push(viewLink)
  const recordLink = externalUri(asRecord(record?.embed))
  if (recordLink) uris.push(recordLink)

  for (const facet of asArray(record?.facets)) {
    for (const feature of asArray(asRecord(facet)?.features)) {
      const f = asRecord(feature)
      if (f?.$type === 'app.bsky.richtext.facet#link') {
        const uri = asString(f.uri)
        if (uri) uris.push(uri)
      }
    }
  }

  const domains: string[] = []
  for (const uri of uris) {
    const host = hostnameOf(uri)
    if (host && !domains.includes(host)) domains.push(host)
  }
  return domains
}

/**
 * Map an author-feed item to an authored item of `did`. Returns null for
 * items the account cannot delete (someone else's post, or a repost without
 * a repost record URI).
 */
export function toAuthoredItem(item: AppBskyFeedDefs.FeedViewPost, did: string): Post | null {
  const post = item.post
  const record = asRecord(post.record)
  const repostCount = post.repostCount ?? 0
  const domains = extractLinkedDomains(post)

  if (AppBskyFeedDefs.isReasonRepost(item.reason)) {
    const repostUri = post.viewer?.repost
    if (item.reason.by.did !== did || !repostUri) return null
    return {
      id: repostUri,
      subjectId: post.uri,
      kind: 'repost',
      createdAt: new Date(item.reason.indexedAt),
      repostCount,
      domains,
    }
  }

  if (post.author.did !== did) return null
  return {
    id: post.uri,
    subjectId: post.uri,
    kind: record?.reply ? 'reply' : 'post',
    createdAt: new Date(asString(record?.createdAt) ?? post.indexedAt),
    repostCount,
    domains,
  }
}

export interface LikeRecordEntry {
  uri: string
  value: { subject: { uri: string }; createdAt: string }
}

export function toLike(entry: LikeRecordEntry): Like {
  return {
    id: entry.uri,
    targetId: entry.value.subject.uri,
    createdAt: new Date(entry.value.createdAt),
  }
}

export interface BlueskyAccountClientOptions {
  service?: string
  /** Pre-built agent, e.g. pointing at another PDS */
  agent?: AtpAgent
}

/**
 * Bluesky client for the purged account
 */
export class BlueskyAccountClient implements AccountClient {
  private agent: AtpAgent
  private session: AccountSession | null = null

  constructor(options: BlueskyAccountClientOptions = {}) {
    this.agent = options.agent ?? new AtpAgent({
      service: options.service ?? PURGE_CONFIG.SERVICE_URL,
    })
  }

  async authenticate(credentials: Credentials): Promise<AccountSession> {
    try {
      const response = await this.agent.login({
        identifier: credentials.identifier,
        password: credentials.password,
      })
      this.session = { did: response.data.did, handle: response.data.handle }
      return this.session
    } catch (error) {
      throw new AuthError(credentials.identifier, error)
    }
  }

  get isAuthenticated(): boolean {
    return this.session !== null
  }

  async fetchLikesPage(session: AccountSession, cursor?: string): Promise<Page<Like>> {
    this.ensureAuthenticated()
    const response = await this.agent.app.bsky.feed.like.list({
      repo: session.did,
      limit: PURGE_CONFIG.PAGE_LIMIT,
      cursor,
    })
    return {
      items: response.records.map(toLike),
      cursor: response.cursor,
    }
  }

  async fetchAuthoredPage(session: AccountSession, cursor?: string): Promise<Page<Post>> {
    this.ensureAuthenticated()
    const response = await this.agent.getAuthorFeed({
      actor: session.did,
      limit: PURGE_CONFIG.PAGE_LIMIT,
      cursor,
      filter: PURGE_CONFIG.AUTHOR_FEED_FILTER,
    })
    const items: Post[] = []
    for (const item of response.data.feed) {
      const authored = toAuthoredItem(item, session.did)
      if (authored) items.push(authored)
    }
    return { items, cursor: response.data.cursor }
  }

  async fetchArchive(session: AccountSession): Promise<Uint8Array> {
    this.ensureAuthenticated()
    const response = await this.agent.com.atproto.sync.getRepo({ did: session.did })
    return response.data
  }

  async listBlobsPage(session: AccountSession, cursor?: string): Promise<Page<string>> {
    this.ensureAuthenticated()
    const response = await this.agent.com.atproto.sync.listBlobs({
      did: session.did,
      cursor,
      limit: 500,
    })
    return { items: response.data.cids, cursor: response.data.cursor }
  }

  async fetchBlob(session: AccountSession, cid: string): Promise<BlobData> {
    this.ensureAuthenticated()
    const response = await this.agent.com.atproto.sync.getBlob({ did: session.did, cid })
    return { data: response.data, contentType: response.headers['content-type'] }
  }

  async unlike(session: AccountSession, likeId: string): Promise<void> {
    try {
      this.ensureOwnRecord(session, likeId)
      await this.agent.deleteLike(likeId)
    } catch (error) {
      throw new MutationError('unlike', likeId, error)
    }
  }

  /**
   * Delete a post, reply or repost record by its URI
   */
  async deletePost(session: AccountSession, postId: string): Promise<void> {
    try {
      const uri = this.ensureOwnRecord(session, postId)
      await this.agent.com.atproto.repo.deleteRecord({
        repo: session.did,
        collection: uri.collection,
        rkey: uri.rkey,
      })
    } catch (error) {
      throw new MutationError('delete', postId, error)
    }
  }

  // ─── Private Helpers ──────────────────────────────────────

  private ensureAuthenticated(): void {
    if (!this.session) {
      throw new Error('Bluesky client is not authenticated. Call authenticate() first.')
    }
  }

  private ensureOwnRecord(session: AccountSession, recordUri: string): AtUri {
    this.ensureAuthenticated()
    const uri = new AtUri(recordUri)
    if (uri.hostname !== session.did) {
      throw new Error(`Record ${recordUri} is not owned by ${session.did}`)
    }
    return uri
  }
}
