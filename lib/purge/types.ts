/**
 * Purge Domain Types
 *
 * Snapshot records built fresh each run from paginated reads, and the
 * capability surface the purge core needs from an account client.
 *
 * @module purge-types
 */

export type AuthoredKind = 'post' | 'reply' | 'repost'

/** An authored item: original post, reply, or repost. */
export interface Post {
  /** URI of the record the account owns; deleting the Post deletes this record */
  readonly id: string
  /** URI of the displayed post. Same as `id` except for reposts */
  readonly subjectId: string
  readonly kind: AuthoredKind
  readonly createdAt: Date
  readonly repostCount: number
  /** Lower-cased hostnames linked from the item */
  readonly domains: readonly string[]
}

export interface Like {
  /** URI of the like record */
  readonly id: string
  /** URI of the liked post */
  readonly targetId: string
  readonly createdAt: Date
}

export interface Page<T> {
  readonly items: readonly T[]
  readonly cursor?: string
}

export interface Credentials {
  identifier: string
  password: string
}

export interface AccountSession {
  did: string
  handle: string
}

export interface BlobData {
  data: Uint8Array
  contentType?: string
}

export interface AccountClient {
  /** Rejects with AuthError */
  authenticate(credentials: Credentials): Promise<AccountSession>
  fetchLikesPage(session: AccountSession, cursor?: string): Promise<Page<Like>>
  fetchAuthoredPage(session: AccountSession, cursor?: string): Promise<Page<Post>>
  /** Full repository export (CAR bytes), opaque to the core */
  fetchArchive(session: AccountSession): Promise<Uint8Array>
  listBlobsPage(session: AccountSession, cursor?: string): Promise<Page<string>>
  fetchBlob(session: AccountSession, cid: string): Promise<BlobData>
  /** Rejects with MutationError */
  unlike(session: AccountSession, likeId: string): Promise<void>
  /** Deletes a post, reply or repost record. Rejects with MutationError */
  deletePost(session: AccountSession, postId: string): Promise<void>
}
