/**
 * Selection Engine
 *
 * Decides which authored items to delete and which likes to remove.
 * Preservation rules are checked in order: self-like, then protected domain,
 * then the stale/viral thresholds. Output order follows input order.
 *
 * @module selection-engine
 */

import type { RetentionPolicy } from '@/lib/purge/retention-policy'
import type { AuthoredKind, Like, Post } from '@/lib/purge/types'

export type DeletionReason = 'stale' | 'viral'

export interface PlannedPostDeletion {
  readonly id: string
  readonly subjectId: string
  readonly kind: AuthoredKind
  readonly reasons: readonly DeletionReason[]
}

export interface PlannedLikeRemoval {
  readonly id: string
  readonly targetId: string
}

export interface RetentionTally {
  posts: {
    selfLiked: number
    protectedDomain: number
    belowThresholds: number
  }
  likes: {
    preservationLike: number
    fresh: number
  }
}

export interface SuppressedPlan {
  likes: number
  posts: number
  reasons: string[]
}

export interface DeletionPlan {
  readonly likesToRemove: readonly PlannedLikeRemoval[]
  readonly postsToDelete: readonly PlannedPostDeletion[]
  readonly retained: RetentionTally
  readonly suppressed?: SuppressedPlan
}

export function isOwnedBy(uri: string, did: string): boolean {
  return uri.startsWith(`at://${did}/`)
}

/** Targets of the account's likes on its own posts */
export function selfLikedIds(likes: readonly Like[], ownerDid: string): Set<string> {
  const ids = new Set<string>()
  for (const like of likes) {
    if (isOwnedBy(like.targetId, ownerDid)) ids.add(like.targetId)
  }
  return ids
}

function emptyTally(): RetentionTally {
  return {
    posts: { selfLiked: 0, protectedDomain: 0, belowThresholds: 0 },
    likes: { preservationLike: 0, fresh: 0 },
  }
}

export interface SelectionOptions {
  /** Likes that only mark posts as preserved and are never removed */
  preservationLikes?: readonly Like[]
}

export function selectForDeletion(
  policy: RetentionPolicy,
  likes: readonly Like[],
  posts: readonly Post[],
  now: Date,
  ownerDid: string,
  { preservationLikes = [] }: SelectionOptions = {}
): DeletionPlan {
  const retained = emptyTally()

  if (!policy.isActive) {
    retained.posts.belowThresholds = new Set(posts.map(p => p.id)).size
    retained.likes.fresh = new Set(likes.map(l => l.id)).size
    return { likesToRemove: [], postsToDelete: [], retained }
  }

  const preserved = selfLikedIds([...likes, ...preservationLikes], ownerDid)
  const postsToDelete: PlannedPostDeletion[] = []
  const seenPosts = new Set<string>()

  for (const post of posts) {
    if (seenPosts.has(post.id)) continue
    seenPosts.add(post.id)

    if (preserved.has(post.subjectId)) {
      retained.posts.selfLiked++
      continue
    }
    if (policy.touchesProtectedDomain(post.domains)) {
      retained.posts.protectedDomain++
      continue
    }

    const reasons: DeletionReason[] = []
    if (policy.isStale(post.createdAt, now)) reasons.push('stale')
    if (policy.isViral(post.repostCount)) reasons.push('viral')

    if (reasons.length === 0) {
      retained.posts.belowThresholds++
      continue
    }
    postsToDelete.push({ id: post.id, subjectId: post.subjectId, kind: post.kind, reasons })
  }

  const likesToRemove: PlannedLikeRemoval[] = []
  const seenLikes = new Set<string>()

  for (const like of likes) {
    if (seenLikes.has(like.id)) continue
    seenLikes.add(like.id)

    // unliking would silently un-preserve the post
    if (preserved.has(like.targetId)) {
      retained.likes.preservationLike++
      continue
    }
    if (policy.isStale(like.createdAt, now)) {
      likesToRemove.push({ id: like.id, targetId: like.targetId })
    } else {
      retained.likes.fresh++
    }
  }

  return { likesToRemove, postsToDelete, retained }
}

/**
 * Withhold deletions that would act on an incomplete snapshot. Missing likes
 * may hide preservation marks, so an incomplete likes collection withholds
 * both sequences.
 */
export function guardIncompleteCollections(
  plan: DeletionPlan,
  { likesComplete, postsComplete }: { likesComplete: boolean; postsComplete: boolean }
): DeletionPlan {
  if (likesComplete && postsComplete) return plan

  const reasons: string[] = []
  let likesToRemove = plan.likesToRemove
  let postsToDelete = plan.postsToDelete

  if (!likesComplete) {
    reasons.push('likes collection incomplete')
    likesToRemove = []
    postsToDelete = []
  }
  if (!postsComplete) {
    reasons.push('authored collection incomplete')
    postsToDelete = []
  }

  return {
    likesToRemove,
    postsToDelete,
    retained: plan.retained,
    suppressed: {
      likes: plan.likesToRemove.length - likesToRemove.length,
      posts: plan.postsToDelete.length - postsToDelete.length,
      reasons,
    },
  }
}
