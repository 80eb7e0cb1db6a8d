/**
 * Purge Error Taxonomy
 *
 * Fatal errors (configuration, auth, archive) abort a run before anything is
 * deleted. Collection and mutation errors are recovered locally and counted.
 *
 * @module purge-errors
 */

export class PurgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PurgeError'
  }
}

export class ConfigurationError extends PurgeError {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'ConfigurationError'
  }
}

export class AuthError extends PurgeError {
  constructor(identifier: string, cause?: unknown) {
    super(`Authentication failed for ${identifier}: ${errorMessage(cause)}`, { cause })
    this.name = 'AuthError'
  }
}

export class ArchiveError extends PurgeError {
  constructor(step: string, cause?: unknown) {
    super(`Archive failed while ${step}: ${errorMessage(cause)}`, { cause })
    this.name = 'ArchiveError'
  }
}

export type CollectionName = 'likes' | 'authored'

export class CollectionError extends PurgeError {
  constructor(
    readonly collection: CollectionName,
    readonly cursor: string | undefined,
    cause?: unknown
  ) {
    super(
      `Fetching ${collection} page${cursor ? ` at cursor ${cursor}` : ''} failed: ${errorMessage(cause)}`,
      { cause }
    )
    this.name = 'CollectionError'
  }
}

export type MutationOperation = 'unlike' | 'delete'

export class MutationError extends PurgeError {
  constructor(
    readonly operation: MutationOperation,
    readonly itemId: string,
    cause?: unknown
  ) {
    super(`Failed to ${operation} ${itemId}: ${errorMessage(cause)}`, { cause })
    this.name = 'MutationError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
