/**
 * Purge Configuration
 *
 * Environment-backed settings for the Bluesky account client and purge runs.
 * Retention thresholds are runtime options, validated by RetentionPolicy.
 *
 * @module purge-config
 */

export const PURGE_CONFIG = {
  SERVICE_URL: process.env.BLUESKY_SERVICE_URL || 'https://bsky.social',

  /** Records per page; the AT Protocol caps list endpoints at 100 */
  PAGE_LIMIT: 100,

  AUTHOR_FEED_FILTER: 'posts_with_replies',

  MUTATION_DELAY_MS: Number(process.env.PURGE_MUTATION_DELAY_MS ?? 500),

  PROGRESS_INTERVAL: 25,

  ARCHIVE_DIR: process.env.PURGE_ARCHIVE_DIR || 'archive',

  CREDENTIALS_ENV: {
    USERNAME: 'BLUESKY_USERNAME',
    PASSWORD: 'BLUESKY_PASSWORD',
  },
} as const

/** Blob content types that get a file extension in the media archive */
export const BLOB_EXTENSIONS: Readonly<Record<string, string>> = {
  'image/jpeg': '.jpeg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
  'video/mp4': '.mp4',
}
