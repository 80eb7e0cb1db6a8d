/**
 * Account Archiver
 *
 * Saves the repository export and every media blob before anything is
 * deleted. Layout: <archiveDir>/<did>/bsky-archive-<timestamp>.car and
 * <archiveDir>/<did>/_blob/<cid><ext>, with ':' replaced by '_' in paths.
 *
 * @module archiver
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { BLOB_EXTENSIONS } from '@/lib/config/purge.config'
import { paginate } from '@/lib/purge/candidate-collector'
import { ArchiveError } from '@/lib/purge/errors'
import type { AccountClient, AccountSession } from '@/lib/purge/types'
import type { PurgeLogger } from '@/lib/utils/purge-logger'

export interface ArchiveResult {
  carPath: string
  blobDir: string
  blobCount: number
  bytesWritten: number
}

export function accountArchiveDir(archiveDir: string, did: string): string {
  return join(archiveDir, did.replace(/:/g, '_'))
}

export function archiveFileName(now: Date): string {
  return `bsky-archive-${now.toISOString().replace(/:/g, '_')}.car`
}

export function blobExtension(contentType: string | undefined): string {
  if (!contentType) return ''
  const mime = contentType.split(';')[0].trim().toLowerCase()
  return BLOB_EXTENSIONS[mime] ?? ''
}

export async function archiveAccount(
  client: AccountClient,
  session: AccountSession,
  { archiveDir, now, logger }: { archiveDir: string; now: Date; logger?: PurgeLogger }
): Promise<ArchiveResult> {
  const accountDir = accountArchiveDir(archiveDir, session.did)
  const blobDir = join(accountDir, '_blob')
  const carPath = join(accountDir, archiveFileName(now))
  let bytesWritten = 0

  try {
    await mkdir(blobDir, { recursive: true })
  } catch (err) {
    throw new ArchiveError(`creating ${blobDir}`, err)
  }

  logger?.milestone('archive.repo.start', { path: carPath })
  try {
    const repo = await client.fetchArchive(session)
    await writeFile(carPath, repo)
    bytesWritten += repo.byteLength
  } catch (err) {
    throw new ArchiveError('saving the repository export', err)
  }

  const cids: string[] = []
  try {
    for await (const page of paginate(cursor => client.listBlobsPage(session, cursor))) {
      cids.push(...page.items)
    }
  } catch (err) {
    throw new ArchiveError('listing blobs', err)
  }

  logger?.milestone('archive.blobs.start', { count: cids.length })
  for (const cid of cids) {
    try {
      const blob = await client.fetchBlob(session, cid)
      const fileName = `${cid}${blobExtension(blob.contentType)}`
      await writeFile(join(blobDir, fileName), blob.data)
      bytesWritten += blob.data.byteLength
      logger?.detail('archive.blob', { cid, file: fileName })
    } catch (err) {
      throw new ArchiveError(`saving blob ${cid}`, err)
    }
  }

  const result = { carPath, blobDir, blobCount: cids.length, bytesWritten }
  logger?.milestone('archive.done', { ...result })
  return result
}
