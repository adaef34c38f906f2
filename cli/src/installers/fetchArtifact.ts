import fs from 'fs-extra'
import * as path from 'path'
import { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import { InstallerError, InstallerErrorCode, describeError } from './errors.js'
import type { Logger } from './types.js'

export interface FetchOptions {
  dryRun: boolean
  logger: Logger
}

/** Whether a downloaded file should be marked executable once written. */
export function wantsExecutable(destination: string): boolean {
  return !destination.endsWith('/') && !destination.endsWith('.desktop')
}

/**
 * Downloads `url` into `destination`, streaming the body to disk. Network
 * errors and non-2xx answers reject with FETCH_FAILED, local write errors
 * with FILESYSTEM_FAILED.
 */
export async function fetchArtifact(url: string, destination: string, options: FetchOptions): Promise<void> {
  const { logger } = options
  if (options.dryRun) {
    logger.log(`[dry-run] fetch ${url} -> ${destination}`)
    return
  }
  logger.debug(`fetch ${url} -> ${destination}`)

  let response: Response
  try {
    response = await fetch(url, { redirect: 'follow' })
  } catch (error) {
    throw new InstallerError(InstallerErrorCode.FETCH_FAILED, `Download failed for ${url}: ${describeError(error)}`, {
      url
    })
  }
  if (!response.ok || !response.body) {
    throw new InstallerError(
      InstallerErrorCode.FETCH_FAILED,
      `Download failed for ${url}: HTTP ${response.status}`,
      { url, status: response.status }
    )
  }

  try {
    await fs.ensureDir(path.dirname(destination))
    await pipeline(Readable.fromWeb(response.body), fs.createWriteStream(destination))
    if (wantsExecutable(destination)) await fs.chmod(destination, 0o755)
  } catch (error) {
    throw new InstallerError(
      InstallerErrorCode.FILESYSTEM_FAILED,
      `Could not write ${destination}: ${describeError(error)}`,
      { url }
    )
  }
}
