/**
 * Repository cache
 *
 * Each remote URL maps to one flat mirror under the cache root, named by the
 * SHA-1 of the URL string. A missing mirror is cloned; an existing one is
 * fast-forwarded in place. A failed update leaves the stale mirror usable.
 */

import { createHash } from 'crypto'
import { existsSync, rmSync } from 'fs'
import { join } from 'path'
import { git } from './git.js'
import { errorMessage, type Logger } from './log.js'

export function mirrorKey(url: string): string {
  return createHash('sha1').update(url, 'utf8').digest('hex')
}

export function mirrorPath(url: string, cacheRoot: string): string {
  return join(cacheRoot, mirrorKey(url))
}

export interface MirrorProvider {
  clone(url: string, dir: string): void
  update(dir: string): void
}

export function gitMirrorProvider(timeoutMs?: number): MirrorProvider {
  return {
    clone: (url, dir) => {
      git(['clone', '--quiet', '--', url, dir], { timeoutMs })
    },
    update: (dir) => {
      git(['-C', dir, 'pull', '--quiet', '--ff-only'], { timeoutMs })
    },
  }
}

/**
 * Returns the local mirror path for `url`, cloning it on first sight.
 * Throws when the clone fails; update failures are only warned about.
 */
export function ensureMirror(
  url: string,
  cacheRoot: string,
  log: Logger,
  provider: MirrorProvider = gitMirrorProvider(),
): string {
  const dir = mirrorPath(url, cacheRoot)

  if (existsSync(dir)) {
    log.debug(`Pulling updates for ${url}`)
    try {
      provider.update(dir)
      log.debug(`Updated ${url}`)
    } catch (err) {
      log.warn(`git pull failed for ${url} — using cached mirror\n${errorMessage(err)}`)
    }
    return dir
  }

  log.debug(`Cloning ${url}`)
  try {
    provider.clone(url, dir)
  } catch (err) {
    // A half-written clone would otherwise be treated as a mirror next run
    rmSync(dir, { recursive: true, force: true })
    throw new Error(`clone of ${url} failed: ${errorMessage(err)}`)
  }
  return dir
}
