import { format, fromUnixTime } from 'date-fns'
import { git, tryGit, type GitOptions } from './git.js'
import { errorMessage } from './log.js'
import type { CommitRecord } from './types.js'

// Trailer keys that carry a change-tracking token, checked in order per line
const CHANGE_TRAILERS = ['Change-Id:']

const FIELD_SEP = '\x1f'
const RECORD_SEP = '\x1e'
const LOG_FORMAT = ['%H', '%at', '%an', '%s', '%B'].join('%x1f') + '%x1e'

const COMMIT_ID_RE = /^[0-9a-f]{4,64}$/i

export function extractChangeId(fullMessage: string): string | undefined {
  for (const line of fullMessage.split('\n')) {
    for (const prefix of CHANGE_TRAILERS) {
      if (line.startsWith(prefix)) return line.slice(prefix.length).trim()
    }
  }
  return undefined
}

export function formatCommitDate(unixSeconds: number): string {
  return format(fromUnixTime(unixSeconds), 'yyyy-MM-dd HH:mm:ss')
}

export function parseLog(raw: string): CommitRecord[] {
  const commits: CommitRecord[] = []
  for (const chunk of raw.split(RECORD_SEP)) {
    const record = chunk.replace(/^\n+/, '')
    if (!record) continue
    const [id, at, author, subject, body = ''] = record.split(FIELD_SEP)
    if (!id || !at) continue
    commits.push({
      id,
      date: formatCommitDate(Number(at)),
      author: author || 'Unknown',
      message: subject ?? '',
      changeId: extractChangeId(body),
    })
  }
  return commits
}

function isKnownCommit(dir: string, id: string, opts: GitOptions): boolean {
  if (!COMMIT_ID_RE.test(id)) return false
  return tryGit(['-C', dir, 'cat-file', '-e', `${id}^{commit}`], opts) !== null
}

/**
 * Commits reachable from HEAD that are newer than `lastSeenId`, newest first.
 *
 * A last-seen commit present in the mirror excludes itself and all its
 * ancestors. One the mirror does not know (rewritten history) only stops
 * the walk if it is met. Throws when the mirror's history cannot be read.
 */
export function newCommitsSince(
  dir: string,
  lastSeenId?: string,
  maxCount?: number,
  opts: GitOptions = {},
): CommitRecord[] {
  if (maxCount !== undefined && maxCount <= 0) return []

  const args = ['-C', dir, 'log', '--date-order', `--format=${LOG_FORMAT}`]
  if (maxCount !== undefined) args.push(`--max-count=${maxCount}`)
  args.push('HEAD')
  if (lastSeenId && isKnownCommit(dir, lastSeenId, opts)) args.push(`^${lastSeenId}`)
  args.push('--')

  let raw: string
  try {
    raw = git(args, opts)
  } catch (err) {
    throw new Error(`cannot read history in ${dir}: ${errorMessage(err)}`)
  }

  const commits: CommitRecord[] = []
  for (const commit of parseLog(raw)) {
    if (commit.id === lastSeenId) break
    commits.push(commit)
  }
  return commits
}
