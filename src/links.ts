import type { CommitRecord } from './types.js'

interface LinkRule {
  host: string // substring of the repository URL
  build: (repoUrl: string, commit: CommitRecord) => string | undefined
}

const stripGit = (url: string) => url.replace(/\.git$/, '')

// scheme://authority, or everything before the first "/" when there is no scheme
export function trimAfterDomain(url: string): string {
  const schemeEnd = url.indexOf('://')
  const start = schemeEnd === -1 ? 0 : schemeEnd + 3
  const slash = url.indexOf('/', start)
  return slash === -1 ? url : url.slice(0, slash)
}

// First matching host wins. Add a host by adding a row.
export const LINK_RULES: LinkRule[] = [
  { host: 'github.com', build: (url, c) => `${stripGit(url)}/commit/${c.id}` },
  { host: 'gitlab.com', build: (url, c) => `${stripGit(url)}/-/commit/${c.id}.patch` },
  { host: 'bitbucket.org', build: (url, c) => `${stripGit(url)}/commits/${c.id}.patch` },
  {
    host: 'gerrit',
    build: (url, c) =>
      c.changeId ? `${trimAfterDomain(stripGit(url))}/r/q/${c.changeId}` : undefined,
  },
]

/**
 * Web URL for a commit, or undefined when no rule applies or the result is
 * not an http(s) link (e.g. scp-style `git@host:` remotes).
 */
export function commitLink(repoUrl: string, commit: CommitRecord): string | undefined {
  for (const rule of LINK_RULES) {
    if (!repoUrl.includes(rule.host)) continue
    const link = rule.build(repoUrl, commit)
    if (link === undefined) continue
    return link.startsWith('http') ? link : undefined
  }
  return undefined
}
