import { execFileSync } from 'child_process'

export const DEFAULT_GIT_TIMEOUT_MS = 5 * 60_000

export interface GitOptions {
  cwd?: string
  timeoutMs?: number
}

// Argument vector, never a shell string: repository URLs come from config.
export function git(args: string[], opts: GitOptions = {}): string {
  return execFileSync('git', args, {
    encoding: 'utf-8',
    cwd: opts.cwd,
    env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    timeout: opts.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS,
    maxBuffer: 256 * 1024 * 1024,
    stdio: ['ignore', 'pipe', 'pipe'],
  })
}

export function tryGit(args: string[], opts: GitOptions = {}): string | null {
  try {
    return git(args, opts)
  } catch {
    return null
  }
}
