/**
 * config.yml loader
 *
 * Read once at startup. Anything wrong with it is fatal: the run aborts with
 * a ConfigError before a single repository is touched.
 */

import { readFileSync } from 'fs'
import { homedir } from 'os'
import { join } from 'path'
import { parse } from 'yaml'
import { z } from 'zod'
import { DEFAULT_GIT_TIMEOUT_MS } from './git.js'
import { errorMessage, type Logger } from './log.js'
import type { MonitorConfig } from './types.js'

export const APP_DIR = 'commit-watch'
export const STATE_FILE = 'state.json'

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

const EmailSchema = z.string().email()

// "Name <addr>" or a bare address; returns the address part
export function mailboxAddress(mailbox: string): string {
  const angle = mailbox.match(/<([^<>]*)>\s*$/)
  return (angle ? angle[1] : mailbox).trim()
}

const MailboxSchema = z
  .string()
  .refine((v) => EmailSchema.safeParse(mailboxAddress(v)).success, { message: 'Invalid email' })

const ConfigSchema = z.object({
  repos: z.array(z.string().min(1)),
  from: MailboxSchema,
  to: MailboxSchema,
  token: z.string().min(1).optional(),
  template_path: z.string().min(1).optional(),
  cache_dir: z.string().min(1).optional(),
  max_commits: z.number().int().positive().optional(),
  smtp_host: z.string().min(1).default('smtp.gmail.com'),
  smtp_port: z.number().int().positive().default(465),
  strict_delivery: z.boolean().default(false),
  git_timeout_ms: z.number().int().positive().default(DEFAULT_GIT_TIMEOUT_MS),
})

const KNOWN_KEYS = new Set(Object.keys(ConfigSchema.shape))

type Env = Record<string, string | undefined>

function resolveHome(): string {
  let home = ''
  try {
    home = homedir()
  } catch (err) {
    throw new ConfigError(`Could not determine home directory: ${errorMessage(err)}`)
  }
  if (!home) throw new ConfigError('Could not determine home directory')
  return home
}

export function expandHome(p: string, home: string): string {
  return p.startsWith('~') ? home + p.slice(1) : p
}

export function defaultConfigPath(env: Env = process.env, home?: string): string {
  const base = env.XDG_CONFIG_HOME || join(home ?? resolveHome(), '.config')
  return join(base, APP_DIR, 'config.yml')
}

// Unknown keys are dropped with a warning rather than failing the run.
export function parseConfig(
  text: string,
  source: string,
  env: Env = process.env,
  log?: Pick<Logger, 'warn'>,
): MonitorConfig {
  let raw: unknown
  try {
    raw = parse(text)
  } catch (err) {
    throw new ConfigError(`Failed to parse config at ${source}: ${errorMessage(err)}`)
  }

  if (raw !== null && typeof raw === 'object' && !Array.isArray(raw)) {
    for (const key of Object.keys(raw)) {
      if (!KNOWN_KEYS.has(key)) log?.warn(`${source}: unknown key "${key}" ignored`)
    }
  }

  const result = ConfigSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ')
    throw new ConfigError(`Invalid config at ${source}: ${issues}`)
  }

  const c = result.data
  const token = env.COMMIT_WATCH_TOKEN || c.token
  if (!token) {
    throw new ConfigError(`Invalid config at ${source}: token is required (or set COMMIT_WATCH_TOKEN)`)
  }

  return {
    repos: c.repos,
    from: c.from,
    to: c.to,
    token,
    templatePath: c.template_path,
    cacheDir: c.cache_dir,
    maxCommits: c.max_commits,
    smtpHost: c.smtp_host,
    smtpPort: c.smtp_port,
    strictDelivery: c.strict_delivery,
    gitTimeoutMs: c.git_timeout_ms,
  }
}

export function loadConfig(
  path?: string,
  env: Env = process.env,
  log?: Pick<Logger, 'warn'>,
): MonitorConfig {
  const resolved = path ?? defaultConfigPath(env)
  let text: string
  try {
    text = readFileSync(resolved, 'utf-8')
  } catch (err) {
    throw new ConfigError(`Failed to read config file at ${resolved}: ${errorMessage(err)}`)
  }
  return parseConfig(text, resolved, env, log)
}

// Per-OS user cache directory: ~/Library/Caches on macOS, %LOCALAPPDATA% on
// Windows, $XDG_CACHE_HOME or ~/.cache elsewhere.
export function platformCacheDir(
  env: Env = process.env,
  home?: string,
  platform: NodeJS.Platform = process.platform,
): string {
  if (platform === 'darwin') return join(home ?? resolveHome(), 'Library', 'Caches')
  if (platform === 'win32') return env.LOCALAPPDATA || join(home ?? resolveHome(), 'AppData', 'Local')
  return env.XDG_CACHE_HOME || join(home ?? resolveHome(), '.cache')
}

// cache_dir (with ~ expanded), else <platform cache dir>/commit-watch
export function resolveCacheRoot(
  config: MonitorConfig,
  env: Env = process.env,
  home?: string,
  platform: NodeJS.Platform = process.platform,
): string {
  if (config.cacheDir) {
    return config.cacheDir.startsWith('~')
      ? expandHome(config.cacheDir, home ?? resolveHome())
      : config.cacheDir
  }
  return join(platformCacheDir(env, home, platform), APP_DIR)
}
