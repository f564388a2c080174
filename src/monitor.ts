/**
 * Run orchestration
 *
 * Idle → per-repo (sequential, each failure isolated) → aggregated →
 * deliver + persist, or exit untouched when nothing is new.
 *
 * Ordering note: by default staged watermarks are persisted even when
 * delivery fails, so a failed email consumes those commits. Set
 * `strict_delivery: true` to persist only after a confirmed delivery.
 */

import { join } from 'path'
import { STATE_FILE } from './config.js'
import { newCommitsSince } from './history.js'
import { errorMessage, type Logger } from './log.js'
import { ensureMirror, gitMirrorProvider } from './mirror.js'
import { deliver } from './notify.js'
import { renderReport } from './report.js'
import type { CommitAggregate, CommitRecord, Destination, MonitorConfig, RunSummary, WatermarkMap } from './types.js'
import { loadWatermarks, saveWatermarks } from './watermark.js'

export interface MonitorDeps {
  ensureMirror(url: string): string
  newCommitsSince(dir: string, lastSeenId?: string, maxCount?: number): CommitRecord[]
  renderReport(aggregate: CommitAggregate, templatePath?: string): string
  deliver(html: string, dest: Destination): Promise<void>
  loadWatermarks(path: string): WatermarkMap
  saveWatermarks(map: WatermarkMap, path: string): boolean
}

export interface MonitorOptions {
  config: MonitorConfig
  cacheRoot: string
  log: Logger
  outputPath?: string // report to disk instead of email
  dryRun?: boolean
}

export function defaultDeps(opts: MonitorOptions): MonitorDeps {
  const { cacheRoot, log, config } = opts
  const gitOpts = { timeoutMs: config.gitTimeoutMs }
  const provider = gitMirrorProvider(config.gitTimeoutMs)
  return {
    ensureMirror: (url) => ensureMirror(url, cacheRoot, log, provider),
    newCommitsSince: (dir, lastSeenId, maxCount) => newCommitsSince(dir, lastSeenId, maxCount, gitOpts),
    renderReport,
    deliver: (html, dest) => deliver(html, dest, log),
    loadWatermarks,
    saveWatermarks: (map, path) => saveWatermarks(map, path, log),
  }
}

export function destinationFor(config: MonitorConfig, outputPath?: string): Destination {
  if (outputPath) return { kind: 'file', path: outputPath }
  return {
    kind: 'email',
    from: config.from,
    to: config.to,
    token: config.token,
    smtpHost: config.smtpHost,
    smtpPort: config.smtpPort,
  }
}

/**
 * Walks every configured repository once. Per-repo errors are logged and
 * never abort the run or touch that repo's watermark.
 */
export function collectNewCommits(
  repos: string[],
  watermarks: WatermarkMap,
  maxCommits: number | undefined,
  deps: Pick<MonitorDeps, 'ensureMirror' | 'newCommitsSince'>,
  log: Logger,
): { aggregate: CommitAggregate; staged: WatermarkMap; failed: string[] } {
  const aggregate: CommitAggregate = new Map()
  const staged: WatermarkMap = new Map()
  const failed: string[] = []

  for (const url of repos) {
    log.debug(`Checking remote repo: ${url}`)

    let dir: string
    try {
      dir = deps.ensureMirror(url)
    } catch (err) {
      log.warn(`Failed to prepare repo ${url}: ${errorMessage(err)}`)
      failed.push(url)
      continue
    }

    let commits: CommitRecord[]
    try {
      commits = deps.newCommitsSince(dir, watermarks.get(url), maxCommits)
    } catch (err) {
      log.warn(`Failed to read commits from ${url}: ${errorMessage(err)}`)
      failed.push(url)
      continue
    }

    if (commits.length === 0) {
      log.info(`  ${url} — no new commits`)
      continue
    }

    log.info(`  ${url} — ${commits.length} new commit(s)`)
    aggregate.set(url, commits)
    staged.set(url, commits[0].id)
  }

  return { aggregate, staged, failed }
}

export async function runMonitor(opts: MonitorOptions, deps: MonitorDeps = defaultDeps(opts)): Promise<RunSummary> {
  const { config, cacheRoot, log } = opts
  const stateFile = join(cacheRoot, STATE_FILE)
  const watermarks = deps.loadWatermarks(stateFile)

  const { aggregate, staged, failed } = collectNewCommits(
    config.repos,
    watermarks,
    config.maxCommits,
    deps,
    log,
  )
  const summary: RunSummary = {
    checked: config.repos.length,
    updated: [...aggregate.keys()],
    failed,
    delivered: false,
    stateSaved: false,
  }

  if (aggregate.size === 0) {
    log.info('No new commits found.')
    return summary
  }

  const html = deps.renderReport(aggregate, config.templatePath)

  if (opts.dryRun) {
    log.info('─'.repeat(72))
    log.info(html)
    log.info('─'.repeat(72))
    log.info('✓ Dry run complete — nothing sent, state unchanged.')
    return summary
  }

  try {
    await deps.deliver(html, destinationFor(config, opts.outputPath))
    summary.delivered = true
  } catch (err) {
    log.error(`Failed to deliver report: ${errorMessage(err)}`)
  }

  if (!summary.delivered && config.strictDelivery) {
    log.warn('State not saved — these commits will be reported again next run')
    return summary
  }

  let changed = false
  for (const [url, id] of staged) {
    if (watermarks.get(url) !== id) {
      watermarks.set(url, id)
      changed = true
    }
  }
  if (changed) summary.stateSaved = deps.saveWatermarks(watermarks, stateFile)

  return summary
}
