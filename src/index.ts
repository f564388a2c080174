#!/usr/bin/env node
/**
 * commit-watch
 *
 * One pass over every configured repository:
 *   1. Mirror  — clone or fast-forward a local mirror per URL
 *   2. Walk    — commits newer than the stored watermark (capped by max_commits)
 *   3. Report  — one HTML document for all repos with something new
 *   4. Deliver — email it, or write it to --output
 *   5. Persist — advance the watermarks
 *
 * Per-repository failures are logged and skipped; they never change the exit
 * code. A bad config aborts before any repository is touched.
 *
 * Env vars:
 *   COMMIT_WATCH_TOKEN   overrides `token` from the config file
 *   VERBOSE              "true" → debug logging
 *   DRY_RUN              "true" → print the report, send nothing, save no state
 */

import { mkdirSync } from 'fs'
import { ConfigError, loadConfig, resolveCacheRoot } from './config.js'
import { USAGE, UsageError, packageVersion, parseCliArgs } from './cli.js'
import { createLogger, errorMessage } from './log.js'
import { runMonitor } from './monitor.js'

async function main() {
  const args = parseCliArgs(process.argv.slice(2))

  if (args.help) {
    console.log(USAGE)
    return
  }
  if (args.version) {
    console.log(packageVersion())
    return
  }

  const log = createLogger({ verbose: args.verbose })
  const config = loadConfig(args.config, process.env, log)
  const cacheRoot = resolveCacheRoot(config)
  try {
    mkdirSync(cacheRoot, { recursive: true })
  } catch (err) {
    throw new ConfigError(`Failed to create cache directory ${cacheRoot}: ${errorMessage(err)}`)
  }

  log.info(`\n🔎 commit-watch — ${config.repos.length} repo(s)`)
  log.info(`   Mode: ${args.dryRun ? 'dry run' : args.output ? `file → ${args.output}` : `email → ${config.to}`}`)
  log.debug(`Cache: ${cacheRoot}`)

  const summary = await runMonitor({
    config,
    cacheRoot,
    log,
    outputPath: args.output,
    dryRun: args.dryRun,
  })

  if (summary.failed.length > 0) {
    log.info(`\n${summary.failed.length} repo(s) skipped: ${summary.failed.join(', ')}`)
  }
  log.info('\n✓ Done.')
}

main().catch((err) => {
  if (err instanceof UsageError) {
    console.error(`❌ ${err.message}\n\n${USAGE}`)
    process.exit(2)
  }
  if (err instanceof ConfigError) {
    console.error(`❌ ${err.message}`)
    process.exit(1)
  }
  console.error('\n❌ Fatal:', err)
  process.exit(1)
})
