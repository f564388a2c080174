import { readFileSync } from 'fs'
import { dirname, join } from 'path'
import { fileURLToPath } from 'url'
import { parseArgs } from 'util'
import { errorMessage } from './log.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const REPO_ROOT = join(__dirname, '../')

export const USAGE = `Usage: commit-watch [options]

Checks every configured repository for new commits and sends one HTML report.

Options:
  -v, --verbose        debug logging (env: VERBOSE=true)
      --config <path>  config file (default: $XDG_CONFIG_HOME/commit-watch/config.yml)
  -o, --output <path>  write the report to <path> instead of emailing it
      --dry-run        print the report; send nothing, save no state (env: DRY_RUN=true)
  -h, --help           show this help
      --version        print the version`

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export interface CliArgs {
  verbose: boolean
  config?: string
  output?: string
  dryRun: boolean
  help: boolean
  version: boolean
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        verbose: { type: 'boolean', short: 'v' },
        config: { type: 'string' },
        output: { type: 'string', short: 'o' },
        'dry-run': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
      },
    }).values
  } catch (err) {
    throw new UsageError(errorMessage(err))
  }
}

export function parseCliArgs(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
): CliArgs {
  const values = parseFlags(argv)
  return {
    verbose: values.verbose ?? env.VERBOSE === 'true',
    config: values.config,
    output: values.output,
    dryRun: values['dry-run'] ?? env.DRY_RUN === 'true',
    help: values.help ?? false,
    version: values.version ?? false,
  }
}

export function packageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(REPO_ROOT, 'package.json'), 'utf-8'))
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version
  }
  return 'unknown'
}
