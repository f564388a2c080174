export interface Logger {
  debug(msg: string): void
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

export function createLogger({ verbose }: { verbose: boolean }): Logger {
  return {
    debug: (msg) => {
      if (verbose) console.log(`  · ${msg}`)
    },
    info: (msg) => console.log(msg),
    warn: (msg) => console.warn(`  ⚠ ${msg}`),
    error: (msg) => console.error(`❌ ${msg}`),
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
