import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs'
import { dirname } from 'path'
import { z } from 'zod'
import { errorMessage, type Logger } from './log.js'
import type { WatermarkMap } from './types.js'

const StateFileSchema = z.object({
  last_seen: z.record(z.string(), z.string()).default({}),
})

// Missing, unreadable or malformed state all mean "nothing seen yet".
export function loadWatermarks(path: string): WatermarkMap {
  if (!existsSync(path)) return new Map()
  try {
    const parsed = StateFileSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')))
    if (!parsed.success) return new Map()
    return new Map(Object.entries(parsed.data.last_seen))
  } catch {
    return new Map()
  }
}

export function serializeWatermarks(map: WatermarkMap): string {
  const lastSeen: Record<string, string> = {}
  for (const url of [...map.keys()].sort()) {
    const id = map.get(url)
    if (id !== undefined) lastSeen[url] = id
  }
  return JSON.stringify({ last_seen: lastSeen }, null, 2) + '\n'
}

/**
 * Writes the map through a temp file + rename so a crash never leaves a
 * truncated state file. Returns false (after logging) instead of throwing.
 */
export function saveWatermarks(map: WatermarkMap, path: string, log: Logger): boolean {
  const tmp = `${path}.tmp`
  try {
    mkdirSync(dirname(path), { recursive: true })
    writeFileSync(tmp, serializeWatermarks(map), 'utf-8')
    renameSync(tmp, path)
    log.debug(`State written to ${path}`)
    return true
  } catch (err) {
    log.warn(`could not write state file ${path}: ${errorMessage(err)}`)
    if (existsSync(tmp)) rmSync(tmp, { force: true })
    return false
  }
}
