import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'

vi.mock('child_process', () => ({
  execFileSync: vi.fn(() => ''),
}))

import { execFileSync } from 'child_process'
import { ensureMirror, gitMirrorProvider, mirrorKey, mirrorPath, type MirrorProvider } from '../mirror.js'
import { memoryLogger } from './logger.js'

const URL = 'https://github.com/example/project.git'

let cacheRoot: string

beforeEach(() => {
  cacheRoot = mkdtempSync(join(tmpdir(), 'commit-watch-mirror-'))
})

afterEach(() => {
  rmSync(cacheRoot, { recursive: true, force: true })
  vi.mocked(execFileSync).mockClear()
})

describe('mirrorKey', () => {
  it('is the SHA-1 hex digest of the URL string', () => {
    expect(mirrorKey(URL)).toBe('968cae2225a94a1272c8389de53032bf0f6249d8')
  })

  it('is stable across calls', () => {
    expect(mirrorKey(URL)).toBe(mirrorKey(URL))
  })

  it('differs for URL strings that name the same repo', () => {
    expect(mirrorKey('https://github.com/example/project')).toBe('8f8c194522dd55f15ca14cccedb15c87a4b6817a')
    expect(mirrorKey('https://github.com/example/project')).not.toBe(mirrorKey(URL))
  })

  it('mirror path sits directly under the cache root', () => {
    expect(mirrorPath(URL, '/var/cache/cw')).toBe('/var/cache/cw/968cae2225a94a1272c8389de53032bf0f6249d8')
  })
})

describe('ensureMirror — fresh clone', () => {
  it('clones into the hashed directory when no mirror exists', () => {
    const provider: MirrorProvider = { clone: vi.fn(), update: vi.fn() }
    const dir = ensureMirror(URL, cacheRoot, memoryLogger(), provider)
    expect(dir).toBe(join(cacheRoot, mirrorKey(URL)))
    expect(provider.clone).toHaveBeenCalledWith(URL, dir)
    expect(provider.update).not.toHaveBeenCalled()
  })

  it('throws and removes the partial directory when the clone fails', () => {
    const provider: MirrorProvider = {
      clone: vi.fn((_url: string, dir: string) => {
        mkdirSync(dir)
        writeFileSync(join(dir, 'HEAD'), 'partial')
        throw new Error('fatal: could not read Username')
      }),
      update: vi.fn(),
    }
    expect(() => ensureMirror(URL, cacheRoot, memoryLogger(), provider)).toThrow(
      `clone of ${URL} failed: fatal: could not read Username`,
    )
    expect(existsSync(mirrorPath(URL, cacheRoot))).toBe(false)
  })
})

describe('ensureMirror — existing mirror', () => {
  beforeEach(() => {
    mkdirSync(mirrorPath(URL, cacheRoot))
  })

  it('updates in place instead of cloning', () => {
    const provider: MirrorProvider = { clone: vi.fn(), update: vi.fn() }
    const dir = ensureMirror(URL, cacheRoot, memoryLogger(), provider)
    expect(provider.update).toHaveBeenCalledWith(dir)
    expect(provider.clone).not.toHaveBeenCalled()
  })

  it('keeps the stale mirror and warns when the update fails', () => {
    const log = memoryLogger()
    const provider: MirrorProvider = {
      clone: vi.fn(),
      update: vi.fn(() => {
        throw new Error('Could not resolve host: github.com')
      }),
    }
    const dir = ensureMirror(URL, cacheRoot, log, provider)
    expect(dir).toBe(mirrorPath(URL, cacheRoot))
    const warnings = log.lines.filter((l) => l.level === 'warn')
    expect(warnings).toHaveLength(1)
    expect(warnings[0].msg).toBe(
      `git pull failed for ${URL} — using cached mirror\nCould not resolve host: github.com`,
    )
  })
})

describe('gitMirrorProvider', () => {
  it('clones with an argument vector', () => {
    gitMirrorProvider(1000).clone(URL, '/tmp/m')
    expect(execFileSync).toHaveBeenCalledWith(
      'git',
      ['clone', '--quiet', '--', URL, '/tmp/m'],
      expect.objectContaining({ timeout: 1000 }),
    )
  })

  it('keeps a URL that looks like a flag after the -- separator', () => {
    gitMirrorProvider().clone('--upload-pack=touch /tmp/x', '/tmp/m')
    const [, args] = vi.mocked(execFileSync).mock.calls[0]
    expect(args).toEqual(['clone', '--quiet', '--', '--upload-pack=touch /tmp/x', '/tmp/m'])
  })

  it('fast-forwards the checked-out branch on update', () => {
    gitMirrorProvider().update('/tmp/m')
    expect(execFileSync).toHaveBeenCalledWith(
      'git',
      ['-C', '/tmp/m', 'pull', '--quiet', '--ff-only'],
      expect.objectContaining({ timeout: 300_000 }),
    )
  })
})
