import { describe, expect, it } from 'vitest'
import { getErrorCode } from '@/shared/lib/error'
import { loadConfig, usage } from './config'

const load = (argv: string[], env: Record<string, string | undefined> = {}) =>
  loadConfig({ argv, env, cwd: '/home/user' })

describe('loadConfig', () => {
  it('defaults to the working directory', () => {
    expect(load([])).toEqual({
      kind: 'run',
      config: {
        startDir: '/home/user',
        picker: false,
        showHidden: false,
        hiddenPrefix: '.',
        lastDirFile: null,
      },
    })
  })

  it('reads flags and a relative start directory', () => {
    const result = load(['-p', '--hidden', 'src/../docs'])

    expect(result.kind === 'run' && result.config).toMatchObject({
      startDir: '/home/user/docs',
      picker: true,
      showHidden: true,
    })
  })

  it('takes the last-directory file from the environment', () => {
    const result = load([], { DIRPICK_LASTDIR: 'state/lastdir' })

    expect(result.kind === 'run' && result.config.lastDirFile).toBe('/home/user/state/lastdir')
  })

  it('ignores a blank last-directory variable', () => {
    const result = load([], { DIRPICK_LASTDIR: '  ' })

    expect(result.kind === 'run' && result.config.lastDirFile).toBeNull()
  })

  it('returns usage for --help', () => {
    expect(load(['--help'])).toEqual({ kind: 'help', text: usage() })
    expect(usage().split('\n')[0]).toBe('Usage: dirpick [options] [dir]')
  })

  it('rejects unknown flags', () => {
    let caught: unknown
    try {
      load(['--bogus'])
    } catch (error) {
      caught = error
    }
    expect(getErrorCode(caught)).toBe('config_invalid')
  })

  it('rejects more than one directory', () => {
    expect(() => load(['a', 'b'])).toThrow('Expected at most one directory, got 2')
  })
})
