import { execFile } from 'node:child_process'
import { tmpdir } from 'node:os'
import { fileURLToPath } from 'node:url'
import { promisify } from 'node:util'
import { describe, expect, it } from 'vitest'

const run = promisify(execFile)
const BIN = fileURLToPath(new URL('../../bin/dirpick.mjs', import.meta.url))

describe('dirpick command', () => {
  it('starts from a directory outside the package', async () => {
    const { stdout } = await run(process.execPath, [BIN, '--help'], { cwd: tmpdir() })

    expect(stdout.split('\n')[0]).toBe('Usage: dirpick [options] [dir]')
  }, 30_000)

  it('exits 2 on an unknown flag', async () => {
    await expect(run(process.execPath, [BIN, '--bogus'], { cwd: tmpdir() })).rejects.toMatchObject({ code: 2 })
  }, 30_000)
})
