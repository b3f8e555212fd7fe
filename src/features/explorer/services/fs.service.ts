import { cp, lstat, readdir, realpath, rename, rm, writeFile } from 'node:fs/promises'
import { normalizeError } from '@/shared/lib/error'
import type { EntryKind, RawEntry } from '../model/types'
import { baseName, byteName, displayPath, joinPath, pathBytes, toBytePath } from '../utils'

/** Every path in and out is a byte path (see `toBytePath`). */
export type FileSystemService = {
  listDir: (path: string) => Promise<RawEntry[]>
  resolveDir: (path: string) => Promise<string>
  remove: (path: string) => Promise<void>
  /** Moves `source` into `destDir`, keeping its name. Resolves to the new path. */
  move: (source: string, destDir: string) => Promise<string>
  writeBytes: (path: string, contents: Uint8Array) => Promise<void>
}

type KindSource = {
  isDirectory: () => boolean
  isSymbolicLink: () => boolean
}

const call = async <T>(fn: () => Promise<T>): Promise<T> => {
  try {
    return await fn()
  } catch (error) {
    throw normalizeError(error)
  }
}

const entryKind = (stats: KindSource): EntryKind => {
  if (stats.isDirectory()) return 'dir'
  if (stats.isSymbolicLink()) return 'link'
  return 'file'
}

const isMissing = (error: unknown) => normalizeError(error).code === 'ENOENT'

const exists = async (path: string) => {
  try {
    await lstat(pathBytes(path))
    return true
  } catch (error) {
    if (isMissing(error)) return false
    throw error
  }
}

// Entries removed between readdir and lstat are skipped.
const statEntry = async (dir: string, name: Buffer): Promise<RawEntry | null> => {
  try {
    return { name, kind: entryKind(await lstat(pathBytes(joinPath(dir, byteName(name))))) }
  } catch (error) {
    if (isMissing(error)) return null
    throw error
  }
}

// cp takes string paths only, so it is used only when the path decodes cleanly.
const textPath = (path: string) => {
  const text = displayPath(path)
  return toBytePath(text) === path ? text : null
}

const copyAcross = async (source: string, target: string, cause: unknown) => {
  const from = textPath(source)
  const to = textPath(target)
  if (from === null || to === null) throw cause
  await cp(from, to, { recursive: true, errorOnExist: true, force: false })
  await rm(pathBytes(source), { recursive: true })
}

export const createNodeFileSystem = (): FileSystemService => ({
  listDir: (path) =>
    call(async () => {
      const names = await readdir(pathBytes(path), { encoding: 'buffer' })
      const entries = await Promise.all(names.map((name) => statEntry(path, name)))
      return entries.filter((entry): entry is RawEntry => entry !== null)
    }),

  resolveDir: (path) =>
    call(async () => (await realpath(pathBytes(path), { encoding: 'buffer' })).toString('latin1')),

  remove: (path) => call(() => rm(pathBytes(path), { recursive: true })),

  move: (source, destDir) =>
    call(async () => {
      const target = joinPath(destDir, baseName(source))
      if (target === source) return target
      if (await exists(target)) {
        throw Object.assign(new Error(`${displayPath(target)} already exists`), { code: 'EEXIST' })
      }
      try {
        await rename(pathBytes(source), pathBytes(target))
      } catch (error) {
        if (normalizeError(error).code !== 'EXDEV') throw error
        await copyAcross(source, target, error)
      }
      return target
    }),

  writeBytes: (path, contents) => call(() => writeFile(pathBytes(path), contents)),
})
