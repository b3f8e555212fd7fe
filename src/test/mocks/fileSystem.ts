import type { FileSystemService } from '@/features/explorer/services/fs.service'
import type { EntryKind } from '@/features/explorer/model/types'
import { baseName, byteName, joinPath, normalizePath, parentPath, pathBytes } from '@/features/explorer/utils'

/** Names and paths are byte strings, as the real service hands them out. */
export type FakeEntry = {
  name: string
  kind: EntryKind
}

export type FileTree = Record<string, FakeEntry[]>

const fsError = (code: string, message: string) => Object.assign(new Error(`${code}: ${message}`), { code })

const cloneTree = (tree: FileTree) => {
  const out = new Map<string, FakeEntry[]>()
  for (const [path, entries] of Object.entries(tree)) {
    out.set(normalizePath(path), entries.map((entry) => ({ ...entry })))
  }
  return out
}

/**
 * In-memory stand-in for the filesystem. Directories are the keys of the
 * tree; listing order is the array order.
 */
export const createFakeFileSystem = (tree: FileTree) => {
  const dirs = cloneTree(tree)
  const written = new Map<string, string>()
  const failing = new Set<string>()
  const calls: Array<{ op: 'remove' | 'move'; path: string }> = []

  const detach = (path: string) => {
    const parent = dirs.get(parentPath(path))
    const name = baseName(path)
    const idx = parent?.findIndex((entry) => entry.name === name) ?? -1
    if (!parent || idx < 0) throw fsError('ENOENT', path)
    const [entry] = parent.splice(idx, 1)
    return entry
  }

  const subtreeKeys = (path: string) =>
    [...dirs.keys()].filter((key) => key === path || key.startsWith(`${path}/`))

  const service: FileSystemService = {
    listDir: async (path) => {
      const entries = dirs.get(normalizePath(path))
      if (!entries) throw fsError('ENOENT', path)
      return entries.map((entry) => ({ name: pathBytes(entry.name), kind: entry.kind }))
    },

    resolveDir: async (path) => {
      const normalized = normalizePath(path)
      if (!dirs.has(normalized)) throw fsError('ENOENT', path)
      return normalized
    },

    remove: async (path) => {
      calls.push({ op: 'remove', path })
      if (failing.has(path)) throw fsError('EACCES', path)
      detach(path)
      for (const key of subtreeKeys(path)) dirs.delete(key)
    },

    move: async (source, destDir) => {
      calls.push({ op: 'move', path: source })
      if (failing.has(source)) throw fsError('EACCES', source)
      const dest = dirs.get(normalizePath(destDir))
      if (!dest) throw fsError('ENOENT', destDir)
      const target = joinPath(destDir, baseName(source))
      if (dest.some((entry) => entry.name === baseName(source))) throw fsError('EEXIST', target)
      const entry = detach(source)
      dest.push(entry)
      for (const key of subtreeKeys(source)) {
        const entries = dirs.get(key) ?? []
        dirs.delete(key)
        dirs.set(target + key.slice(source.length), entries)
      }
      return target
    },

    writeBytes: async (path, contents) => {
      written.set(path, byteName(contents))
    },
  }

  return {
    service,
    written,
    calls,
    failOn: (path: string) => {
      failing.add(path)
    },
    namesIn: (path: string) => (dirs.get(normalizePath(path)) ?? []).map((entry) => entry.name),
    addEntry: (dir: string, entry: FakeEntry) => {
      const entries = dirs.get(normalizePath(dir))
      if (!entries) throw fsError('ENOENT', dir)
      entries.push(entry)
      if (entry.kind === 'dir') dirs.set(joinPath(dir, entry.name), [])
    },
  }
}

export type FakeFileSystem = ReturnType<typeof createFakeFileSystem>
