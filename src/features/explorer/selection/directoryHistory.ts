import type { EntryStore } from '../model/entryStore'
import type { Selection } from './selection'
import { byteName, joinPath } from '../utils'

const NAME_SEPARATOR = 0

/** Owned copy of one directory's selection, detached from the entry store. */
export type SelectionSnapshot = {
  path: string
  names: Buffer
  indices: number[]
}

export type RestoreResult = {
  restored: number
  dropped: number
}

export const splitNames = (names: Buffer): Buffer[] => {
  const out: Buffer[] = []
  let start = 0
  for (let i = 0; i < names.length; i++) {
    if (names[i] !== NAME_SEPARATOR) continue
    out.push(names.subarray(start, i))
    start = i + 1
  }
  return out
}

/** Byte paths of every remembered entry. */
export const snapshotTargets = (snapshot: SelectionSnapshot) =>
  splitNames(snapshot.names).map((name) => joinPath(snapshot.path, byteName(name)))

/**
 * Per-directory memory for selections so we can navigate away and back
 * without losing them. A snapshot is single-use: `take` hands it back and
 * forgets it.
 */
export const createDirectoryHistory = () => {
  const memory = new Map<string, SelectionSnapshot>()

  const capture = (path: string, store: EntryStore, selection: Selection) => {
    if (!path || selection.selectedCount() === 0) return null
    const indices = selection.selectedIndices()
    const parts: Buffer[] = []
    for (const index of indices) {
      parts.push(store.nameAt(index), Buffer.of(NAME_SEPARATOR))
    }
    // Buffer.concat copies, so the snapshot owns its bytes once the store is reset.
    const snapshot: SelectionSnapshot = {
      path,
      names: Buffer.concat(parts),
      indices,
    }
    if (memory.has(path)) {
      memory.delete(path)
    }
    memory.set(path, snapshot)
    return snapshot
  }

  const take = (path: string): SelectionSnapshot | null => {
    const stored = memory.get(path)
    if (!stored) return null
    memory.delete(path)
    return stored
  }

  const restore = (path: string, store: EntryStore, selection: Selection): RestoreResult | null => {
    const stored = take(path)
    if (!stored) return null

    const names = splitNames(stored.names)
    const total = store.totalEntries()
    const found = new Set<number>()
    let dropped = 0
    names.forEach((name, i) => {
      const index = stored.indices[i]
      if (index !== undefined && index < total && store.nameAt(index).equals(name)) {
        found.add(index)
        return
      }
      const moved = store.indexOfName(name)
      if (moved === null) {
        dropped++
      } else {
        found.add(moved)
      }
    })
    selection.restore(found)
    return { restored: found.size, dropped }
  }

  /** Removes and returns every snapshot, oldest first. */
  const flush = () => {
    const all = [...memory.values()]
    memory.clear()
    return all
  }

  return {
    capture,
    take,
    restore,
    flush,
    has: (path: string) => memory.has(path),
    peek: (path: string) => memory.get(path) ?? null,
    snapshots: () => [...memory.values()],
    size: () => memory.size,
  }
}

export type DirectoryHistory = ReturnType<typeof createDirectoryHistory>
