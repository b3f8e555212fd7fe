import type { EntryKind, ListingOptions, RawEntry } from './types'

const DEFAULT_CAPACITY = 1024

/**
 * Flyweight listing of the current directory: every name packed into one
 * reusable byte buffer, delimited by end offsets.
 *
 * The buffer is the ephemeral allocation domain. `clear()` keeps it, so any
 * view returned by `nameAt` is only valid until the next `clear()`. Copy the
 * bytes out before a reset if they need to live longer.
 */
export const createEntryStore = (initialCapacity: number = DEFAULT_CAPACITY) => {
  let names = Buffer.alloc(Math.max(1, initialCapacity))
  let used = 0
  const ends: number[] = []
  const kinds: EntryKind[] = []
  let dirs = 0

  const ensureCapacity = (extra: number) => {
    if (used + extra <= names.length) return
    let next = names.length * 2
    while (next < used + extra) next *= 2
    const grown = Buffer.alloc(next)
    names.copy(grown, 0, 0, used)
    names = grown
  }

  const checkIndex = (index: number) => {
    if (!Number.isInteger(index) || index < 0 || index >= ends.length) {
      throw new RangeError(`Entry index ${index} out of range (total ${ends.length})`)
    }
  }

  const clear = () => {
    used = 0
    ends.length = 0
    kinds.length = 0
    dirs = 0
  }

  const append = (name: string | Uint8Array, kind: EntryKind) => {
    const bytes = typeof name === 'string' ? Buffer.from(name, 'utf8') : name
    ensureCapacity(bytes.length)
    names.set(bytes, used)
    used += bytes.length
    ends.push(used)
    kinds.push(kind)
    if (kind === 'dir') dirs += 1
  }

  const nameAt = (index: number): Buffer => {
    checkIndex(index)
    const start = index === 0 ? 0 : ends[index - 1]
    return names.subarray(start, ends[index])
  }

  const nameStringAt = (index: number) => nameAt(index).toString('utf8')

  const kindAt = (index: number): EntryKind => {
    checkIndex(index)
    return kinds[index]
  }

  const indexOfName = (name: string | Uint8Array, from = 0, to = ends.length): number | null => {
    const needle = typeof name === 'string' ? Buffer.from(name, 'utf8') : name
    const hi = Math.min(to, ends.length)
    for (let i = Math.max(0, from); i < hi; i++) {
      if (nameAt(i).equals(needle)) return i
    }
    return null
  }

  return {
    clear,
    append,
    nameAt,
    nameStringAt,
    kindAt,
    indexOfName,
    totalEntries: () => ends.length,
    dirCount: () => dirs,
    capacity: () => names.length,
    bytesUsed: () => used,
  }
}

export type EntryStore = ReturnType<typeof createEntryStore>

export const isHiddenName = (name: Uint8Array, opts: ListingOptions) => {
  if (opts.showHidden || opts.hiddenPrefix.length === 0) return false
  const prefix = Buffer.from(opts.hiddenPrefix, 'utf8')
  return prefix.length <= name.length && prefix.equals(name.subarray(0, prefix.length))
}

/**
 * Clears the store and refills it from a raw listing: directories first, then
 * everything else, each group in enumeration order.
 */
export const populateEntries = (store: EntryStore, raw: RawEntry[], opts: ListingOptions) => {
  const rest: RawEntry[] = []
  store.clear()
  for (const entry of raw) {
    if (isHiddenName(entry.name, opts)) continue
    if (entry.kind === 'dir') {
      store.append(entry.name, entry.kind)
    } else {
      rest.push(entry)
    }
  }
  for (const entry of rest) {
    store.append(entry.name, entry.kind)
  }
  return store.totalEntries()
}
