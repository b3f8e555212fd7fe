import type { EntryStore } from '../model/entryStore'

export const matchEntries = (store: EntryStore, query: string) => {
  const needle = query.toLowerCase()
  const out: number[] = []
  for (let i = 0; i < store.totalEntries(); i++) {
    if (!needle || store.nameStringAt(i).toLowerCase().includes(needle)) out.push(i)
  }
  return out
}

/**
 * Read-only filtered view over the entry store. Indices handed out by
 * `focused()` are entry-store indices; `cursor()` is a position in the
 * match list.
 */
export const createSearchSession = (store: EntryStore, savedCursor: number) => {
  let query = ''
  let matches = matchEntries(store, query)
  let cursor = 0

  const setQuery = (next: string) => {
    query = next
    matches = matchEntries(store, query)
    cursor = 0
  }

  const move = (delta: number) => {
    if (matches.length === 0) return
    cursor = (cursor + delta + matches.length) % matches.length
  }

  return {
    append: (text: string) => setQuery(query + text),
    backspace: () => setQuery(query.slice(0, -1)),
    move,
    query: () => query,
    matches: () => matches,
    cursor: () => cursor,
    focused: (): number | null => matches[cursor] ?? null,
    savedCursor: () => savedCursor,
  }
}

export type SearchSession = ReturnType<typeof createSearchSession>
