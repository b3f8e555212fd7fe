import { get, writable } from 'svelte/store'

type ClipboardState = {
  paths: string[]
}

/** Entries marked with "move", waiting for a paste into another directory. */
export const createClipboardState = () => {
  const state = writable<ClipboardState>({ paths: [] })

  const setPaths = (paths: Iterable<string>) => {
    const merged = new Set([...get(state).paths, ...paths])
    state.set({ paths: [...merged] })
  }

  const clear = () => {
    state.set({ paths: [] })
  }

  return {
    subscribe: state.subscribe,
    setPaths,
    clear,
    paths: () => get(state).paths,
    size: () => get(state).paths.length,
  }
}

export type ClipboardStore = ReturnType<typeof createClipboardState>
