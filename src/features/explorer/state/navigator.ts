import { writable } from 'svelte/store'
import { createAppError, getErrorMessage } from '@/shared/lib/error'
import { createEntryStore, populateEntries, type EntryStore } from '../model/entryStore'
import type { Action, NavigatorMode, RawEntry } from '../model/types'
import { createDirectoryHistory, snapshotTargets, type DirectoryHistory } from '../selection/directoryHistory'
import { createSelection, type Selection } from '../selection/selection'
import type { FileSystemService } from '../services/fs.service'
import { batchError, createFileOps, type FileOps } from '../file-ops/fileOps'
import { createClipboardState, type ClipboardStore } from '../stores/clipboardState'
import { baseName, byteName, displayPath, isRootPath, joinPath, normalizePath, parentPath, pathBytes } from '../utils'
import { createScrollWindow, type ScrollWindow } from './scrollWindow'
import { createSearchSession, type SearchSession } from './searchSession'

export type NavigatorState = {
  cwd: string
  cursor: number
  running: boolean
  mode: NavigatorMode
  showHidden: boolean
  hiddenPrefix: string
  entries: EntryStore
  selection: Selection
  window: ScrollWindow
  history: DirectoryHistory
  search: SearchSession | null
  error: string
}

type Deps = {
  fs: FileSystemService
  startDir: string
  visibleHeight: number
  showHidden?: boolean
  hiddenPrefix?: string
  fileOps?: FileOps
  clipboard?: ClipboardStore
}

export const visibleTotal = (state: NavigatorState) =>
  state.search ? state.search.matches().length : state.entries.totalEntries()

/** Cursor position in whatever list is on screen. */
export const visibleCursor = (state: NavigatorState) => (state.search ? state.search.cursor() : state.cursor)

const selectedTargets = (state: NavigatorState) =>
  state.selection.selectedIndices().map((index) => joinPath(state.cwd, byteName(state.entries.nameAt(index))))

const clampCursor = (cursor: number, total: number) => (total === 0 ? 0 : Math.min(Math.max(0, cursor), total - 1))

const placeCursor = (state: NavigatorState, cursor: number) => {
  state.cursor = clampCursor(cursor, state.entries.totalEntries())
  state.window.advance(state.cursor)
}

// Every re-listing goes through here so the selection is resized before anything reads it.
const applyListing = (state: NavigatorState, raw: RawEntry[]) => {
  populateEntries(state.entries, raw, { showHidden: state.showHidden, hiddenPrefix: state.hiddenPrefix })
  state.selection.resizeAndClear(state.entries.totalEntries())
  state.window.clamp(state.entries.totalEntries())
}

const moveCursor = (state: NavigatorState, delta: 1 | -1) => {
  const total = state.entries.totalEntries()
  if (total === 0) return
  state.cursor = (state.cursor + delta + total) % total
  state.window.advance(state.cursor)
}

const jumpCursor = (state: NavigatorState, to: 'top' | 'bottom') => {
  const total = state.entries.totalEntries()
  if (total === 0) return
  placeCursor(state, to === 'top' ? 0 : total - 1)
}

const toggleSelect = (state: NavigatorState) => {
  if (state.search) {
    const focused = state.search.focused()
    if (focused !== null) state.selection.toggle(focused)
    return
  }
  if (state.entries.totalEntries() === 0) return
  state.selection.toggle(state.cursor)
}

/**
 * Swaps the current listing for `target`'s. The outgoing selection is copied
 * into history before the store is reset; the incoming one is restored after.
 */
const enterListing = (
  state: NavigatorState,
  target: string,
  raw: RawEntry[],
  focusName: Uint8Array | null,
) => {
  state.history.capture(state.cwd, state.entries, state.selection)
  applyListing(state, raw)
  state.history.restore(target, state.entries, state.selection)
  state.cwd = target

  const found = focusName === null ? null : state.entries.indexOfName(focusName, 0, state.entries.dirCount())
  state.window.reset()
  placeCursor(state, found ?? 0)
}

const endSearch = (state: NavigatorState, cursor: number) => {
  state.search = null
  state.mode = 'browsing'
  state.window.reset()
  state.window.clamp(state.entries.totalEntries())
  placeCursor(state, cursor)
}

export const createNavigator = (deps: Deps) => {
  const fileOps = deps.fileOps ?? createFileOps({ fs: deps.fs })
  const clipboard = deps.clipboard ?? createClipboardState()

  const state: NavigatorState = {
    cwd: normalizePath(deps.startDir),
    cursor: 0,
    running: true,
    mode: 'browsing',
    showHidden: deps.showHidden ?? false,
    hiddenPrefix: deps.hiddenPrefix ?? '.',
    entries: createEntryStore(),
    selection: createSelection(),
    window: createScrollWindow(deps.visibleHeight),
    history: createDirectoryHistory(),
    search: null,
    error: '',
  }
  const store = writable(state)

  const listOrReport = async (path: string): Promise<RawEntry[] | null> => {
    try {
      return await deps.fs.listDir(path)
    } catch (error) {
      state.error = createAppError('list_failed', `Cannot open ${displayPath(path)}: ${getErrorMessage(error)}`, {
        cause: error,
      }).message
      return null
    }
  }

  /** Re-lists the current directory, climbing to the nearest parent that still exists. */
  const refresh = async (focusName: Uint8Array | null) => {
    let path = state.cwd
    for (;;) {
      try {
        const raw = await deps.fs.listDir(path)
        state.cwd = path
        applyListing(state, raw)
        const found = focusName === null ? null : state.entries.indexOfName(focusName)
        placeCursor(state, found ?? state.cursor)
        return
      } catch (error) {
        if (isRootPath(path)) {
          throw createAppError('fatal_io', `Cannot list ${displayPath(path)}: ${getErrorMessage(error)}`, {
            cause: error,
          })
        }
        path = parentPath(path)
      }
    }
  }

  const goLeft = async () => {
    if (isRootPath(state.cwd)) return
    const parent = parentPath(state.cwd)
    const raw = await listOrReport(parent)
    if (!raw) return
    enterListing(state, parent, raw, pathBytes(baseName(state.cwd)))
  }

  const goRight = async () => {
    const total = state.entries.totalEntries()
    if (total === 0 || state.cursor >= state.entries.dirCount()) return
    const target = joinPath(state.cwd, byteName(state.entries.nameAt(state.cursor)))
    const raw = await listOrReport(target)
    if (!raw) return
    enterListing(state, target, raw, null)
  }

  const toggleHidden = async () => {
    // Copied: the store's bytes are overwritten by the next listing.
    const focus = state.entries.totalEntries() > 0 ? Buffer.from(state.entries.nameAt(state.cursor)) : null
    const raw = await listOrReport(state.cwd)
    if (!raw) return
    state.showHidden = !state.showHidden
    applyListing(state, raw)
    const found = focus === null ? null : state.entries.indexOfName(focus)
    placeCursor(state, found ?? state.cursor)
  }

  // History goes first: its snapshots are the targets outside the current directory.
  const collectTargets = () => [...state.history.flush().flatMap(snapshotTargets), ...selectedTargets(state)]

  const deleteSelection = async () => {
    const targets = collectTargets()
    if (targets.length === 0) return
    const result = await fileOps.deleteTargets(targets)
    await refresh(null)
    state.error = batchError('delete', result)?.message ?? ''
  }

  const markForMove = async () => {
    const targets = collectTargets()
    if (targets.length === 0) return
    clipboard.setPaths(targets)
    await refresh(null)
  }

  const paste = async () => {
    const paths = clipboard.paths()
    if (paths.length === 0) return
    const result = await fileOps.moveTargets(paths, state.cwd)
    clipboard.clear()
    clipboard.setPaths(result.failures.map((failure) => failure.path))
    await refresh(null)
    state.error = batchError('move', result)?.message ?? ''
  }

  const dispatchSearch = (action: Action) => {
    const search = state.search
    if (!search) return
    switch (action.type) {
      case 'search_input':
        search.append(action.text)
        state.window.reset()
        return
      case 'search_backspace':
        search.backspace()
        state.window.reset()
        return
      case 'up':
      case 'down':
        search.move(action.type === 'up' ? -1 : 1)
        state.window.advance(search.cursor())
        return
      case 'toggle_select':
        toggleSelect(state)
        return
      case 'search_accept':
        endSearch(state, search.focused() ?? search.savedCursor())
        return
      case 'search_cancel':
        endSearch(state, search.savedCursor())
        return
      case 'resize':
        state.window.resize(action.height, visibleTotal(state))
        state.window.advance(search.cursor())
        return
      default:
        return
    }
  }

  const dispatchBrowse = async (action: Action) => {
    switch (action.type) {
      case 'quit':
        state.running = false
        return
      case 'up':
        moveCursor(state, -1)
        return
      case 'down':
        moveCursor(state, 1)
        return
      case 'top':
      case 'bottom':
        jumpCursor(state, action.type)
        return
      case 'left':
        await goLeft()
        return
      case 'right':
        await goRight()
        return
      case 'toggle_select':
        toggleSelect(state)
        return
      case 'select_all':
        state.selection.selectAll()
        return
      case 'invert_select':
        state.selection.invert()
        return
      case 'delete':
        await deleteSelection()
        return
      case 'move':
        await markForMove()
        return
      case 'paste':
        await paste()
        return
      case 'toggle_hidden':
        await toggleHidden()
        return
      case 'search':
        state.search = createSearchSession(state.entries, state.cursor)
        state.mode = 'searching'
        state.window.reset()
        return
      case 'resize':
        state.window.resize(action.height, visibleTotal(state))
        state.window.advance(state.cursor)
        return
      case 'search_input':
      case 'search_backspace':
      case 'search_accept':
      case 'search_cancel':
        return
    }
  }

  const dispatch = async (action: Action) => {
    if (action.type !== 'resize') state.error = ''
    if (state.mode === 'searching') {
      dispatchSearch(action)
    } else {
      await dispatchBrowse(action)
    }
    if (state.selection.length() !== state.entries.totalEntries()) {
      throw new Error(
        `Selection length ${state.selection.length()} does not match ${state.entries.totalEntries()} entries`,
      )
    }
    store.set(state)
  }

  const init = async () => {
    try {
      state.cwd = normalizePath(await deps.fs.resolveDir(state.cwd))
      applyListing(state, await deps.fs.listDir(state.cwd))
    } catch (error) {
      throw createAppError('fatal_io', `Cannot open ${displayPath(state.cwd)}: ${getErrorMessage(error)}`, {
        cause: error,
      })
    }
    placeCursor(state, 0)
    store.set(state)
  }

  /** Every selected file: the current directory first, then remembered directories. */
  const pickedPaths = () => [...selectedTargets(state), ...state.history.snapshots().flatMap(snapshotTargets)]

  return {
    subscribe: store.subscribe,
    init,
    dispatch,
    pickedPaths,
    clipboard,
    state: () => state,
  }
}

export type Navigator = ReturnType<typeof createNavigator>
