export type EntryKind = 'dir' | 'file' | 'link'

/** One directory entry as the filesystem hands it over, before ordering. Names are raw bytes. */
export type RawEntry = {
  name: Uint8Array
  kind: EntryKind
}

export type ListingOptions = {
  showHidden: boolean
  hiddenPrefix: string
}

export type NavigatorMode = 'browsing' | 'searching'

export type Action =
  | { type: 'quit' }
  | { type: 'up' }
  | { type: 'down' }
  | { type: 'left' }
  | { type: 'right' }
  | { type: 'top' }
  | { type: 'bottom' }
  | { type: 'toggle_select' }
  | { type: 'select_all' }
  | { type: 'invert_select' }
  | { type: 'delete' }
  | { type: 'move' }
  | { type: 'paste' }
  | { type: 'toggle_hidden' }
  | { type: 'search' }
  | { type: 'search_input'; text: string }
  | { type: 'search_backspace' }
  | { type: 'search_accept' }
  | { type: 'search_cancel' }
  | { type: 'resize'; height: number }

export type ActionType = Action['type']
