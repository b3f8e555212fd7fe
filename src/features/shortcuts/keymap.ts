import type { Action, ActionType, NavigatorMode } from '@/features/explorer/model/types'

export type KeyBinding = {
  action: ActionType
  label: string
  keys: string[]
}

const ESC = 0x1b
const CSI = 0x5b
const TAB = 0x09
const BACKSPACE = 0x7f
const CTRL_H = 0x08
const ENTER = 0x0d
const NEWLINE = 0x0a

export const DEFAULT_KEYMAP: KeyBinding[] = [
  { action: 'quit', label: 'Quit', keys: ['q'] },
  { action: 'left', label: 'Parent directory', keys: ['h', 'Left'] },
  { action: 'down', label: 'Cursor down', keys: ['j', 'Down'] },
  { action: 'up', label: 'Cursor up', keys: ['k', 'Up'] },
  { action: 'right', label: 'Enter directory', keys: ['l', 'Right'] },
  { action: 'top', label: 'Jump to top', keys: ['g'] },
  { action: 'bottom', label: 'Jump to bottom', keys: ['G'] },
  { action: 'toggle_select', label: 'Toggle selection', keys: ['Space'] },
  { action: 'select_all', label: 'Select all', keys: ['a'] },
  { action: 'invert_select', label: 'Invert selection', keys: ['A'] },
  { action: 'delete', label: 'Delete selection', keys: ['d'] },
  { action: 'move', label: 'Move selection', keys: ['v'] },
  { action: 'paste', label: 'Paste moved entries', keys: ['p'] },
  { action: 'toggle_hidden', label: 'Show hidden', keys: ['.'] },
  { action: 'search', label: 'Search', keys: ['/'] },
]

type ArrowType = Extract<ActionType, 'up' | 'down' | 'left' | 'right'>

const ARROWS: Record<string, ArrowType> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
}

const keyToken = (key: string) => (key === 'Space' ? ' ' : key)

const browsingTable = (keymap: KeyBinding[]) => {
  const table = new Map<string, ActionType>()
  for (const binding of keymap) {
    for (const key of binding.keys) {
      const token = keyToken(key)
      // Multi-byte keys (arrows) are decoded from escape sequences.
      if (token.length === 1) table.set(token, binding.action)
    }
  }
  return table
}

const simple = (type: ActionType): Action | null => {
  switch (type) {
    case 'search_input':
    case 'resize':
      return null
    default:
      return { type }
  }
}

const arrowFor = (bytes: Uint8Array, i: number): ArrowType | null => {
  if (bytes[i] !== ESC || bytes[i + 1] !== CSI) return null
  const final = bytes[i + 2]
  if (final === undefined) return null
  return ARROWS[String.fromCharCode(final)] ?? null
}

const isPrintable = (byte: number) => byte >= 0x20 && byte < 0x7f

/**
 * Decodes one chunk of raw terminal input into actions. Unknown bytes are
 * dropped. In `searching` mode printable bytes become query text instead of
 * commands.
 */
export const decodeInput = (
  bytes: Uint8Array,
  mode: NavigatorMode,
  keymap: KeyBinding[] = DEFAULT_KEYMAP,
): Action[] => {
  const table = browsingTable(keymap)
  const actions: Action[] = []
  let text = ''

  const flushText = () => {
    if (!text) return
    actions.push({ type: 'search_input', text })
    text = ''
  }

  let i = 0
  while (i < bytes.length) {
    const byte = bytes[i]
    const arrow = arrowFor(bytes, i)
    if (arrow) {
      flushText()
      if (mode === 'browsing' || arrow === 'up' || arrow === 'down') {
        actions.push({ type: arrow })
      }
      i += 3
      continue
    }

    if (mode === 'searching') {
      if (isPrintable(byte)) {
        text += String.fromCharCode(byte)
      } else {
        flushText()
        if (byte === ESC) actions.push({ type: 'search_cancel' })
        else if (byte === ENTER || byte === NEWLINE) actions.push({ type: 'search_accept' })
        else if (byte === BACKSPACE || byte === CTRL_H) actions.push({ type: 'search_backspace' })
        else if (byte === TAB) actions.push({ type: 'toggle_select' })
      }
      i += 1
      continue
    }

    const bound = table.get(String.fromCharCode(byte))
    const action = bound ? simple(bound) : null
    if (action) actions.push(action)
    i += 1
  }
  flushText()
  return actions
}

/**
 * Splits a chunk into single keystrokes so each one can be decoded in the
 * mode left behind by the previous one. Arrow sequences stay whole.
 */
export const splitKeys = (bytes: Uint8Array): Uint8Array[] => {
  const keys: Uint8Array[] = []
  let i = 0
  while (i < bytes.length) {
    const width = arrowFor(bytes, i) ? 3 : 1
    keys.push(bytes.subarray(i, i + width))
    i += width
  }
  return keys
}

export const describeKeymap = (keymap: KeyBinding[] = DEFAULT_KEYMAP) =>
  keymap.map((binding) => `  ${binding.keys.join(', ').padEnd(12)} ${binding.label}`).join('\n')
