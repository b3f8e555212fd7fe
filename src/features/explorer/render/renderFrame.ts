import type { EntryKind } from '../model/types'
import { visibleCursor, visibleTotal, type NavigatorState } from '../state/navigator'
import { displayPath } from '../utils'
import { ansi, EOL, sgr } from './ansi'

/** Path line plus status line above the listing. */
export const HEADER_LINES = 2

export type FrameOptions = {
  columns: number
  pendingMoves: number
}

export const listHeight = (rows: number) => Math.max(1, rows - HEADER_LINES)

// C0, DEL and C1 controls in a file name would be interpreted, not shown.
export const sanitizeName = (name: string) => name.replace(/[\x00-\x1f\x7f-\x9f]/g, '?')

// East Asian wide and emoji blocks take two cells.
const WIDE_RANGES: Array<[number, number]> = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f300, 0x1f64f],
  [0x1f900, 0x1f9ff],
  [0x20000, 0x3fffd],
]

const ZERO_WIDTH_RANGES: Array<[number, number]> = [
  [0x0300, 0x036f],
  [0x200b, 0x200f],
  [0x20d0, 0x20ff],
  [0xfe00, 0xfe0f],
]

const inRanges = (code: number, ranges: Array<[number, number]>) =>
  ranges.some(([lo, hi]) => code >= lo && code <= hi)

export const cellWidth = (code: number) => {
  if (inRanges(code, ZERO_WIDTH_RANGES)) return 0
  return inRanges(code, WIDE_RANGES) ? 2 : 1
}

/** Cuts `text` to at most `columns` terminal cells, never inside a code point. */
export const fit = (text: string, columns: number) => {
  if (columns <= 0) return text
  let width = 0
  let out = ''
  for (const char of text) {
    const cells = cellWidth(char.codePointAt(0) ?? 0)
    if (width + cells > columns) break
    width += cells
    out += char
  }
  return out
}

const rowStyle = (kind: EntryKind, isCursor: boolean, isSelected: boolean) => {
  if (isCursor) return kind === 'dir' ? sgr.cursorDir : sgr.cursorOther
  if (isSelected) return sgr.selected
  return kind === 'dir' ? sgr.dir : kind === 'link' ? sgr.link : sgr.file
}

export const statusLine = (state: NavigatorState, pendingMoves: number) => {
  const parts = [`${state.selection.selectedCount()} selected`]
  if (pendingMoves > 0) parts.push(`${pendingMoves} to move`)
  if (state.showHidden) parts.push('hidden shown')
  let line = parts.join(', ')
  if (state.search) line += `  /${state.search.query()}`
  if (state.error) line += `  ${sgr.error}${state.error}${ansi.reset}`
  return line
}

export const renderRows = (state: NavigatorState, columns: number) => {
  const total = visibleTotal(state)
  const { start, end } = state.window.range(total)
  const cursor = visibleCursor(state)
  const matches = state.search?.matches() ?? null
  const lines: string[] = []
  for (let row = start; row < end; row++) {
    const index = matches ? matches[row] : row
    const kind = state.entries.kindAt(index)
    const isSelected = state.selection.isSelected(index)
    const marker = isSelected ? '*' : ' '
    const suffix = kind === 'dir' ? '/' : ''
    const text = fit(`${marker} ${sanitizeName(state.entries.nameStringAt(index))}${suffix}`, columns)
    lines.push(`${rowStyle(kind, row === cursor, isSelected)}${text}${ansi.reset}`)
  }
  return lines
}

/** Pure: draws one full frame from navigator state. */
export const renderFrame = (state: NavigatorState, opts: FrameOptions) => {
  const lines = [
    `${sgr.bold}${fit(sanitizeName(displayPath(state.cwd)), opts.columns)}${ansi.reset}`,
    statusLine(state, opts.pendingMoves),
    ...renderRows(state, opts.columns),
  ]
  return `${ansi.reset}${ansi.clearScreen}${lines.map((line) => `${line}${EOL}`).join('')}`
}
