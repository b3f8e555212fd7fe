export const ESC = '\x1b'

export const ansi = {
  reset: `${ESC}[0m`,
  clearScreen: `${ESC}[2J${ESC}[H`,
  hideCursor: `${ESC}[?25l`,
  showCursor: `${ESC}[?25h`,
  enterAltScreen: `${ESC}[?1049h`,
  exitAltScreen: `${ESC}[?1049l`,
} as const

export const sgr = {
  bold: `${ESC}[1m`,
  dir: `${ESC}[1;34m`,
  link: `${ESC}[36m`,
  file: '',
  selected: `${ESC}[1;33m`,
  cursorDir: `${ESC}[30;44m`,
  cursorOther: `${ESC}[30;47m`,
  error: `${ESC}[31m`,
} as const

export const EOL = '\r\n'
