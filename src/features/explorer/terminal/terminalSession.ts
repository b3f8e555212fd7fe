import { createAppError, getErrorMessage } from '@/shared/lib/error'
import { ansi } from '../render/ansi'

export type TerminalInput = {
  isTTY?: boolean
  isRaw?: boolean
  setRawMode?: (mode: boolean) => unknown
}

export type TerminalOutput = {
  write: (chunk: string) => unknown
  rows?: number
  columns?: number
  on: (event: 'resize', listener: () => void) => unknown
  off: (event: 'resize', listener: () => void) => unknown
}

type Deps = {
  input: TerminalInput
  output: TerminalOutput
}

const DEFAULT_ROWS = 24
const DEFAULT_COLUMNS = 80

/**
 * Raw mode and the alternate screen for the lifetime of the browser.
 * Everything `open` changes is undone by `close`, in reverse order, once.
 */
export const createTerminalSession = (deps: Deps) => {
  const cleanupFns: Array<() => void> = []
  let opened = false
  let closed = false

  const runCleanup = (fn: () => void) => {
    try {
      fn()
    } catch (err) {
      console.error('Terminal cleanup failed', err)
    }
  }

  const registerCleanup = (fn: () => void) => {
    if (closed) {
      runCleanup(fn)
      return
    }
    cleanupFns.push(fn)
  }

  const open = () => {
    if (opened) return
    opened = true
    const { input, output } = deps
    if (input.isTTY && input.setRawMode) {
      const setRawMode = input.setRawMode
      const wasRaw = input.isRaw ?? false
      try {
        setRawMode.call(input, true)
      } catch (err) {
        throw createAppError('fatal_io', `Cannot enter raw mode: ${getErrorMessage(err)}`, { cause: err })
      }
      registerCleanup(() => setRawMode.call(input, wasRaw))
    }
    output.write(`${ansi.enterAltScreen}${ansi.hideCursor}`)
    registerCleanup(() => output.write(`${ansi.reset}${ansi.showCursor}${ansi.exitAltScreen}`))
  }

  const close = () => {
    if (closed) return
    closed = true
    cleanupFns.splice(0).reverse().forEach(runCleanup)
  }

  const size = () => ({
    rows: deps.output.rows ?? DEFAULT_ROWS,
    columns: deps.output.columns ?? DEFAULT_COLUMNS,
  })

  const onResize = (listener: () => void) => {
    deps.output.on('resize', listener)
    registerCleanup(() => deps.output.off('resize', listener))
  }

  return {
    open,
    close,
    size,
    onResize,
    isOpen: () => opened && !closed,
  }
}

export type TerminalSession = ReturnType<typeof createTerminalSession>
