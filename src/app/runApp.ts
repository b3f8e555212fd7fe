import type { Readable } from 'node:stream'
import { createNavigator } from '@/features/explorer/state/navigator'
import type { FileSystemService } from '@/features/explorer/services/fs.service'
import { listHeight, renderFrame } from '@/features/explorer/render/renderFrame'
import {
  createTerminalSession,
  type TerminalInput,
  type TerminalOutput,
} from '@/features/explorer/terminal/terminalSession'
import { pathBytes } from '@/features/explorer/utils'
import { decodeInput, DEFAULT_KEYMAP, splitKeys, type KeyBinding } from '@/features/shortcuts/keymap'
import { createAppError, getErrorMessage } from '@/shared/lib/error'
import { createEventQueue } from '@/shared/lib/eventQueue'
import type { AppConfig } from './config'

type AppEvent =
  | { kind: 'input'; bytes: Uint8Array }
  | { kind: 'resize' }
  | { kind: 'end' }
  | { kind: 'error'; error: Error }

type Deps = {
  config: AppConfig
  fs: FileSystemService
  input: Readable & TerminalInput
  /** Where frames are drawn. */
  ui: TerminalOutput
  /** Where picked paths are printed, byte for byte. */
  stdout: { write: (chunk: Uint8Array) => unknown }
  keymap?: KeyBinding[]
}

export type RunResult = {
  cwd: string
  picked: string[]
}

/**
 * Runs the browser until quit or end of input. The terminal is restored
 * before anything is printed or thrown past this function.
 */
export const runApp = async (deps: Deps): Promise<RunResult> => {
  const { config, input, ui } = deps
  const keymap = deps.keymap ?? DEFAULT_KEYMAP
  const session = createTerminalSession({ input, output: ui })
  const navigator = createNavigator({
    fs: deps.fs,
    startDir: config.startDir,
    visibleHeight: listHeight(session.size().rows),
    showHidden: config.showHidden,
    hiddenPrefix: config.hiddenPrefix,
  })
  await navigator.init()

  const events = createEventQueue<AppEvent>()
  const onData = (chunk: Buffer | string) =>
    events.push({ kind: 'input', bytes: typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk })
  const onEnd = () => events.push({ kind: 'end' })
  const onError = (error: Error) => events.push({ kind: 'error', error })

  const draw = () =>
    ui.write(
      renderFrame(navigator.state(), {
        columns: session.size().columns,
        pendingMoves: navigator.clipboard.size(),
      }),
    )

  const handleInput = async (bytes: Uint8Array) => {
    for (const key of splitKeys(bytes)) {
      for (const action of decodeInput(key, navigator.state().mode, keymap)) {
        await navigator.dispatch(action)
        if (!navigator.state().running) return
      }
    }
  }

  session.open()
  try {
    input.on('data', onData)
    input.on('end', onEnd)
    input.on('error', onError)
    session.onResize(() => events.push({ kind: 'resize' }))
    draw()

    while (navigator.state().running) {
      const event = await events.next()
      if (event.kind === 'end') break
      if (event.kind === 'error') {
        throw createAppError('fatal_io', `Cannot read input: ${getErrorMessage(event.error)}`, {
          cause: event.error,
        })
      }
      if (event.kind === 'resize') {
        await navigator.dispatch({ type: 'resize', height: listHeight(session.size().rows) })
      } else {
        await handleInput(event.bytes)
      }
      if (navigator.state().running) draw()
    }
  } finally {
    input.off('data', onData)
    input.off('end', onEnd)
    input.off('error', onError)
    input.pause()
    session.close()
  }

  const { cwd } = navigator.state()
  const picked = config.picker ? navigator.pickedPaths() : []
  if (config.lastDirFile) await deps.fs.writeBytes(config.lastDirFile, pathBytes(`${cwd}\n`))
  for (const path of picked) deps.stdout.write(pathBytes(`${path}\n`))
  return { cwd, picked }
}
