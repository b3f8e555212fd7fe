import fc from 'fast-check'
import { describe, it } from 'vitest'
import { createFakeFileSystem, type FileTree } from '@/test/mocks/fileSystem'
import type { Action } from '../model/types'
import { createNavigator, visibleCursor, visibleTotal } from './navigator'

const files = (): FileTree => ({
  '/': [{ name: 'srv', kind: 'dir' }],
  '/srv': [
    { name: 'b.log', kind: 'file' },
    { name: 'app', kind: 'dir' },
    { name: '.cache', kind: 'dir' },
    { name: 'a.log', kind: 'file' },
    { name: 'current', kind: 'link' },
    { name: 'data', kind: 'dir' },
  ],
  '/srv/app': [
    { name: 'index.ts', kind: 'file' },
    { name: 'lib', kind: 'dir' },
    { name: 'README', kind: 'file' },
  ],
  '/srv/app/lib': [{ name: 'util.ts', kind: 'file' }],
  '/srv/.cache': [{ name: 'blob', kind: 'file' }],
  '/srv/data': [],
})

const actionArb: fc.Arbitrary<Action> = fc.oneof(
  fc.constantFrom<Action>(
    { type: 'up' },
    { type: 'down' },
    { type: 'left' },
    { type: 'right' },
    { type: 'top' },
    { type: 'bottom' },
    { type: 'toggle_select' },
    { type: 'select_all' },
    { type: 'invert_select' },
    { type: 'delete' },
    { type: 'move' },
    { type: 'paste' },
    { type: 'toggle_hidden' },
    { type: 'search' },
    { type: 'search_backspace' },
    { type: 'search_accept' },
    { type: 'search_cancel' },
  ),
  fc.constantFrom('a', 'l', 'x', '.').map((text): Action => ({ type: 'search_input', text })),
  fc.integer({ min: 1, max: 6 }).map((height): Action => ({ type: 'resize', height })),
)

describe('navigator invariants', () => {
  it('keeps selection, cursor and window consistent after every action', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(actionArb, { maxLength: 40 }), async (actions) => {
        const fake = createFakeFileSystem(files())
        const nav = createNavigator({ fs: fake.service, startDir: '/srv', visibleHeight: 3 })
        await nav.init()
        const state = nav.state()

        for (const action of actions) {
          await nav.dispatch(action)
          const total = state.entries.totalEntries()
          if (state.selection.length() !== total) return false
          if (state.selection.selectedCount() !== state.selection.countBits()) return false
          if (total > 0 && (state.cursor < 0 || state.cursor >= total)) return false
          if (total === 0 && state.cursor !== 0) return false

          const shown = visibleTotal(state)
          if (shown > 0) {
            const cursor = visibleCursor(state)
            const { start, end } = state.window.range(shown)
            if (!(start <= cursor && cursor < end)) return false
          }
        }
        return true
      }),
      { numRuns: 200 },
    )
  })
})
