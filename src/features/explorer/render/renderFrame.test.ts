import { describe, expect, it } from 'vitest'
import { createFakeFileSystem } from '@/test/mocks/fileSystem'
import { createNavigator } from '../state/navigator'
import { fit, listHeight, renderFrame, renderRows, sanitizeName, statusLine } from './renderFrame'

const setup = async (visibleHeight = 10) => {
  const fake = createFakeFileSystem({
    '/work': [
      { name: 'a.txt', kind: 'file' },
      { name: 'latest', kind: 'link' },
      { name: 'docs', kind: 'dir' },
    ],
  })
  const nav = createNavigator({ fs: fake.service, startDir: '/work', visibleHeight })
  await nav.init()
  return nav
}

describe('renderRows', () => {
  it('colors rows by kind, cursor and selection', async () => {
    const nav = await setup()
    await nav.dispatch({ type: 'down' })
    await nav.dispatch({ type: 'toggle_select' })
    await nav.dispatch({ type: 'up' })

    expect(renderRows(nav.state(), 80)).toEqual([
      '\x1b[30;44m  docs/\x1b[0m',
      '\x1b[1;33m* a.txt\x1b[0m',
      '\x1b[36m  latest\x1b[0m',
    ])
  })

  it('draws the cursor row over a selected file', async () => {
    const nav = await setup()
    await nav.dispatch({ type: 'bottom' })
    await nav.dispatch({ type: 'toggle_select' })

    expect(renderRows(nav.state(), 80)[2]).toBe('\x1b[30;47m* latest\x1b[0m')
  })

  it('only draws the visible window and truncates long names', async () => {
    const nav = await setup(2)
    await nav.dispatch({ type: 'bottom' })

    expect(renderRows(nav.state(), 4)).toEqual(['  a.\x1b[0m', '\x1b[30;47m  la\x1b[0m'])
  })

  it('draws only search matches', async () => {
    const nav = await setup()
    await nav.dispatch({ type: 'search' })
    await nav.dispatch({ type: 'search_input', text: 'txt' })

    expect(renderRows(nav.state(), 80)).toEqual(['\x1b[30;47m  a.txt\x1b[0m'])
    expect(statusLine(nav.state(), 0)).toBe('0 selected  /txt')
  })
})

describe('renderFrame', () => {
  it('clears the screen and draws header, status and rows', async () => {
    const nav = await setup()
    await nav.dispatch({ type: 'select_all' })

    expect(renderFrame(nav.state(), { columns: 80, pendingMoves: 2 })).toBe(
      '\x1b[0m\x1b[2J\x1b[H' +
        '\x1b[1m/work\x1b[0m\r\n' +
        '3 selected, 2 to move\r\n' +
        '\x1b[30;44m* docs/\x1b[0m\r\n' +
        '\x1b[1;33m* a.txt\x1b[0m\r\n' +
        '\x1b[1;33m* latest\x1b[0m\r\n',
    )
  })

  it('shows the last error in the status line', async () => {
    const nav = await setup()
    nav.state().error = 'Failed to delete 1 of 2 entries'

    expect(statusLine(nav.state(), 0)).toBe('0 selected  \x1b[31mFailed to delete 1 of 2 entries\x1b[0m')
  })
})

describe('helpers', () => {
  it('replaces control characters in names', () => {
    expect(sanitizeName('bad\x1b[2Jname\n')).toBe('bad?[2Jname?')
  })

  it('replaces C1 controls too', () => {
    expect(sanitizeName('a\u009b2Jb\u0085')).toBe('a?2Jb?')
    expect(sanitizeName('caf\u00e9')).toBe('caf\u00e9')
  })

  it('truncates by terminal cells without splitting code points', () => {
    expect(fit('ab\u{1f600}cd', 3)).toBe('ab')
    expect(fit('ab\u{1f600}cd', 4)).toBe('ab\u{1f600}')
    expect(fit('\u65e5\u672c\u8a9e', 5)).toBe('\u65e5\u672c')
    expect(fit('e\u0301x', 2)).toBe('e\u0301x')
    expect(fit('short', 0)).toBe('short')
  })

  it('leaves room for the header', () => {
    expect(listHeight(24)).toBe(22)
    expect(listHeight(1)).toBe(1)
  })
})
