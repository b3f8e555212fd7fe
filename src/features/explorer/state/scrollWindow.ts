export type WindowRange = {
  start: number
  end: number
}

/**
 * Visible slice of the listing. Moves only as far as needed to keep the
 * cursor on screen; never re-centers.
 */
export const createScrollWindow = (initialHeight: number) => {
  let height = Math.max(1, Math.floor(initialHeight))
  let start = 0

  const advance = (cursor: number) => {
    if (cursor < start) {
      start = cursor
    } else if (cursor >= start + height) {
      start = cursor - height + 1
    }
    if (start < 0) start = 0
  }

  const clamp = (total: number) => {
    if (total <= height) {
      start = 0
      return
    }
    if (start + height > total) {
      start = total - height
    }
  }

  const resize = (nextHeight: number, total: number) => {
    height = Math.max(1, Math.floor(nextHeight))
    clamp(total)
  }

  const range = (total: number): WindowRange => {
    if (total === 0) return { start: 0, end: 0 }
    return { start, end: Math.min(total, start + height) }
  }

  return {
    advance,
    clamp,
    resize,
    range,
    reset: () => {
      start = 0
    },
    start: () => start,
    height: () => height,
  }
}

export type ScrollWindow = ReturnType<typeof createScrollWindow>
