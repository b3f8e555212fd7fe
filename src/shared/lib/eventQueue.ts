/**
 * Single-consumer FIFO. Producers push from event listeners; the consumer
 * awaits `next()` and handles one event to completion before taking another.
 */
export const createEventQueue = <T>() => {
  const pending: T[] = []
  let wake: (() => void) | null = null

  const push = (event: T) => {
    pending.push(event)
    const resolve = wake
    wake = null
    resolve?.()
  }

  const next = async (): Promise<T> => {
    for (;;) {
      if (pending.length > 0) return pending.splice(0, 1)[0]
      await new Promise<void>((resolve) => {
        wake = resolve
      })
    }
  }

  return {
    push,
    next,
    size: () => pending.length,
  }
}

export type EventQueue<T> = ReturnType<typeof createEventQueue<T>>
