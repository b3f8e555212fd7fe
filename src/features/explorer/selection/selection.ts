const popcount8 = (byte: number) => {
  let n = byte
  let count = 0
  while (n) {
    n &= n - 1
    count++
  }
  return count
}

/**
 * Bit-per-entry selection, index-aligned with the entry store. The selected
 * count is kept incrementally; only `restore` recounts.
 */
export const createSelection = (initialLength = 0) => {
  let bits = new Uint8Array(Math.ceil(initialLength / 8))
  let length = initialLength
  let selected = 0

  const checkIndex = (index: number) => {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new RangeError(`Selection index ${index} out of range (length ${length})`)
    }
  }

  const byteLength = () => Math.ceil(length / 8)

  // Bits past `length` in the last byte must stay zero for the full-scan count.
  const maskTail = () => {
    const rem = length % 8
    if (rem === 0) return
    bits[byteLength() - 1] &= (1 << rem) - 1
  }

  const isSelected = (index: number) => {
    checkIndex(index)
    return (bits[index >> 3] & (1 << (index & 7))) !== 0
  }

  const toggle = (index: number) => {
    checkIndex(index)
    const mask = 1 << (index & 7)
    bits[index >> 3] ^= mask
    selected += bits[index >> 3] & mask ? 1 : -1
  }

  const selectAll = () => {
    bits.fill(0xff, 0, byteLength())
    maskTail()
    selected = length
  }

  const invert = () => {
    const bytes = byteLength()
    for (let i = 0; i < bytes; i++) {
      bits[i] = ~bits[i] & 0xff
    }
    maskTail()
    selected = length - selected
  }

  const resizeAndClear = (nextLength: number) => {
    const bytes = Math.ceil(nextLength / 8)
    if (bytes > bits.length) {
      bits = new Uint8Array(bytes)
    } else {
      bits.fill(0)
    }
    length = nextLength
    selected = 0
  }

  const countBits = () => {
    let count = 0
    const bytes = byteLength()
    for (let i = 0; i < bytes; i++) count += popcount8(bits[i])
    return count
  }

  /** Sets the given bits on top of the current state, then recounts. */
  const restore = (indices: Iterable<number>) => {
    for (const index of indices) {
      checkIndex(index)
      bits[index >> 3] |= 1 << (index & 7)
    }
    selected = countBits()
  }

  const selectedIndices = () => {
    const out: number[] = []
    for (let i = 0; i < length; i++) {
      if (bits[i >> 3] & (1 << (i & 7))) out.push(i)
    }
    return out
  }

  return {
    isSelected,
    toggle,
    selectAll,
    invert,
    resizeAndClear,
    restore,
    selectedIndices,
    countBits,
    length: () => length,
    selectedCount: () => selected,
  }
}

export type Selection = ReturnType<typeof createSelection>
