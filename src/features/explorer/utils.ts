export const normalizePath = (p: string) => {
  if (!p) return ''
  const trimmed = p.replace(/\/+/g, '/').replace(/\/+$/, '')
  if (trimmed === '') return p.startsWith('/') ? '/' : ''
  return trimmed
}

export const parentPath = (path: string) => {
  const normalized = normalizePath(path)
  if (!normalized || normalized === '/') return '/'
  const idx = normalized.lastIndexOf('/')
  if (idx <= 0) return '/'
  return normalized.slice(0, idx)
}

export const baseName = (path: string) => {
  const normalized = normalizePath(path)
  if (normalized === '/') return ''
  const idx = normalized.lastIndexOf('/')
  return idx >= 0 ? normalized.slice(idx + 1) : normalized
}

export const joinPath = (dir: string, name: string) => {
  const base = normalizePath(dir)
  if (base === '/') return `/${name}`
  return `${base}/${name}`
}

export const isRootPath = (path: string) => normalizePath(path) === '/'

/*
 * Paths are byte strings: one char per byte of the on-disk path, so names
 * that are not valid UTF-8 survive intact. Decode only for display.
 */
export const toBytePath = (text: string) => Buffer.from(text, 'utf8').toString('latin1')
export const pathBytes = (path: string) => Buffer.from(path, 'latin1')
export const displayPath = (path: string) => pathBytes(path).toString('utf8')
export const byteName = (name: Uint8Array) => Buffer.from(name).toString('latin1')
