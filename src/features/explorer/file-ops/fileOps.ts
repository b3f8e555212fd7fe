import { createBatchError, getErrorMessage, type BatchFailure, type NormalizedError } from '@/shared/lib/error'
import type { FileSystemService } from '../services/fs.service'
import { isRootPath, parentPath } from '../utils'

export type BatchResult = {
  done: string[]
  failures: BatchFailure[]
}

type Deps = {
  fs: FileSystemService
}

const unique = (paths: Iterable<string>) => [...new Set(paths)]

/** Drops every path that sits inside another target; acting on the ancestor covers it. */
export const withoutNested = (paths: Iterable<string>) => {
  const targets = new Set(paths)
  return [...targets].filter((path) => {
    for (let current = path; !isRootPath(current); ) {
      current = parentPath(current)
      if (targets.has(current)) return false
    }
    return true
  })
}

/**
 * Runs `op` over every target, continuing past failures. Nothing is thrown;
 * per-entry errors are collected for the caller to report.
 */
export const runBatch = async (targets: Iterable<string>, op: (path: string) => Promise<unknown>) => {
  const result: BatchResult = { done: [], failures: [] }
  for (const path of unique(targets)) {
    try {
      await op(path)
      result.done.push(path)
    } catch (error) {
      result.failures.push({ path, message: getErrorMessage(error) })
    }
  }
  return result
}

export const batchError = (verb: string, result: BatchResult): NormalizedError | null => {
  if (result.failures.length === 0) return null
  return createBatchError(verb, result.done.length + result.failures.length, result.failures)
}

export const createFileOps = (deps: Deps) => {
  const deleteTargets = (paths: Iterable<string>) =>
    runBatch(withoutNested(paths), (path) => deps.fs.remove(path))

  const moveTargets = (paths: Iterable<string>, destDir: string) =>
    runBatch(withoutNested(paths), (path) => deps.fs.move(path, destDir))

  return { deleteTargets, moveTargets }
}

export type FileOps = ReturnType<typeof createFileOps>
