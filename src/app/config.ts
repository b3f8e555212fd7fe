import { parseArgs } from 'node:util'
import { resolve } from 'node:path'
import { createAppError, getErrorMessage } from '@/shared/lib/error'
import { describeKeymap } from '@/features/shortcuts/keymap'
import { toBytePath } from '@/features/explorer/utils'

export const LASTDIR_ENV = 'DIRPICK_LASTDIR'

/** Paths are byte paths. */
export type AppConfig = {
  startDir: string
  picker: boolean
  showHidden: boolean
  hiddenPrefix: string
  lastDirFile: string | null
}

export type ConfigResult = { kind: 'run'; config: AppConfig } | { kind: 'help'; text: string }

type Source = {
  argv: string[]
  env: Record<string, string | undefined>
  cwd: string
}

export const usage = () =>
  [
    'Usage: dirpick [options] [dir]',
    '',
    'Options:',
    '  -p, --picker   print selected paths to stdout on quit',
    '  -a, --hidden   start with hidden entries shown',
    '  -h, --help     show this help',
    '',
    'Keys:',
    describeKeymap(),
    '',
    `Set ${LASTDIR_ENV} to a file path to record the last directory on quit.`,
  ].join('\n')

const parse = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        picker: { type: 'boolean', short: 'p', default: false },
        hidden: { type: 'boolean', short: 'a', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    })
  } catch (error) {
    throw createAppError('config_invalid', getErrorMessage(error), { cause: error })
  }
}

export const loadConfig = (source: Source): ConfigResult => {
  const { values, positionals } = parse(source.argv)
  if (values.help) return { kind: 'help', text: usage() }
  if (positionals.length > 1) {
    throw createAppError('config_invalid', `Expected at most one directory, got ${positionals.length}`, {
      details: positionals,
    })
  }

  const lastDirFile = source.env[LASTDIR_ENV]?.trim()
  return {
    kind: 'run',
    config: {
      startDir: toBytePath(resolve(source.cwd, positionals[0] ?? '.')),
      picker: values.picker ?? false,
      showHidden: values.hidden ?? false,
      hiddenPrefix: '.',
      lastDirFile: lastDirFile ? toBytePath(resolve(source.cwd, lastDirFile)) : null,
    },
  }
}
