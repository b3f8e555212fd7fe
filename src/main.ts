import { loadConfig, usage } from '@/app/config'
import { runApp } from '@/app/runApp'
import { createNodeFileSystem } from '@/features/explorer/services/fs.service'
import { getErrorCode, getErrorMessage } from '@/shared/lib/error'

const readConfig = () => {
  try {
    return loadConfig({ argv: process.argv.slice(2), env: process.env, cwd: process.cwd() })
  } catch (error) {
    console.error(getErrorMessage(error))
    console.error(usage())
    return null
  }
}

const main = async () => {
  const result = readConfig()
  if (!result) return 2
  if (result.kind === 'help') {
    process.stdout.write(`${result.text}\n`)
    return 0
  }

  const { config } = result
  try {
    await runApp({
      config,
      fs: createNodeFileSystem(),
      input: process.stdin,
      // Picked paths own stdout, so the browser draws on stderr.
      ui: config.picker ? process.stderr : process.stdout,
      stdout: process.stdout,
    })
    return 0
  } catch (error) {
    console.error(`dirpick: ${getErrorMessage(error)}`)
    if (getErrorCode(error) !== 'fatal_io') console.error(error)
    return 1
  }
}

process.exitCode = await main()
