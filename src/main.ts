import { log } from '@shared/logger'
import { buildProgram } from './cli'
import { loadEnvironment } from './config'
import { getErrorMessage } from './node/shared/errors'

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    const program = buildProgram({ env: loadEnvironment() })
    await program.parseAsync(argv)
  } catch (error) {
    log.error(getErrorMessage(error))
    log.debug(error)
    process.exitCode = 1
  }
}

await main()
