import yargs, { type Arguments } from 'yargs'
import { createApp, type App } from '../app/createApp.js'
import { loadAppConfig, type BackendKind } from '../../config/appConfig.js'
import { isLogStoreError } from '../../core/entities/errors.js'
import type { IO } from './io.js'
import { registerFileCommands } from './commands/file.js'
import { registerCommitCommands } from './commands/commit.js'

const BACKENDS = ['local', 'memory', 'webhdfs'] as const

function isBackendKind(value: unknown): value is BackendKind {
  return BACKENDS.some((kind) => kind === value)
}

/**
 * CLI adapter: parse commands → call the store and commit log.
 *
 * The app is built on first use so `--backend` can override configuration.
 * Commands are split into modules in ./commands/
 */
export async function runCli(opts: {
  argv: string[]
  io: IO
  env?: NodeJS.ProcessEnv
  app?: App
}): Promise<number> {
  const { argv, io } = opts
  let app = opts.app

  const getApp = (args: Arguments): App => {
    if (app) return app
    const backend = isBackendKind(args.backend) ? args.backend : undefined
    app = createApp({ config: loadAppConfig(opts.env ?? process.env, { backend }) })
    return app
  }

  const parser = yargs(argv)
    .scriptName('commitlog')
    .option('backend', { type: 'string', choices: BACKENDS, describe: 'Storage backend' })
    .demandCommand(1)
    .strict()
    .help()
    .exitProcess(false)
    .fail(false)

  registerFileCommands(parser, getApp, io)
  registerCommitCommands(parser, getApp, io)

  try {
    await parser.parseAsync()
    return 0
  } catch (err) {
    if (isLogStoreError(err)) {
      io.stderr(`error [${err.code}]: ${err.message}\n`)
    } else {
      io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    }
    return 1
  }
}
