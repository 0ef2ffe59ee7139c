import type { Argv, Arguments } from 'yargs'
import type { IO } from '../io.js'
import { parseVersion, splitLines, type AppProvider } from './utils.js'

export function registerCommitCommands(parser: Argv, getApp: AppProvider, io: IO): Argv {
  return parser
    .command(
      'append <dir>',
      'Commit stdin at the next free version',
      (y: Argv) => y.positional('dir', { type: 'string', demandOption: true }),
      async (args: Arguments) => {
        const lines = splitLines(await io.readStdin())
        const version = await getApp(args).commitLog.append(String(args.dir), lines)
        io.stdout(`${version}\n`)
      }
    )
    .command(
      'cat <dir> <n>',
      'Print one commit',
      (y: Argv) =>
        y
          .positional('dir', { type: 'string', demandOption: true })
          .positional('n', { type: 'string', demandOption: true, describe: 'Commit version' }),
      async (args: Arguments) => {
        const lines = await getApp(args).commitLog.read(String(args.dir), parseVersion(args.n))
        for (const line of lines) io.stdout(`${line}\n`)
      }
    )
    .command(
      'latest <dir>',
      'Print the latest commit version',
      (y: Argv) => y.positional('dir', { type: 'string', demandOption: true }),
      async (args: Arguments) => {
        const latest = await getApp(args).commitLog.latestVersion(String(args.dir))
        io.stdout(`${latest ?? 'none'}\n`)
      }
    )
}
