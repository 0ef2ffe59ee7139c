import type { Argv, Arguments } from 'yargs'
import type { IO } from '../io.js'
import { splitLines, type AppProvider } from './utils.js'

/**
 * Raw store access: read, write and list individual log files.
 */
export function registerFileCommands(parser: Argv, getApp: AppProvider, io: IO): Argv {
  return parser
    .command(
      'read <path>',
      'Print the lines of a log file',
      (y: Argv) => y.positional('path', { type: 'string', demandOption: true }),
      async (args: Arguments) => {
        const reader = await getApp(args).store.read(String(args.path))
        for await (const line of reader) {
          io.stdout(`${line}\n`)
        }
      }
    )
    .command(
      'write <path>',
      'Write stdin to a log file, once unless --overwrite is given',
      (y: Argv) =>
        y
          .positional('path', { type: 'string', demandOption: true })
          .option('overwrite', { type: 'boolean', default: false }),
      async (args: Arguments) => {
        const lines = splitLines(await io.readStdin())
        await getApp(args).store.write(String(args.path), lines, Boolean(args.overwrite))
        io.stdout(`Wrote ${lines.length} line(s) to ${String(args.path)}\n`)
      }
    )
    .command(
      'list <path>',
      'List files in the directory of <path> named at or after it',
      (y: Argv) => y.positional('path', { type: 'string', demandOption: true }),
      async (args: Arguments) => {
        for (const status of await getApp(args).store.listFrom(String(args.path))) {
          const mtime = new Date(status.modificationTime).toISOString()
          io.stdout(`${status.name}\t${status.size}\t${mtime}\n`)
        }
      }
    )
}
