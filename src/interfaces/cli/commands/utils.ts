import type { Arguments } from 'yargs'
import type { App } from '../../app/createApp.js'

export type AppProvider = (args: Arguments) => App

/** Splits stdin text into lines; a trailing newline does not start a new line. */
export function splitLines(text: string): string[] {
  if (text === '') return []
  const lines = text.split('\n')
  if (lines[lines.length - 1] === '') lines.pop()
  return lines
}

export function parseVersion(value: unknown): number {
  const version = Number(value)
  if (!Number.isSafeInteger(version) || version < 0) {
    throw new Error(`Invalid commit version: ${String(value)}`)
  }
  return version
}
