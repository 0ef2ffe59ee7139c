import { nanoid } from 'nanoid'
import { childPath, type LogPath } from '../../core/entities/logPath.js'

/** Produces the random part of a staging file name. */
export type TokenSource = () => string

export const defaultTokenSource: TokenSource = () => nanoid()

const TEMP_NAME_PATTERN = /^\..+\.[^./]+\.tmp$/

/**
 * Staging path for one write attempt: `.<name>.<token>.tmp` next to the
 * target. The leading dot sorts before digits and hides the file from
 * listings that start at a commit name.
 */
export function createTempPath(target: LogPath, tokens: TokenSource = defaultTokenSource): string {
  const token = tokens()
  if (!token || token.includes('/') || token.includes('.')) {
    throw new Error(`Invalid temp path token: '${token}'`)
  }
  return childPath(target.parent, `.${target.name}.${token}.tmp`)
}

export function isTempPathName(name: string): boolean {
  return TEMP_NAME_PATTERN.test(name)
}
