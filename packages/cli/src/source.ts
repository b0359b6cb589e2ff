import * as fs from 'node:fs'

import { ErrSourceUnreadable } from './errors/errors.js'

/** Path that stands for standard input. */
export const STDIN = '-'

export interface SourceText {
  /** File path, or `<stdin>` */
  readonly label: string
  readonly text: string
}

/** Read a program from a file, or from stdin when `path` is omitted or `-`. */
export function readSource(path: string | undefined): SourceText {
  const target = path ?? STDIN
  const label = target === STDIN ? '<stdin>' : target
  const text = ErrSourceUnreadable.wrap({ path: label }, () =>
    fs.readFileSync(target === STDIN ? 0 : target, 'utf8')
  )
  return { label, text }
}
