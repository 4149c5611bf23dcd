export type NormalizeOptions = {
  collapseWhitespace?: boolean // default true
  fixHyphenation?: boolean // default true (only safe cases)
  maxBlankLines?: number // default 1
}

// Word broken across a line end: at least two letters before, three after.
const HYPHENATED_LINE_BREAK = /(\p{L}{2,})-\n(\p{L}{3,})/gu

export function normalizeText(input: string, opts: NormalizeOptions = {}): string {
  const collapse = opts.collapseWhitespace ?? true
  const fixHyphenation = opts.fixHyphenation ?? true
  const maxBlankLines = Math.max(0, Math.floor(opts.maxBlankLines ?? 1))

  let s = String(input ?? '')
    .replace(/\u0000+/g, '')
    .replace(/\r\n?/g, '\n')

  if (fixHyphenation) {
    s = s.replace(HYPHENATED_LINE_BREAK, '$1$2')
  }

  if (collapse) {
    s = s.replace(/[\t\f\v ]+/g, ' ').replace(/ *\n */g, '\n')
    const blankRun = new RegExp(`\\n{${maxBlankLines + 2},}`, 'g')
    s = s.replace(blankRun, '\n'.repeat(maxBlankLines + 1))
  }

  return s.trim()
}
