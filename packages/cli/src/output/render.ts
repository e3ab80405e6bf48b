import { describeProfileError, formatContent } from '@jailprof/profile-dsl'
import type { ProfileStream, StreamDiff } from '@jailprof/profile-dsl'
import { t, type Theme } from './theme.js'

/** The formatted text of every line, without line terminators. */
export function linesOf(stream: ProfileStream): string[] {
  return [...stream].map((line) => formatContent(line.content).slice(0, -1))
}

/**
 * renderCheckReport — one line per invalid profile line.
 *
 *   firefox.profile:12: Invalid command: bogus-directive foo
 *
 * Line numbers are 1-based; a line without a number shows `?`.
 */
export function renderCheckReport(file: string, errors: ProfileStream): string[] {
  const out: string[] = []
  for (const line of errors) {
    if (line.content.kind !== 'invalid') continue
    const lineno = line.lineno === null ? '?' : String(line.lineno + 1)
    out.push(`${file}:${lineno}: ${describeProfileError(line.content.error)}: ${line.content.text}`)
  }
  return out
}

/** renderFileHeader — `# <path>:` above each file `cat` prints. */
export function renderFileHeader(path: string, theme: Theme = t): string {
  return theme.path(`# ${path}:`)
}

/**
 * renderDiff — the lines unique to each profile, under a heading per side.
 */
export function renderDiff(
  diff: StreamDiff,
  leftName: string,
  rightName: string,
  theme: Theme = t,
): string {
  const out = [
    theme.heading(`The following options are unique to ${leftName}:`),
    ...linesOf(diff.onlyInLeft).map((line) => theme.removed(line)),
    '',
    theme.heading(`The following options are unique to ${rightName}:`),
    ...linesOf(diff.onlyInRight).map((line) => theme.added(line)),
  ]
  return out.join('\n') + '\n'
}

/** renderHas — where a profile was found, if anywhere. */
export function renderHas(rawName: string, path: string | null, theme: Theme = t): string {
  return path === null
    ? `Could not find a Profile for ${rawName}.`
    : `Profile found for ${rawName} at ${theme.added(path)}`
}
