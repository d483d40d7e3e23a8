/*
  Application logger. Writes to stderr so log lines never mix with the
  report on stdout. Debug output is off unless enabled.
*/
import pc from 'picocolors'

export type Logger = {
  debug: (...args: unknown[]) => void
  setDebug: (enabled: boolean) => void
  isDebug: () => boolean
}

export function createLogger(
  write: (line: string) => void = (line) => process.stderr.write(line + '\n'),
  debugEnabled = false
): Logger {
  let debug = debugEnabled
  const emit = (tag: string, args: unknown[]) => write([tag, ...args.map(String)].join(' '))
  return {
    debug: (...args) => {
      if (debug) emit(pc.dim('[debug]'), args)
    },
    setDebug: (enabled) => {
      debug = enabled
    },
    isDebug: () => debug,
  }
}

export const logger = createLogger(undefined, process.env.TIMELOG_DEBUG === '1')
