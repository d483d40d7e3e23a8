/**
 * Command line entry: `timelog [file]`.
 *
 * Prints the report for one log file. Exit code 0 on success, including an
 * empty log; 1 when the file cannot be read, a line fails to parse or the
 * arguments are wrong.
 */

import pc from 'picocolors'
import { TimelogError } from './errors'
import { parseCliArgs, type Env, type ReportOptions } from './config'
import { buildReport, readLines, renderReport } from './report'
import { logger } from './logger'

export type CliIo = {
  stdout: (text: string) => void
  stderr: (text: string) => void
  env: Env
  /** Report options fixed by the caller, e.g. the clock in tests */
  report?: Partial<ReportOptions>
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
}

type Colors = ReturnType<typeof pc.createColors>

function helpText(colors: Colors): string {
  return `${colors.bold('timelog')} - hours spent, from a log of timestamps

${colors.bold('USAGE:')}
  timelog [OPTIONS] [FILE]

${colors.bold('ARGUMENTS:')}
  FILE          Log with one ISO-8601 timestamp per line (default: log.txt)

${colors.bold('OPTIONS:')}
  -h, --help    Show this help message
  --debug       Log progress to stderr (also TIMELOG_DEBUG=1)
  --no-color    Plain output (also NO_COLOR)
`
}

export function run(args: readonly string[], io: CliIo = defaultIo): number {
  let colors = pc.createColors(false)
  try {
    const config = parseCliArgs(args, io.env)
    colors = pc.createColors(config.color)
    if (config.help) {
      io.stdout(helpText(colors))
      return 0
    }
    logger.setDebug(config.debug)
    logger.debug(`reading ${config.file}`)

    const report = buildReport(readLines(config.file), io.report)
    io.stdout(renderReport(report, { color: config.color }) + '\n')
    return 0
  } catch (err) {
    if (err instanceof TimelogError) {
      io.stderr(`${colors.red('Error:')} ${err.message}\n`)
      return 1
    }
    throw err
  }
}
