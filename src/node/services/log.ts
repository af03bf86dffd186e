import log from 'electron-log/node'
import { resolve } from 'path'

export const DEFAULT_LOG_FILE = 'flow_monitor.log'

type LevelOption = typeof log.transports.console.level

export const LOG_FORMAT = '{y}-{m}-{d} {h}:{i}:{s} - {level} - {text}'

export interface LogServiceOptions {
  /**
   * Log file path; false disables the file transport
   */
  logFile?: string | false
  /**
   * Console level. The CLI keeps this at 'warn' so the status line stays readable.
   */
  consoleLevel?: LevelOption
  fileLevel?: LevelOption
}

/**
 * Route console.* through electron-log so every module's bracket-prefixed logs
 * reach the log file as well as the terminal.
 * @param options
 */
export function setupLogService(options: LogServiceOptions = {}): typeof log {
  const logFile = options.logFile ?? DEFAULT_LOG_FILE

  if (logFile === false) {
    log.transports.file.level = false
  } else {
    const logPath = resolve(logFile)
    log.transports.file.resolvePathFn = () => logPath
    log.transports.file.format = LOG_FORMAT
    log.transports.file.level = options.fileLevel ?? 'info'
  }

  log.transports.console.format = LOG_FORMAT
  log.transports.console.level = options.consoleLevel ?? 'info'

  Object.assign(console, log.functions)
  return log
}
