export type LogLevel = 'info' | 'warn' | 'error'

export type LogDetails = Record<string, unknown>

export interface Logger {
  info(message: string, details?: LogDetails): void
  warn(message: string, details?: LogDetails): void
  error(message: string, details?: LogDetails): void
}

export type ConsoleLoggerOptions = {
  /** Receives each formatted line. Defaults to console.log / console.warn / console.error by level. */
  write?: (line: string, level: LogLevel) => void
  now?: () => Date
}

export function formatLogLine(at: Date, level: LogLevel, message: string, details?: LogDetails): string {
  const head = `${at.toISOString()} ${level.toUpperCase()} ${message}`
  if (!details || Object.keys(details).length === 0) return head
  return `${head} ${JSON.stringify(details)}`
}

function writeToConsole(line: string, level: LogLevel) {
  if (level === 'error') console.error(line)
  else if (level === 'warn') console.warn(line)
  else console.log(line)
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const write = options.write ?? writeToConsole
  const now = options.now ?? (() => new Date())
  const log = (level: LogLevel) => (message: string, details?: LogDetails) =>
    write(formatLogLine(now(), level, message, details), level)
  return { info: log('info'), warn: log('warn'), error: log('error') }
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
}

function reportSinkFailure(error: unknown) {
  console.error(`Log sink failed: ${error instanceof Error ? error.message : String(error)}`)
}

/**
 * Wraps a logger so a throwing sink never interrupts the caller. Sink failures go to
 * `onSinkError` (stderr by default).
 */
export function isolateLogger(logger: Logger, onSinkError: (error: unknown) => void = reportSinkFailure): Logger {
  const guard = (level: LogLevel) => (message: string, details?: LogDetails) => {
    try {
      logger[level](message, details)
    } catch (error) {
      onSinkError(error)
    }
  }
  return { info: guard('info'), warn: guard('warn'), error: guard('error') }
}
