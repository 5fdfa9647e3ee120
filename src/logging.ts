// ─── Output Channel ───────────────────────────────────────────────────────────

/** Anything that accepts whole lines of log output. */
export interface OutputChannel {
  appendLine(value: string): void
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

export const stderrChannel: OutputChannel = {
  appendLine(value: string): void {
    process.stderr.write(`${value}\n`)
  },
}

let activeChannel: OutputChannel = stderrChannel
let activeLevel: LogLevel = 'info'

export interface LoggingOptions {
  readonly level?: LogLevel
  readonly channel?: OutputChannel
}

/** Set the process-wide threshold and/or destination for every Logger. */
export function configureLogging(opts: LoggingOptions): void {
  if (opts.level !== undefined) activeLevel = opts.level
  if (opts.channel !== undefined) activeChannel = opts.channel
}

// ─── Logger ───────────────────────────────────────────────────────────────────

/**
 * Named logger writing `<timestamp> [level] [name] message` lines to the
 * configured output channel. Extra arguments are appended as JSON.
 */
export class Logger {
  constructor(private readonly name: string) {}

  trace(message: string, ...args: unknown[]): void {
    this.write('trace', message, args)
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args)
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args)
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args)
  }

  private write(level: LogLevel, message: string, args: readonly unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) return

    const suffix = args.length > 0 ? ` ${args.map(formatArg).join(' ')}` : ''
    activeChannel.appendLine(
      `${new Date().toISOString()} [${level}] [${this.name}] ${message}${suffix}`
    )
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return `${arg.name}: ${arg.message}`
  if (typeof arg === 'string') return arg
  try {
    return JSON.stringify(arg) ?? String(arg)
  } catch {
    return String(arg)
  }
}
