/**
 * Purge Logger Utility
 *
 * Structured, one-line JSON logging for purge runs.
 * Milestones, warnings, errors and the final tally are always written;
 * progress and API calls from verbosity 1, per-item detail at verbosity 2.
 */

export type Verbosity = 0 | 1 | 2

export type LogDetails = Record<string, unknown>

export interface LogSink {
  log(line: string): void
  error(line: string): void
}

interface LogContext {
  runId: string
  handle?: string
}

export interface PurgeLoggerOptions {
  verbosity?: Verbosity
  sink?: LogSink
}

const consoleSink: LogSink = {
  log: line => console.log(line),
  error: line => console.error(line),
}

const MAX_STRING_LENGTH = 200

export class PurgeLogger {
  private context: LogContext
  private startTime: number
  readonly verbosity: Verbosity
  private sink: LogSink

  constructor(context: LogContext, options: PurgeLoggerOptions = {}) {
    this.context = context
    this.startTime = Date.now()
    this.verbosity = options.verbosity ?? 0
    this.sink = options.sink ?? consoleSink
  }

  setHandle(handle: string) {
    this.context = { ...this.context, handle }
  }

  start(details?: LogDetails) {
    this.write('purge.start', { details: this.summarize(details) })
  }

  complete(result: LogDetails) {
    const duration = Date.now() - this.startTime
    this.write('purge.complete', {
      duration: `${duration}ms`,
      durationSec: Math.round(duration / 1000),
      result,
    })
  }

  error(error: unknown, step?: string) {
    const duration = Date.now() - this.startTime
    this.write(
      'purge.error',
      {
        step: step || 'unknown',
        error: {
          message: error instanceof Error ? error.message : String(error),
          name: error instanceof Error ? error.name : undefined,
          stack:
            process.env.NODE_ENV === 'development' && error instanceof Error
              ? error.stack
              : undefined,
        },
        duration: `${duration}ms`,
      },
      true
    )
  }

  warn(message: string, details?: LogDetails) {
    this.write('purge.warning', { message, details: this.summarize(details) }, true)
  }

  milestone(milestone: string, data?: LogDetails) {
    this.write('purge.milestone', { milestone, data: this.summarize(data) })
  }

  progress(action: string, details?: LogDetails) {
    if (this.verbosity < 1) return
    const elapsed = Math.round((Date.now() - this.startTime) / 1000)
    this.write('purge.progress', {
      action,
      details: this.summarize(details),
      elapsed: `${elapsed}s`,
    })
  }

  api(
    service: string,
    action: string,
    status: 'start' | 'success' | 'error',
    details?: LogDetails
  ) {
    if (status !== 'error' && this.verbosity < 1) return
    this.write(
      status === 'error' ? 'purge.api.error' : 'purge.api',
      { service, action, status, details: this.summarize(details) },
      status === 'error'
    )
  }

  /** Per-item output, very verbose only */
  detail(action: string, details: LogDetails) {
    if (this.verbosity < 2) return
    this.write('purge.detail', { action, details: this.summarize(details) })
  }

  private write(event: string, fields: LogDetails, isError = false) {
    const line = JSON.stringify({
      event,
      runId: this.context.runId,
      handle: this.context.handle,
      ...fields,
      timestamp: new Date().toISOString(),
    })
    if (isError) {
      this.sink.error(line)
    } else {
      this.sink.log(line)
    }
  }

  private summarize(obj: LogDetails | undefined): LogDetails | undefined {
    if (!obj) return undefined

    const summary: LogDetails = {}
    for (const [key, value] of Object.entries(obj)) {
      if (Array.isArray(value)) {
        summary[key] = `Array(${value.length})`
      } else if (typeof value === 'string' && value.length > MAX_STRING_LENGTH) {
        summary[key] = value.substring(0, MAX_STRING_LENGTH) + '...'
      } else {
        summary[key] = value
      }
    }
    return summary
  }
}

export function logPurge(
  runId: string,
  options?: PurgeLoggerOptions,
  details?: LogDetails
): PurgeLogger {
  const logger = new PurgeLogger({ runId }, options)
  logger.start(details)
  return logger
}
