export type LogContext = {
  service: string
  module: string
  env: string

  /** Executor or pool name. */
  pool: string
  worker: string
  attempt: number
  elapsedMs: number
  availablePermits: number

  /** Configuration file or resource involved. */
  file: string
  key: string
  source: string

  logName: string
}

export type LogEvent = {
  err: unknown
}

export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>
