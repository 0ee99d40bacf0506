export interface WorkerNameFactory {
  readonly prefix: string

  /** Daemon workers do not keep the process alive while idle. */
  readonly daemon: boolean

  /** `"<prefix>-1"`, `"<prefix>-2"`, ... */
  next(): string
}
