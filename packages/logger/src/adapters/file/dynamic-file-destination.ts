import pino, { type DestinationStream } from "pino"
import { currentLogName } from "../../core/log-name"
import { LogLevels } from "../../ports/log-level"

type FileStream = ReturnType<typeof pino.destination>

export type DynamicFileDestinationOptions = Readonly<{
  /** Log file path, optionally containing the `replaceInFile` placeholder. */
  file: string

  /** Placeholder replaced by the current log name, e.g. `"%NAME%"`. */
  replaceInFile?: string

  /** Default: true */
  append?: boolean

  /** Create missing parent directories. Default: true */
  mkdir?: boolean

  /** Write synchronously. Default: false */
  sync?: boolean

  /** Named files kept open at once. Default: 100 */
  maxDestinations?: number
}>

const DEFAULT_MAX_DESTINATIONS = 100

/**
 * pino destination that splits output into one file per log name.
 *
 * The log name comes from {@link runWithLogName}. Lines written outside a
 * named scope, or when the file has no placeholder, go to the default file
 * (the placeholder replaced by `""`).
 *
 * @example
 * ```ts
 * const destination = new DynamicFileDestination({
 *   file: "logs/listener-%NAME%.log",
 *   replaceInFile: "%NAME%",
 * })
 * const logger = new PinoLogger({ destination }, { level: "info" })
 *
 * await runWithLogName("telemetry", () => handle(message, logger))
 * // -> logs/listener-telemetry.log
 * ```
 */
export class DynamicFileDestination implements DestinationStream {
  private readonly placeholder: string | undefined
  private readonly defaultStream: FileStream
  private readonly named = new Map<string, FileStream>()
  private readonly maxDestinations: number
  private limitReported = false

  constructor(private readonly opts: DynamicFileDestinationOptions) {
    const { file, replaceInFile } = opts

    this.placeholder = replaceInFile && file.includes(replaceInFile) ? replaceInFile : undefined
    this.maxDestinations = opts.maxDestinations ?? DEFAULT_MAX_DESTINATIONS
    this.defaultStream = this.open(this.fileFor(""))
  }

  /** Path the default destination writes to. */
  get defaultFile(): string {
    return this.fileFor("")
  }

  /** Number of named files currently open. */
  get size(): number {
    return this.named.size
  }

  write(line: string): void {
    this.streamFor(currentLogName()).write(line)
  }

  /** Flushes and closes the default and every named file. */
  end(): void {
    this.defaultStream.end()
    for (const stream of this.named.values()) stream.end()
    this.named.clear()
  }

  private streamFor(name: string | undefined): FileStream {
    if (!name || !this.placeholder) return this.defaultStream

    const existing = this.named.get(name)
    if (existing) return existing

    if (this.named.size >= this.maxDestinations) {
      this.reportLimit(name)
      return this.defaultStream
    }

    const stream = this.open(this.fileFor(name))
    this.named.set(name, stream)
    return stream
  }

  private reportLimit(name: string): void {
    if (this.limitReported) return
    this.limitReported = true

    const entry = {
      level: LogLevels.Warn,
      time: Date.now(),
      module: "dynamic-file-destination",
      logName: name,
      limit: this.maxDestinations,
      msg: "Too many log files open, writing to the default file",
    }
    this.defaultStream.write(`${JSON.stringify(entry)}\n`)
  }

  private fileFor(name: string): string {
    return this.placeholder ? this.opts.file.split(this.placeholder).join(name) : this.opts.file
  }

  private open(dest: string): FileStream {
    return pino.destination({
      dest,
      append: this.opts.append ?? true,
      mkdir: this.opts.mkdir ?? true,
      sync: this.opts.sync ?? false,
    })
  }
}
