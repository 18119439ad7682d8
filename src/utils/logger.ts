/**
 * Diagnostic logger
 */

import { Logger } from "tslog";
import type { ILogObj } from "tslog";

export type Verbosity = 0 | 1 | 2 | 3;

export interface LogSettings {
  /** Written before the first line of every message */
  prefix: string;
  verbosity: Verbosity;
}

/** Receives fully formatted, CRLF-terminated text. */
export type LogSink = (chunk: string) => void;

export function toVerbosity(n: number): Verbosity {
  if (n >= 3) return 3;
  if (n >= 2) return 2;
  if (n >= 1) return 1;
  return 0;
}

// tslog numeric levels
const LEVEL_SILLY = 0;
const LEVEL_INFO = 3;

const CONTINUATION_PREFIX = "    ";

/**
 * Format a message for the diagnostic stream.
 *
 * Lines end in "\r\n": under `sudo` with use_pty the other processes sharing
 * the terminal move to the next line on "\n" without returning the cursor.
 */
export function formatLogLines(prefix: string, message: string): string {
  const lines = message.replace(/(\r?\n)+$/, "").split(/\r?\n/);
  let out = "";
  let linePrefix = prefix;
  for (const line of lines) {
    out += `${linePrefix}${line}\r\n`;
    linePrefix = CONTINUATION_PREFIX;
  }
  return out;
}

const guardedStreams = new WeakSet<NodeJS.WritableStream>();

/**
 * Sink writing to `stream`. A vanished reader surfaces as an async EPIPE
 * `error` event rather than a throw, so the stream gets one no-op listener
 * on first use; without it Node would exit.
 */
export function streamSink(stream: NodeJS.WritableStream): LogSink {
  return (chunk) => {
    if (!guardedStreams.has(stream)) {
      guardedStreams.add(stream);
      stream.on("error", () => {});
    }
    stream.write(chunk);
  };
}

const stderrSink = streamSink(process.stderr);

function messageOf(logObj: ILogObj): string {
  const args = logObj["args"];
  if (!Array.isArray(args)) return "";
  return args.map((a) => (typeof a === "string" ? a : String(a))).join(" ");
}

export class DiagnosticLogger {
  readonly prefix: string;
  readonly verbosity: Verbosity;
  private readonly inner: Logger<ILogObj>;

  constructor(settings: LogSettings, private readonly sink: LogSink = stderrSink) {
    this.prefix = settings.prefix;
    this.verbosity = settings.verbosity;
    this.inner = new Logger<ILogObj>({
      type: "hidden",
      minLevel: Math.max(LEVEL_SILLY, LEVEL_INFO - settings.verbosity),
      argumentsArrayName: "args",
      attachedTransports: [(logObj) => this.write(messageOf(logObj))],
    });
  }

  log(message: string): void {
    this.inner.info(message);
  }

  debug1(message: string): void {
    this.inner.debug(message);
  }

  debug2(message: string): void {
    this.inner.trace(message);
  }

  debug3(message: string): void {
    this.inner.silly(message);
  }

  private write(message: string): void {
    try {
      this.sink(formatLogLines(this.prefix, message));
    } catch {
      // stderr may be gone (our tty closed); that is no reason to abort the caller
    }
  }
}

export function createLogger(settings: Partial<LogSettings> = {}, sink?: LogSink): DiagnosticLogger {
  return new DiagnosticLogger(
    { prefix: settings.prefix ?? "", verbosity: settings.verbosity ?? 0 },
    sink,
  );
}

/** Logger that discards everything; for library callers that want no output. */
export const silentLogger = new DiagnosticLogger({ prefix: "", verbosity: 0 }, () => {});
