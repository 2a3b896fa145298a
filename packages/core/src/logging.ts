export const LoggingLevel = {
  None: 0,
  Error: 1,
  Warning: 2,
  Info: 3,
} as const;
export type LoggingLevel = (typeof LoggingLevel)[keyof typeof LoggingLevel];

export type Sink = (chunk: string) => void;

export const stdoutSink: Sink = (chunk) => {
  process.stdout.write(chunk);
};

export const stderrSink: Sink = (chunk) => {
  process.stderr.write(chunk);
};

export const isLoggingLevel = (value: number): value is LoggingLevel =>
  value === LoggingLevel.None ||
  value === LoggingLevel.Error ||
  value === LoggingLevel.Warning ||
  value === LoggingLevel.Info;

/** Diagnostics channel; silent until the runner raises the level for a replay. */
export class Logger {
  level: LoggingLevel;
  private readonly sink: Sink;

  constructor(sink: Sink = stdoutSink, level: LoggingLevel = LoggingLevel.None) {
    this.sink = sink;
    this.level = level;
  }

  error(message: string): void {
    this.emit(LoggingLevel.Error, "error", message);
  }

  warn(message: string): void {
    this.emit(LoggingLevel.Warning, "warning", message);
  }

  info(message: string): void {
    this.emit(LoggingLevel.Info, "info", message);
  }

  private emit(threshold: LoggingLevel, tag: string, message: string): void {
    if (this.level < threshold) {
      return;
    }
    this.sink(`[${tag}] ${message}\n`);
  }
}
