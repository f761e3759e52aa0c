// Leveled logger for compiler diagnostics output

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export type LogSink = (line: string) => void;

export class Logger {
  private level: LogLevel = LogLevel.WARN;
  private sink: LogSink = line => process.stderr.write(line + '\n');

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.level && this.level !== LogLevel.SILENT;
  }

  debug(scope: string, message: string): void {
    this.write(LogLevel.DEBUG, scope, message);
  }

  info(scope: string, message: string): void {
    this.write(LogLevel.INFO, scope, message);
  }

  warn(scope: string, message: string): void {
    this.write(LogLevel.WARN, scope, message);
  }

  error(scope: string, message: string): void {
    this.write(LogLevel.ERROR, scope, message);
  }

  private write(level: LogLevel, scope: string, message: string): void {
    if (!this.isEnabled(level)) return;
    this.sink(`[${scope}] ${message}`);
  }
}

export const logger = new Logger();
