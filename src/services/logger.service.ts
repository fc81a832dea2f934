import { getErrorMessage } from "../errors";

export type LogLevel = "info" | "warn" | "error" | "debug";
export type LogOutputFn = (message: string, level: LogLevel) => void;

export interface LoggerOptions {
  name?: string;
  debug?: boolean;
  outputFn?: LogOutputFn;
}

export class Logger {
  private name?: string;
  private debugEnabled: boolean;
  private outputFn?: LogOutputFn;

  constructor(options: LoggerOptions = {}) {
    this.name = options.name;
    this.debugEnabled = options.debug ?? false;
    this.outputFn = options.outputFn;
  }

  private prefix(): string {
    return this.name ? `[${this.name}] ` : "";
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.debugEnabled) return;
    this.write("debug", this.prefix() + this.formatMessage(message, args));
  }

  info(message: string, ...args: unknown[]): void {
    this.write("info", this.prefix() + this.formatMessage(message, args));
  }

  warn(message: string, ...args: unknown[]): void {
    this.write("warn", this.prefix() + this.formatMessage(message, args));
  }

  error(message: string, error?: unknown): void {
    const line = this.prefix() + message;
    if (this.outputFn) {
      this.outputFn(error === undefined ? line : `${line} ${getErrorMessage(error)}`, "error");
      return;
    }
    if (error === undefined) {
      console.error(line);
    } else if (error instanceof Error && this.debugEnabled) {
      console.error(line, error);
    } else {
      console.error(line, getErrorMessage(error));
    }
  }

  private write(level: Exclude<LogLevel, "error">, formattedMessage: string): void {
    if (this.outputFn) {
      this.outputFn(formattedMessage, level);
    } else if (level === "warn") {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }
  }

  private formatMessage(message: string, args: unknown[]): string {
    return args.reduce<string>((msg, arg) => msg.replace("%s", String(arg)), message);
  }

  static createDefault(name?: string, debug?: boolean): Logger {
    return new Logger({ name, debug });
  }
}
