export type LogLevel = "info" | "warn" | "error" | "debug";
export type LogOutputFn = (message: string, level: LogLevel) => void;

export interface LoggerOptions {
  scope?: string;
  debug?: boolean;
  outputFn?: LogOutputFn;
}

export class Logger {
  private scope?: string;
  private debugEnabled: boolean;
  private outputFn?: LogOutputFn;

  constructor(options: LoggerOptions = {}) {
    this.scope = options.scope;
    this.debugEnabled = options.debug ?? false;
    this.outputFn = options.outputFn;
  }

  /** Returns a logger sharing this one's output and debug switch, prefixed with `scope`. */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger({ scope: nested, debug: this.debugEnabled, outputFn: this.outputFn });
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.debugEnabled) return;
    this.write(this.prefix() + this.formatMessage(message, args), "debug");
  }

  info(message: string, ...args: unknown[]): void {
    this.write(this.prefix() + this.formatMessage(message, args), "info");
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(this.prefix() + this.formatMessage(message, args), "warn");
  }

  error(message: string, error?: unknown): void {
    let formattedMessage = this.prefix() + message;
    if (error instanceof Error) {
      formattedMessage += ` ${error.message}`;
    } else if (error) {
      formattedMessage += ` ${String(error)}`;
    }
    if (this.outputFn) {
      this.outputFn(formattedMessage, "error");
    } else if (error && this.debugEnabled) {
      console.error(this.prefix() + message, error);
    } else {
      console.error(formattedMessage);
    }
  }

  table(content: string): void {
    this.write("\n" + content + "\n", "info");
  }

  private prefix(): string {
    return this.scope ? `[${this.scope}] ` : "";
  }

  private write(message: string, level: Exclude<LogLevel, "error">): void {
    if (this.outputFn) {
      this.outputFn(message, level);
    } else if (level === "warn") {
      console.warn(message);
    } else {
      console.log(message);
    }
  }

  private formatMessage(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }

    return args.reduce<string>((msg, arg) => msg.replace("%s", String(arg)), message);
  }

  static createDefault(scope?: string, debug?: boolean): Logger {
    return new Logger({ scope, debug });
  }
}
