import {Service} from "typedi";

/** Anything that accepts log lines: a terminal stream, a file, or a test buffer. */
export interface OutputChannel {
  appendLine(value: string): void;
}

/** A channel with a separate sink for warnings and errors. */
export interface ErrorAwareChannel extends OutputChannel {
  appendError(value: string): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {debug: 0, info: 1, warn: 2, error: 3};

/** Writes info/debug lines to `out` and warnings/errors to `err`. */
export function createStreamChannel(
  out: NodeJS.WritableStream = process.stdout,
  err: NodeJS.WritableStream = process.stderr,
): ErrorAwareChannel {
  return {
    appendLine: (value) => {
      out.write(value + "\n");
    },
    appendError: (value) => {
      err.write(value + "\n");
    },
  };
}

/** Collects lines in memory. */
export class MemoryOutputChannel implements OutputChannel {
  readonly lines: string[] = [];

  appendLine(value: string): void {
    this.lines.push(value);
  }
}

function hasErrorSink(channel: OutputChannel): channel is ErrorAwareChannel {
  return "appendError" in channel && typeof channel.appendError === "function";
}

@Service()
export class OutputChannelService {
  private outputChannel: OutputChannel | undefined;
  private level: LogLevel = "info";

  setupOutputChannel(channel: OutputChannel = createStreamChannel(), level: LogLevel = "info"): OutputChannel {
    this.outputChannel = channel;
    this.level = level;
    return channel;
  }

  appendLine(value: string): void {
    this.write("info", value);
  }

  debug(value: string): void {
    this.write("debug", value);
  }

  warn(value: string): void {
    this.write("warn", value);
  }

  error(value: string): void {
    this.write("error", value);
  }

  private write(level: LogLevel, value: string): void {
    if (!this.outputChannel || LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    if ((level === "warn" || level === "error") && hasErrorSink(this.outputChannel)) {
      this.outputChannel.appendError(value);
      return;
    }
    this.outputChannel.appendLine(value);
  }
}
