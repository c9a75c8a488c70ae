import { closeSync, existsSync, mkdirSync, openSync, renameSync, statSync, writeSync } from "node:fs";
import * as path from "node:path";
import { clamp } from "../utils/helpers";

export interface FlashLogger {
  log(line: string): void;
  close(): void;
}

export interface LoggerOptions {
  maxFileSizeBytes: number;
}

const DEFAULT_MAX_FILE_SIZE_BYTES = 5 * 1024 * 1024;

export const NOOP_LOGGER: FlashLogger = { log() {}, close() {} };

/**
 * Appends one flash session to `<name>.log`. A file already past the size
 * limit when the session opens is moved to `<name>.log.1` first.
 */
class SessionFileLogger implements FlashLogger {
  private readonly fd: number;
  private closed = false;

  public constructor(filepath: string, maxFileSizeBytes: number) {
    if (existsSync(filepath) && statSync(filepath).size >= maxFileSizeBytes) {
      renameSync(filepath, `${filepath}.1`);
    }
    this.fd = openSync(filepath, "a");
  }

  public log(line: string): void {
    if (this.closed) {
      return;
    }
    writeSync(this.fd, `${new Date().toISOString()} ${line}\n`);
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    closeSync(this.fd);
  }
}

export class FlashLoggerFactory {
  private readonly maxFileSizeBytes: number;

  public constructor(
    private readonly baseDir: string,
    options?: Partial<LoggerOptions>
  ) {
    mkdirSync(this.baseDir, { recursive: true });
    const maxFileSizeBytes = options?.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;
    this.maxFileSizeBytes = clamp(Math.floor(maxFileSizeBytes), 1, 1024 * 1024 * 1024);
  }

  public create(name: string): FlashLogger {
    const safeName = name.replace(/[^\w.-]/g, "_");
    return new SessionFileLogger(path.join(this.baseDir, `${safeName}.log`), this.maxFileSizeBytes);
  }
}

/** Prefixes every line with a component tag, e.g. `[repl] entered raw mode`. */
export function scopedLogger(logger: FlashLogger, scope: string): FlashLogger {
  return {
    log: (line) => logger.log(`[${scope}] ${line}`),
    close: () => logger.close()
  };
}
