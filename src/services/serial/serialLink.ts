import { ProtocolTimeoutError } from "../../core/errors";

export interface SerialTap {
  tx(data: Buffer): void;
  rx(data: Buffer): void;
}

export interface SerialLink {
  readonly path: string;
  write(data: Buffer): Promise<void>;
  /**
   * Resolves with the bytes received before `sentinel` and consumes them along
   * with the sentinel. On timeout the buffer is left untouched, so a second
   * call picks up whatever has arrived in the meantime.
   */
  readUntil(sentinel: Buffer, timeoutMs: number): Promise<Buffer>;
  discardInput(): Buffer;
  close(): Promise<void>;
}

interface PendingRead {
  sentinel: Buffer;
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const TIMEOUT_CONTEXT_BYTES = 64;

export abstract class BufferedSerialLink implements SerialLink {
  private buffer = Buffer.alloc(0);
  private pending?: PendingRead;
  private closed = false;

  protected constructor(
    public readonly path: string,
    private readonly tap?: SerialTap
  ) {}

  public async write(data: Buffer): Promise<void> {
    if (this.closed) {
      throw new Error(`Serial link ${this.path} is closed`);
    }
    this.tap?.tx(data);
    await this.send(data);
  }

  public readUntil(sentinel: Buffer, timeoutMs: number): Promise<Buffer> {
    if (this.closed) {
      return Promise.reject(new Error(`Serial link ${this.path} is closed`));
    }
    if (this.pending) {
      return Promise.reject(new Error("Another read is already pending on this link"));
    }
    const ready = this.take(sentinel);
    if (ready) {
      return Promise.resolve(ready);
    }
    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = undefined;
        const tail = this.buffer.subarray(Math.max(0, this.buffer.length - TIMEOUT_CONTEXT_BYTES));
        reject(new ProtocolTimeoutError(sentinel.toString("latin1"), timeoutMs, tail.toString("latin1")));
      }, timeoutMs);
      this.pending = { sentinel, resolve, reject, timer };
    });
  }

  public discardInput(): Buffer {
    const dropped = this.buffer;
    this.buffer = Buffer.alloc(0);
    return dropped;
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const pending = this.pending;
    this.pending = undefined;
    if (pending) {
      clearTimeout(pending.timer);
      pending.reject(new Error(`Serial link ${this.path} closed during read`));
    }
    await this.shutdown();
  }

  protected abstract send(data: Buffer): Promise<void>;

  protected abstract shutdown(): Promise<void>;

  protected push(data: Buffer): void {
    if (this.closed || data.length === 0) {
      return;
    }
    this.tap?.rx(data);
    this.buffer = Buffer.concat([this.buffer, data]);
    const pending = this.pending;
    if (!pending) {
      return;
    }
    const ready = this.take(pending.sentinel);
    if (ready) {
      this.pending = undefined;
      clearTimeout(pending.timer);
      pending.resolve(ready);
    }
  }

  protected fail(error: Error): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = undefined;
    clearTimeout(pending.timer);
    pending.reject(error);
  }

  private take(sentinel: Buffer): Buffer | undefined {
    const index = this.buffer.indexOf(sentinel);
    if (index < 0) {
      return undefined;
    }
    const data = Buffer.from(this.buffer.subarray(0, index));
    this.buffer = Buffer.from(this.buffer.subarray(index + sentinel.length));
    return data;
  }
}

export async function withSerialLink<T>(
  open: () => Promise<SerialLink>,
  run: (link: SerialLink) => Promise<T>,
  onCloseError?: (error: unknown) => void
): Promise<T> {
  const link = await open();
  let runFailed = false;
  try {
    return await run(link);
  } catch (error) {
    runFailed = true;
    throw error;
  } finally {
    try {
      await link.close();
    } catch (closeError) {
      // a close failure must not hide the error that ended the run
      if (!runFailed) {
        throw closeError;
      }
      onCloseError?.(closeError);
    }
  }
}
