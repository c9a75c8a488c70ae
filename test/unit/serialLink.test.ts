import { describe, expect, it, vi } from "vitest";
import { ProtocolTimeoutError } from "../../src/core/errors";
import { BufferedSerialLink, withSerialLink, type SerialTap } from "../../src/services/serial/serialLink";

class LoopbackLink extends BufferedSerialLink {
  public readonly sent: Buffer[] = [];
  public closeCalls = 0;
  public failClose = false;

  public constructor(tap?: SerialTap) {
    super("/dev/loop0", tap);
  }

  public feed(text: string): void {
    this.push(Buffer.from(text, "latin1"));
  }

  public breakWith(error: Error): void {
    this.fail(error);
  }

  protected async send(data: Buffer): Promise<void> {
    this.sent.push(data);
  }

  protected async shutdown(): Promise<void> {
    this.closeCalls += 1;
    if (this.failClose) {
      throw new Error("close failed");
    }
  }
}

describe("BufferedSerialLink", () => {
  it("returns data already buffered before the read starts", async () => {
    const link = new LoopbackLink();
    link.feed("hello>world");
    const data = await link.readUntil(Buffer.from(">"), 50);
    expect(data.toString()).toBe("hello");
    expect(link.discardInput().toString()).toBe("world");
  });

  it("resolves when the sentinel arrives split across chunks", async () => {
    const link = new LoopbackLink();
    const read = link.readUntil(Buffer.from("raw REPL"), 100);
    link.feed("junk raw R");
    link.feed("EPL; rest");
    expect((await read).toString()).toBe("junk ");
    expect(link.discardInput().toString()).toBe("; rest");
  });

  it("times out with the received tail and keeps the buffer for a second read", async () => {
    const link = new LoopbackLink();
    link.feed("partial");
    const error = await link.readUntil(Buffer.from("\x04"), 20).catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(ProtocolTimeoutError);
    if (error instanceof ProtocolTimeoutError) {
      expect(error.received).toBe("partial");
      expect(error.timeoutMs).toBe(20);
      expect(error.code).toBe("PROTOCOL_TIMEOUT");
    }
    link.feed(" output\x04");
    expect((await link.readUntil(Buffer.from("\x04"), 20)).toString()).toBe("partial output");
  });

  it("rejects a second concurrent read", async () => {
    const link = new LoopbackLink();
    const first = link.readUntil(Buffer.from(">"), 100);
    await expect(link.readUntil(Buffer.from(">"), 100)).rejects.toThrow("Another read is already pending");
    link.feed(">");
    await expect(first).resolves.toHaveLength(0);
  });

  it("rejects the pending read on close and refuses further writes", async () => {
    const link = new LoopbackLink();
    const read = link.readUntil(Buffer.from(">"), 1000);
    await link.close();
    await expect(read).rejects.toThrow("closed during read");
    await expect(link.write(Buffer.from("x"))).rejects.toThrow("is closed");
    await link.close();
    expect(link.closeCalls).toBe(1);
  });

  it("rejects the pending read when the port reports an error", async () => {
    const link = new LoopbackLink();
    const read = link.readUntil(Buffer.from(">"), 1000);
    link.breakWith(new Error("device unplugged"));
    await expect(read).rejects.toThrow("device unplugged");
  });

  it("passes traffic through the tap", async () => {
    const tap = { tx: vi.fn(), rx: vi.fn() };
    const link = new LoopbackLink(tap);
    await link.write(Buffer.from([0x03]));
    link.feed("ok");
    expect(tap.tx).toHaveBeenCalledWith(Buffer.from([0x03]));
    expect(tap.rx).toHaveBeenCalledWith(Buffer.from("ok", "latin1"));
  });
});

describe("withSerialLink", () => {
  it("closes the link after a successful run", async () => {
    const link = new LoopbackLink();
    const result = await withSerialLink(async () => link, async () => 42);
    expect(result).toBe(42);
    expect(link.closeCalls).toBe(1);
  });

  it("closes the link when the run throws and keeps the original error", async () => {
    const link = new LoopbackLink();
    link.failClose = true;
    const onCloseError = vi.fn();
    await expect(
      withSerialLink(
        async () => link,
        async () => {
          throw new Error("stage failed");
        },
        onCloseError
      )
    ).rejects.toThrow("stage failed");
    expect(link.closeCalls).toBe(1);
    expect(onCloseError).toHaveBeenCalledTimes(1);
  });

  it("surfaces a close failure after a successful run", async () => {
    const link = new LoopbackLink();
    link.failClose = true;
    await expect(withSerialLink(async () => link, async () => "ok")).rejects.toThrow("close failed");
  });
});
