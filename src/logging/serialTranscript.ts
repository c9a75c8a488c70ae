import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import * as path from "node:path";
import type { SerialTap } from "../services/serial/serialLink";

export interface SerialTranscript extends SerialTap {
  close(): void;
}

const NOOP_TRANSCRIPT: SerialTranscript = { tx() {}, rx() {}, close() {} };

/**
 * Renders bytes as text with everything outside printable ASCII (CR and LF
 * kept) shown as `<0xNN>`, so control bytes stay visible in the file.
 */
export function renderTraffic(data: Buffer): string {
  let out = "";
  for (const byte of data) {
    if (byte === 0x0a || byte === 0x0d || (byte >= 0x20 && byte < 0x7f)) {
      out += String.fromCharCode(byte);
    } else {
      out += `<0x${byte.toString(16).padStart(2, "0")}>`;
    }
  }
  return out;
}

class FileSerialTranscript implements SerialTranscript {
  private readonly fd: number;
  private direction?: "tx" | "rx";
  private closed = false;

  public constructor(filepath: string) {
    mkdirSync(path.dirname(filepath), { recursive: true });
    this.fd = openSync(filepath, "a");
    writeSync(this.fd, `--- Transcript started ${new Date().toISOString()} ---\n`);
  }

  public tx(data: Buffer): void {
    this.append("tx", data);
  }

  public rx(data: Buffer): void {
    this.append("rx", data);
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    writeSync(this.fd, `\n--- Transcript ended ${new Date().toISOString()} ---\n`);
    closeSync(this.fd);
  }

  private append(direction: "tx" | "rx", data: Buffer): void {
    if (this.closed) {
      return;
    }
    if (direction !== this.direction) {
      // the header already ends the first line
      writeSync(this.fd, `${this.direction === undefined ? "" : "\n"}[${direction}] `);
      this.direction = direction;
    }
    writeSync(this.fd, renderTraffic(data));
  }
}

export function createSerialTranscript(logDir: string | undefined, portPath: string, enabled: boolean): SerialTranscript {
  if (!enabled || !logDir) {
    return NOOP_TRANSCRIPT;
  }
  const safeName = portPath.replace(/[^\w.-]/g, "_");
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-").slice(0, 19);
  return new FileSerialTranscript(path.join(logDir, `transcript_${safeName}_${timestamp}.log`));
}
