import { DeviceExecutionError, ProtocolTimeoutError } from "../../core/errors";
import { NOOP_LOGGER, type FlashLogger } from "../../logging/flashLogger";
import type { ReplState, ReplTimingConfig } from "../../models/config";
import { pythonString, sleep, summarize } from "../../utils/helpers";
import type { SerialLink } from "../serial/serialLink";
import {
  CTRL_C_INTERRUPT,
  CTRL_D_EXECUTE,
  END_OF_EXCEPTION,
  END_OF_OUTPUT,
  ENTER_RAW_SEQUENCE,
  EXEC_ACK,
  EXIT_RAW_SEQUENCE,
  RAW_BANNER,
  RAW_PROMPT,
  SOFT_REBOOT_NOTICE
} from "./controlCodes";

export interface ExecResult {
  stdout: string;
}

const CONTROL_BYTES_RE = /[\x01-\x04]/;
const RAW_ENTRY_ATTEMPTS = 2;

function normalizeLineEndings(data: Buffer): string {
  return data.toString("utf8").replace(/\r\n/g, "\n");
}

export function buildReadFileStatement(devicePath: string): string {
  return [
    "import ubinascii",
    "try:",
    `    _rf = open(${pythonString(devicePath)}, 'rb')`,
    "    print('FILE:' + ubinascii.b2a_base64(_rf.read()).decode().strip())",
    "    _rf.close()",
    "except OSError:",
    "    print('MISSING')"
  ].join("\n");
}

/**
 * Drives a MicroPython-style interpreter over its raw REPL: halts the running
 * program, enters raw mode, runs statements and leaves raw mode again.
 */
export class RawReplController {
  private replState: ReplState = "running";

  public constructor(
    private readonly link: SerialLink,
    private readonly timing: ReplTimingConfig,
    private readonly logger: FlashLogger = NOOP_LOGGER
  ) {}

  public get state(): ReplState {
    return this.replState;
  }

  public async interrupt(): Promise<void> {
    const interrupt = Buffer.from([CTRL_C_INTERRUPT]);
    // a busy application loop can miss a single ^C
    for (let index = 0; index < this.timing.interruptCount; index += 1) {
      await this.link.write(interrupt);
      await sleep(this.timing.interruptDelayMs);
    }
    await sleep(this.timing.settleDelayMs);
    const dropped = this.link.discardInput();
    this.logger.log(`interrupt sent x${this.timing.interruptCount}, discarded ${dropped.length} bytes`);
    this.replState = "interrupted";
  }

  public async enterRawMode(): Promise<void> {
    if (this.replState === "running" || this.replState === "rebooting") {
      await this.interrupt();
    }
    for (let attempt = 1; attempt <= RAW_ENTRY_ATTEMPTS; attempt += 1) {
      await this.link.write(ENTER_RAW_SEQUENCE);
      try {
        await this.link.readUntil(RAW_BANNER, this.timing.rawEntryTimeoutMs);
        this.replState = "raw";
        this.logger.log(`raw mode entered (attempt ${attempt})`);
        return;
      } catch (error) {
        if (!(error instanceof ProtocolTimeoutError) || attempt === RAW_ENTRY_ATTEMPTS) {
          throw error;
        }
        this.logger.log(`raw banner not seen, interrupting again: ${error.message}`);
        await this.interrupt();
      }
    }
  }

  public async execute(statement: string): Promise<ExecResult> {
    if (this.replState !== "raw") {
      throw new Error(`Cannot execute a statement while the device is ${this.replState}`);
    }
    if (statement.trim().length === 0) {
      // ^D on an empty raw line soft-reboots the device
      throw new Error("Refusing to execute an empty statement");
    }
    if (CONTROL_BYTES_RE.test(statement)) {
      throw new Error("Statement contains raw REPL control bytes");
    }

    await this.readWithRetry(RAW_PROMPT);
    const bytes = Buffer.from(statement, "utf8");
    for (let offset = 0; offset < bytes.length; offset += this.timing.writeChunkBytes) {
      await this.link.write(bytes.subarray(offset, offset + this.timing.writeChunkBytes));
      await sleep(this.timing.writeDelayMs);
    }
    await this.link.write(Buffer.from([CTRL_D_EXECUTE]));
    this.replState = "executing";

    await this.readWithRetry(EXEC_ACK);
    const stdout = await this.readWithRetry(END_OF_OUTPUT);
    const stderr = await this.readWithRetry(END_OF_EXCEPTION);
    this.replState = "raw";

    const summary = summarize(statement);
    if (stderr.length > 0) {
      const deviceText = normalizeLineEndings(stderr);
      this.logger.log(`exec failed: ${summary}`);
      throw new DeviceExecutionError(deviceText, summary);
    }
    this.logger.log(`exec ok (${bytes.length} bytes): ${summary}`);
    return { stdout: normalizeLineEndings(stdout) };
  }

  public async readFile(devicePath: string): Promise<Buffer | undefined> {
    const { stdout } = await this.execute(buildReadFileStatement(devicePath));
    const line = stdout.split("\n").find((item) => item.startsWith("FILE:"));
    if (line === undefined) {
      return undefined;
    }
    return Buffer.from(line.slice("FILE:".length).trim(), "base64");
  }

  public async exitRawMode(): Promise<void> {
    await this.link.write(EXIT_RAW_SEQUENCE);
    this.replState = "interrupted";
    this.logger.log("raw mode exited");
  }

  /**
   * Sends ^D at the friendly prompt and waits for the reboot notice; the
   * device then restarts and runs its boot files.
   */
  public async softReboot(): Promise<void> {
    await this.link.write(Buffer.from([CTRL_D_EXECUTE]));
    this.replState = "rebooting";
    await this.readWithRetry(SOFT_REBOOT_NOTICE);
    this.logger.log("soft reboot confirmed");
  }

  public markRunning(): void {
    this.replState = "running";
  }

  private async readWithRetry(sentinel: Buffer): Promise<Buffer> {
    try {
      return await this.link.readUntil(sentinel, this.timing.readTimeoutMs);
    } catch (error) {
      if (!(error instanceof ProtocolTimeoutError)) {
        throw error;
      }
      this.logger.log(`read timed out, waiting once more: ${error.message}`);
      return this.link.readUntil(sentinel, this.timing.readTimeoutMs);
    }
  }
}
