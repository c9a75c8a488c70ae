export type SerialParity = "none" | "even" | "odd" | "mark" | "space";
export type SerialDataBits = 5 | 6 | 7 | 8;
export type SerialStopBits = 1 | 2;

export interface DeviceMatch {
  vendorId: string;
  productId: string;
}

export interface DeviceIdentity extends DeviceMatch {
  path: string;
}

export interface SerialLineConfig {
  baudRate: number;
  dataBits: SerialDataBits;
  stopBits: SerialStopBits;
  parity: SerialParity;
}

export interface ReplTimingConfig {
  interruptCount: number;
  interruptDelayMs: number;
  settleDelayMs: number;
  rawEntryTimeoutMs: number;
  readTimeoutMs: number;
  writeChunkBytes: number;
  writeDelayMs: number;
}

export interface TransferConfig {
  destination: string;
  chunkSize: number;
  atomic: boolean;
  maxStatementBytes: number;
}

export interface FlasherConfig {
  device: DeviceMatch;
  serial: SerialLineConfig;
  repl: ReplTimingConfig;
  transfer: TransferConfig;
  bootWaitMs: number;
  rebootSettleMs: number;
  logDir?: string;
  transcript: boolean;
}

export interface TransferPlan {
  destination: string;
  payload: Buffer;
  chunkSize: number;
  /** Path written during the transfer; renamed onto `destination` on close. */
  stagingPath?: string;
}

export interface VerificationEntry {
  namespace: string;
  key: string;
  expected: number | string;
}

export interface FileCheck {
  path: string;
  rejectPattern: string;
}

export interface VerificationSpec {
  entries: VerificationEntry[];
  fileChecks?: FileCheck[];
}

export interface VerificationMismatch {
  target: string;
  expected: number | string;
  actual: number | string | null;
}

export type ReplState = "running" | "interrupted" | "raw" | "executing" | "rebooting";

export type SessionStage =
  | "idle"
  | "located"
  | "interrupted"
  | "raw"
  | "transferring"
  | "rebooting"
  | "verifying"
  | "finalizing"
  | "done"
  | "failed";

// CH340 USB-serial bridge
export const DEFAULT_DEVICE_MATCH: DeviceMatch = {
  vendorId: "1a86",
  productId: "7523"
};

export const DEFAULT_FLASHER_CONFIG: FlasherConfig = {
  device: DEFAULT_DEVICE_MATCH,
  serial: {
    baudRate: 115200,
    dataBits: 8,
    stopBits: 1,
    parity: "none"
  },
  repl: {
    interruptCount: 5,
    interruptDelayMs: 100,
    settleDelayMs: 500,
    rawEntryTimeoutMs: 5000,
    readTimeoutMs: 5000,
    writeChunkBytes: 128,
    writeDelayMs: 20
  },
  transfer: {
    destination: "/main.py",
    chunkSize: 256,
    atomic: true,
    maxStatementBytes: 1024
  },
  bootWaitMs: 12000,
  rebootSettleMs: 200,
  transcript: false
};
