import type { VerificationMismatch } from "../models/config";

export type FlasherErrorCode =
  | "DEVICE_NOT_FOUND"
  | "AMBIGUOUS_DEVICE"
  | "PROTOCOL_TIMEOUT"
  | "DEVICE_EXECUTION"
  | "VERIFICATION_FAILED"
  | "TRANSFER_SIZE_MISMATCH"
  | "INVALID_TRANSFER_PLAN"
  | "UNKNOWN_VARIANT"
  | "CONFIG";

export class FlasherError extends Error {
  public constructor(
    public readonly code: FlasherErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class DeviceNotFoundError extends FlasherError {
  public constructor(
    public readonly vendorId: string,
    public readonly productId: string,
    public readonly seen: string[]
  ) {
    const seenText = seen.length > 0 ? ` (ports seen: ${seen.join(", ")})` : " (no serial ports found)";
    super("DEVICE_NOT_FOUND", `No device with USB id ${vendorId}:${productId} is connected${seenText}`);
  }
}

export class AmbiguousDeviceError extends FlasherError {
  public constructor(public readonly candidates: string[]) {
    super(
      "AMBIGUOUS_DEVICE",
      `Found ${candidates.length} matching devices (${candidates.join(", ")}). Select one with --port.`
    );
  }
}

export class ProtocolTimeoutError extends FlasherError {
  public constructor(
    public readonly sentinel: string,
    public readonly timeoutMs: number,
    public readonly received: string
  ) {
    const tail = received.length > 0 ? `; last bytes ${JSON.stringify(received)}` : "; nothing received";
    super("PROTOCOL_TIMEOUT", `Timed out after ${timeoutMs} ms waiting for ${JSON.stringify(sentinel)}${tail}`);
  }
}

export class DeviceExecutionError extends FlasherError {
  public constructor(
    public readonly deviceText: string,
    public readonly statement: string
  ) {
    super("DEVICE_EXECUTION", `Device raised an error while running ${JSON.stringify(statement)}:\n${deviceText}`);
  }
}

export class VerificationFailedError extends FlasherError {
  public constructor(public readonly mismatches: VerificationMismatch[]) {
    const lines = mismatches.map(
      (item) => `  ${item.target}: expected ${JSON.stringify(item.expected)}, got ${JSON.stringify(item.actual)}`
    );
    super("VERIFICATION_FAILED", `Verification failed for ${mismatches.length} value(s):\n${lines.join("\n")}`);
  }
}

export class TransferSizeMismatchError extends FlasherError {
  public constructor(
    public readonly destination: string,
    public readonly expectedBytes: number,
    public readonly actualBytes: number
  ) {
    super(
      "TRANSFER_SIZE_MISMATCH",
      `${destination} holds ${actualBytes} bytes on the device, expected ${expectedBytes}`
    );
  }
}

export class InvalidTransferPlanError extends FlasherError {
  public constructor(message: string) {
    super("INVALID_TRANSFER_PLAN", message);
  }
}

export class UnknownVariantError extends FlasherError {
  public constructor(public readonly variant: string) {
    super("UNKNOWN_VARIANT", `Payload has no "${variant} = False" switch`);
  }
}

export class ConfigError extends FlasherError {
  public constructor(message: string) {
    super("CONFIG", message);
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
