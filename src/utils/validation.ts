import type {
  FileCheck,
  FlasherConfig,
  SerialDataBits,
  SerialParity,
  SerialStopBits,
  VerificationEntry,
  VerificationSpec
} from "../models/config";

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function isSerialParity(value: unknown): value is SerialParity {
  return value === "none" || value === "even" || value === "odd" || value === "mark" || value === "space";
}

export function isSerialDataBits(value: unknown): value is SerialDataBits {
  return value === 5 || value === 6 || value === 7 || value === 8;
}

export function isSerialStopBits(value: unknown): value is SerialStopBits {
  return value === 1 || value === 2;
}

export function isUsbId(value: unknown): value is string {
  return typeof value === "string" && /^(0x)?[0-9a-fA-F]{1,4}$/.test(value);
}

export function validateVerificationEntry(item: unknown): item is VerificationEntry {
  if (!isRecord(item)) {
    return false;
  }
  return (
    isNonEmptyString(item.namespace) &&
    isNonEmptyString(item.key) &&
    ((typeof item.expected === "number" && Number.isFinite(item.expected)) || typeof item.expected === "string")
  );
}

export function validateFileCheck(item: unknown): item is FileCheck {
  if (!isRecord(item) || !isNonEmptyString(item.path) || !isNonEmptyString(item.rejectPattern)) {
    return false;
  }
  try {
    new RegExp(item.rejectPattern, "i");
  } catch {
    return false;
  }
  return item.path.startsWith("/");
}

export function validateVerificationSpec(item: unknown): item is VerificationSpec {
  if (!isRecord(item) || !Array.isArray(item.entries)) {
    return false;
  }
  if (!item.entries.every(validateVerificationEntry)) {
    return false;
  }
  if (item.fileChecks === undefined) {
    return true;
  }
  return Array.isArray(item.fileChecks) && item.fileChecks.every(validateFileCheck);
}

/**
 * Checks a fully merged configuration. Returns the problems found; an empty
 * list means the configuration is usable.
 */
export function validateFlasherConfig(config: FlasherConfig): string[] {
  const problems: string[] = [];
  if (!isUsbId(config.device.vendorId)) {
    problems.push(`device.vendorId must be a hex USB id, got ${JSON.stringify(config.device.vendorId)}`);
  }
  if (!isUsbId(config.device.productId)) {
    problems.push(`device.productId must be a hex USB id, got ${JSON.stringify(config.device.productId)}`);
  }
  if (!isPositiveInteger(config.serial.baudRate)) {
    problems.push("serial.baudRate must be a positive integer");
  }
  if (!isSerialDataBits(config.serial.dataBits)) {
    problems.push("serial.dataBits must be 5, 6, 7 or 8");
  }
  if (!isSerialStopBits(config.serial.stopBits)) {
    problems.push("serial.stopBits must be 1 or 2");
  }
  if (!isSerialParity(config.serial.parity)) {
    problems.push("serial.parity must be none, even, odd, mark or space");
  }
  const repl = config.repl;
  for (const key of ["interruptCount", "rawEntryTimeoutMs", "readTimeoutMs", "writeChunkBytes"] as const) {
    if (!isPositiveInteger(repl[key])) {
      problems.push(`repl.${key} must be a positive integer`);
    }
  }
  for (const key of ["interruptDelayMs", "settleDelayMs", "writeDelayMs"] as const) {
    if (!isNonNegativeInteger(repl[key])) {
      problems.push(`repl.${key} must be a non-negative integer`);
    }
  }
  if (!isNonEmptyString(config.transfer.destination) || !config.transfer.destination.startsWith("/")) {
    problems.push("transfer.destination must be an absolute device path");
  }
  if (!isPositiveInteger(config.transfer.chunkSize)) {
    problems.push("transfer.chunkSize must be a positive integer");
  }
  if (!isPositiveInteger(config.transfer.maxStatementBytes)) {
    problems.push("transfer.maxStatementBytes must be a positive integer");
  }
  if (typeof config.transfer.atomic !== "boolean") {
    problems.push("transfer.atomic must be true or false");
  }
  if (!isNonNegativeInteger(config.bootWaitMs)) {
    problems.push("bootWaitMs must be a non-negative integer");
  }
  if (!isNonNegativeInteger(config.rebootSettleMs)) {
    problems.push("rebootSettleMs must be a non-negative integer");
  }
  return problems;
}
