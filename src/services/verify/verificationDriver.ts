import { DeviceExecutionError, VerificationFailedError } from "../../core/errors";
import { NOOP_LOGGER, type FlashLogger } from "../../logging/flashLogger";
import type { FileCheck, VerificationEntry, VerificationMismatch, VerificationSpec } from "../../models/config";
import { pythonString } from "../../utils/helpers";
import type { ExecResult } from "../repl/rawReplController";

export interface VerificationTarget {
  interrupt(): Promise<void>;
  enterRawMode(): Promise<void>;
  execute(statement: string): Promise<ExecResult>;
  readFile(devicePath: string): Promise<Buffer | undefined>;
  exitRawMode(): Promise<void>;
}

const VALUE_MARKER = "VAL:";
const BLOB_MARKER = "B64:";
const MISSING_MARKER = "MISSING";
const BLOB_BUFFER_BYTES = 512;

export type ReadBack =
  | { kind: "missing" }
  | { kind: "text"; text: string }
  | { kind: "bytes"; bytes: Buffer };

export function describeEntry(entry: VerificationEntry): string {
  return `${entry.namespace}/${entry.key}`;
}

/**
 * Integers print as `VAL:<n>`. Blobs print as `B64:<base64>` and are decoded
 * here, so neither invalid UTF-8 nor embedded newlines reach the framing.
 */
export function buildReadBackStatement(entry: VerificationEntry): string {
  const store = `esp32.NVS(${pythonString(entry.namespace)})`;
  const key = pythonString(entry.key);
  const read =
    typeof entry.expected === "number"
      ? ["import esp32", "try:", `    print('${VALUE_MARKER}' + str(${store}.get_i32(${key})))`]
      : [
          "import esp32, ubinascii",
          "try:",
          `    _b = bytearray(${BLOB_BUFFER_BYTES})`,
          `    _n = ${store}.get_blob(${key}, _b)`,
          `    print('${BLOB_MARKER}' + ubinascii.b2a_base64(_b[:_n]).decode().strip())`
        ];
  return [...read, "except OSError:", `    print('${MISSING_MARKER}')`].join("\n");
}

const UTF8 = new TextDecoder("utf-8", { fatal: true });

export function parseReadBack(stdout: string): ReadBack {
  const line = stdout
    .split("\n")
    .map((item) => item.replace(/\r$/, ""))
    .find((item) => item.startsWith(VALUE_MARKER) || item.startsWith(BLOB_MARKER) || item === MISSING_MARKER);
  if (line === undefined || line === MISSING_MARKER) {
    return { kind: "missing" };
  }
  if (line.startsWith(VALUE_MARKER)) {
    return { kind: "text", text: line.slice(VALUE_MARKER.length) };
  }
  const bytes = Buffer.from(line.slice(BLOB_MARKER.length).trim(), "base64");
  try {
    return { kind: "text", text: UTF8.decode(bytes) };
  } catch {
    return { kind: "bytes", bytes };
  }
}

/** Undecodable blobs are reported as `hex:<bytes>`. */
export function compareEntry(entry: VerificationEntry, readBack: ReadBack): VerificationMismatch | undefined {
  const target = describeEntry(entry);
  if (readBack.kind === "missing") {
    return { target, expected: entry.expected, actual: null };
  }
  if (readBack.kind === "bytes") {
    return { target, expected: entry.expected, actual: `hex:${readBack.bytes.toString("hex")}` };
  }
  const raw = readBack.text;
  if (typeof entry.expected === "number") {
    const actual = Number(raw.trim());
    if (raw.trim().length === 0 || Number.isNaN(actual)) {
      return { target, expected: entry.expected, actual: raw };
    }
    return actual === entry.expected ? undefined : { target, expected: entry.expected, actual };
  }
  return raw === entry.expected ? undefined : { target, expected: entry.expected, actual: raw };
}

function lastLine(text: string): string {
  const lines = text.split("\n").filter((line) => line.trim().length > 0);
  return lines.length > 0 ? lines[lines.length - 1].trim() : text;
}

async function checkEntry(target: VerificationTarget, entry: VerificationEntry): Promise<VerificationMismatch | undefined> {
  try {
    const { stdout } = await target.execute(buildReadBackStatement(entry));
    return compareEntry(entry, parseReadBack(stdout));
  } catch (error) {
    // one failing read must not hide the others
    if (!(error instanceof DeviceExecutionError)) {
      throw error;
    }
    return { target: describeEntry(entry), expected: entry.expected, actual: `error: ${lastLine(error.deviceText)}` };
  }
}

async function checkFile(target: VerificationTarget, check: FileCheck): Promise<VerificationMismatch | undefined> {
  const expected = `no match for /${check.rejectPattern}/i`;
  const content = await target.readFile(check.path);
  if (content === undefined) {
    return { target: check.path, expected, actual: null };
  }
  const text = content.toString("utf8");
  const match = new RegExp(check.rejectPattern, "i").exec(text);
  return match ? { target: check.path, expected, actual: match[0] } : undefined;
}

/**
 * Re-enters raw mode after a reboot and reads every expected value back.
 * All entries are checked before failing so the error lists every mismatch.
 */
export async function verifyDevice(
  target: VerificationTarget,
  verification: VerificationSpec,
  logger: FlashLogger = NOOP_LOGGER
): Promise<void> {
  await target.interrupt();
  await target.enterRawMode();

  const mismatches: VerificationMismatch[] = [];
  for (const entry of verification.entries) {
    const mismatch = await checkEntry(target, entry);
    logger.log(`${describeEntry(entry)} ${mismatch ? `mismatch (got ${JSON.stringify(mismatch.actual)})` : "ok"}`);
    if (mismatch) {
      mismatches.push(mismatch);
    }
  }
  for (const check of verification.fileChecks ?? []) {
    const mismatch = await checkFile(target, check);
    logger.log(`${check.path} ${mismatch ? "rejected" : "ok"}`);
    if (mismatch) {
      mismatches.push(mismatch);
    }
  }

  if (mismatches.length > 0) {
    throw new VerificationFailedError(mismatches);
  }
  await target.exitRawMode();
}
