import { DeviceExecutionError, InvalidTransferPlanError, TransferSizeMismatchError } from "../../core/errors";
import { NOOP_LOGGER, type FlashLogger } from "../../logging/flashLogger";
import type { TransferPlan } from "../../models/config";
import { pythonString } from "../../utils/helpers";
import type { ExecResult } from "../repl/rawReplController";

/** The only primitive the engine needs from the raw REPL. */
export interface StatementExecutor {
  execute(statement: string): Promise<ExecResult>;
}

export interface TransferProgress {
  sentBytes: number;
  totalBytes: number;
  chunkIndex: number;
  chunkCount: number;
}

export interface PlanOptions {
  destination: string;
  chunkSize: number;
  atomic: boolean;
  maxStatementBytes: number;
}

export interface TransferResult {
  bytesWritten: number;
  writeStatements: number;
}

const HANDLE = "_xf";
const SIZE_MARKER = "SIZE:";

export function base64Length(byteCount: number): number {
  return Math.ceil(byteCount / 3) * 4;
}

export function buildOpenStatement(path: string): string {
  return [`import ubinascii, os`, `${HANDLE} = open(${pythonString(path)}, 'wb')`].join("\n");
}

export function buildWriteStatement(chunk: Buffer): string {
  return `${HANDLE}.write(ubinascii.a2b_base64('${chunk.toString("base64")}'))`;
}

/**
 * Closes the handle and prints the written size. With a staging file the
 * rename only happens when that size equals the payload length; otherwise the
 * staging file is removed and the destination is left as it was.
 */
export function buildCloseStatement(plan: TransferPlan): string {
  const target = plan.stagingPath ?? plan.destination;
  const lines = [`${HANDLE}.close()`, `_sz = os.stat(${pythonString(target)})[6]`];
  if (plan.stagingPath) {
    lines.push(
      `if _sz == ${plan.payload.length}:`,
      `    os.rename(${pythonString(plan.stagingPath)}, ${pythonString(plan.destination)})`,
      "else:",
      `    os.remove(${pythonString(plan.stagingPath)})`
    );
  }
  lines.push(`print('${SIZE_MARKER}' + str(_sz))`);
  return lines.join("\n");
}

export function buildCleanupStatement(plan: TransferPlan): string {
  const lines = ["try:", `    ${HANDLE}.close()`, "except Exception:", "    pass"];
  if (plan.stagingPath) {
    lines.push("try:", `    os.remove(${pythonString(plan.stagingPath)})`, "except Exception:", "    pass");
  }
  return lines.join("\n");
}

export function planTransfer(payload: Buffer, options: PlanOptions): TransferPlan {
  if (!options.destination.startsWith("/")) {
    throw new InvalidTransferPlanError(`Destination ${options.destination} must be an absolute device path`);
  }
  if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
    throw new InvalidTransferPlanError(`Chunk size must be a positive integer, got ${options.chunkSize}`);
  }
  const largestStatement = Buffer.byteLength(buildWriteStatement(Buffer.alloc(0)), "utf8") + base64Length(options.chunkSize);
  if (largestStatement > options.maxStatementBytes) {
    throw new InvalidTransferPlanError(
      `Chunk size ${options.chunkSize} produces ${largestStatement}-byte statements; the device accepts at most ${options.maxStatementBytes}`
    );
  }
  return {
    destination: options.destination,
    payload,
    chunkSize: options.chunkSize,
    stagingPath: options.atomic ? `${options.destination}.tmp` : undefined
  };
}

function parseSize(stdout: string): number | undefined {
  const line = stdout.split("\n").find((item) => item.startsWith(SIZE_MARKER));
  if (line === undefined) {
    return undefined;
  }
  const size = Number(line.slice(SIZE_MARKER.length).trim());
  return Number.isInteger(size) ? size : undefined;
}

/**
 * Streams `plan.payload` into a device file using nothing but single
 * statements: one open, one base64 write per chunk, one close.
 */
export async function transferFile(
  executor: StatementExecutor,
  plan: TransferPlan,
  onProgress?: (progress: TransferProgress) => void,
  logger: FlashLogger = NOOP_LOGGER
): Promise<TransferResult> {
  const totalBytes = plan.payload.length;
  const chunkCount = Math.ceil(totalBytes / plan.chunkSize);
  const target = plan.stagingPath ?? plan.destination;
  logger.log(`transfer ${totalBytes} bytes to ${plan.destination} via ${target} in ${chunkCount} chunks`);

  await executor.execute(buildOpenStatement(target));
  try {
    for (let chunkIndex = 0; chunkIndex < chunkCount; chunkIndex += 1) {
      const start = chunkIndex * plan.chunkSize;
      const chunk = plan.payload.subarray(start, start + plan.chunkSize);
      await executor.execute(buildWriteStatement(chunk));
      onProgress?.({ sentBytes: start + chunk.length, totalBytes, chunkIndex: chunkIndex + 1, chunkCount });
    }

    const { stdout } = await executor.execute(buildCloseStatement(plan));
    const size = parseSize(stdout);
    if (size !== totalBytes) {
      throw new TransferSizeMismatchError(plan.destination, totalBytes, size ?? -1);
    }
  } catch (error) {
    if (error instanceof DeviceExecutionError) {
      await cleanup(executor, plan, logger);
    }
    throw error;
  }

  logger.log(`transfer complete: ${plan.destination} holds ${totalBytes} bytes`);
  return { bytesWritten: totalBytes, writeStatements: chunkCount };
}

async function cleanup(executor: StatementExecutor, plan: TransferPlan, logger: FlashLogger): Promise<void> {
  try {
    await executor.execute(buildCleanupStatement(plan));
    logger.log("transfer aborted, open handle closed");
  } catch (cleanupError) {
    const message = cleanupError instanceof Error ? cleanupError.message : "unknown cleanup error";
    logger.log(`transfer cleanup failed: ${message}`);
  }
}
