#!/usr/bin/env node
import { FlashSession, type SessionEvent } from "./core/flashSession";
import { errorMessage, FlasherError } from "./core/errors";
import { FlashLoggerFactory, NOOP_LOGGER, type FlashLogger } from "./logging/flashLogger";
import { createSerialTranscript, type SerialTranscript } from "./logging/serialTranscript";
import type { FlasherConfig, SessionStage } from "./models/config";
import { loadPayload } from "./payload/payloadBuilder";
import { NodeSerialLink, systemPortLister } from "./services/serial/nodeSerialLink";
import { assertValidConfig, loadConfig, loadVerificationSpec } from "./storage/configLoader";

export interface CliOptions {
  payloadPath: string;
  verifyPath: string;
  configPath?: string;
  destination?: string;
  portPath?: string;
  variants: string[];
  chunkSize?: number;
  atomic: boolean;
  bootWaitMs?: number;
  logDir?: string;
  transcript: boolean;
}

export type ParsedArgs = { kind: "help" } | { kind: "run"; options: CliOptions };

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export class UsageError extends Error {}

export const USAGE = `
Usage: rawrepl-flash --payload <file> --verify <file> [options]

Pushes a file onto a MicroPython device through its raw REPL, reboots it and
checks persisted values afterwards.

Options:
  --payload, -p <file>   File to write onto the device
  --verify, -v <file>    JSON list of namespace/key/expected values to check after reboot
  --dest, -d <path>      Destination on the device (default: /main.py)
  --port <path>          Serial port to use when several devices match
  --config, -c <file>    JSON configuration overriding the built-in defaults
  --enable, -e <NAME>    Switch "NAME = False" to "NAME = True" in the payload (repeatable)
  --chunk-size <bytes>   Payload bytes per write statement (default: 256)
  --no-atomic            Write the destination directly instead of via a temporary file
  --boot-wait <ms>       Time to let the payload run after the first reboot (default: 12000)
  --log-dir <dir>        Write a session log to this directory
  --transcript           Also record raw serial traffic (needs --log-dir)
  --help, -h             Show this help message
`;

function parseInteger(flag: string, value: string | undefined, min: number): number {
  const parsed = value === undefined ? Number.NaN : Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new UsageError(`${flag} expects an integer >= ${min}, got ${JSON.stringify(value ?? "")}`);
  }
  return parsed;
}

export function parseCliArgs(args: readonly string[]): ParsedArgs {
  let payloadPath: string | undefined;
  let verifyPath: string | undefined;
  const options: Omit<CliOptions, "payloadPath" | "verifyPath"> = {
    variants: [],
    atomic: true,
    transcript: false
  };

  const takeValue = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith("-")) {
      throw new UsageError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (arg === "--payload" || arg === "-p") {
      payloadPath = takeValue(arg, ++i);
    } else if (arg === "--verify" || arg === "-v") {
      verifyPath = takeValue(arg, ++i);
    } else if (arg === "--dest" || arg === "-d") {
      options.destination = takeValue(arg, ++i);
    } else if (arg === "--port") {
      options.portPath = takeValue(arg, ++i);
    } else if (arg === "--config" || arg === "-c") {
      options.configPath = takeValue(arg, ++i);
    } else if (arg === "--enable" || arg === "-e") {
      options.variants.push(takeValue(arg, ++i));
    } else if (arg === "--chunk-size") {
      options.chunkSize = parseInteger(arg, args[++i], 1);
    } else if (arg === "--no-atomic") {
      options.atomic = false;
    } else if (arg === "--boot-wait") {
      options.bootWaitMs = parseInteger(arg, args[++i], 0);
    } else if (arg === "--log-dir") {
      options.logDir = takeValue(arg, ++i);
    } else if (arg === "--transcript") {
      options.transcript = true;
    } else {
      throw new UsageError(`Unknown argument ${arg}`);
    }
  }

  if (!payloadPath) {
    throw new UsageError("--payload is required");
  }
  if (!verifyPath) {
    throw new UsageError("--verify is required");
  }
  return { kind: "run", options: { ...options, payloadPath, verifyPath } };
}

/** CLI flags win over the config file, which wins over the defaults. */
export function resolveConfig(options: CliOptions): FlasherConfig {
  const base = loadConfig(options.configPath);
  return assertValidConfig({
    ...base,
    transfer: {
      ...base.transfer,
      destination: options.destination ?? base.transfer.destination,
      chunkSize: options.chunkSize ?? base.transfer.chunkSize,
      atomic: options.atomic && base.transfer.atomic
    },
    bootWaitMs: options.bootWaitMs ?? base.bootWaitMs,
    logDir: options.logDir ?? base.logDir,
    transcript: options.transcript || base.transcript
  });
}

const STAGE_LABELS: Record<SessionStage, string> = {
  idle: "Starting",
  located: "Device located",
  interrupted: "Application interrupted",
  raw: "Raw REPL entered",
  transferring: "Transferring payload",
  rebooting: "Rebooting to run payload",
  verifying: "Verifying persisted values",
  finalizing: "Rebooting into normal operation",
  done: "Done",
  failed: "Failed"
};

export function formatEvent(event: SessionEvent): string | undefined {
  if (event.type === "stage") {
    return event.stage === "idle" ? undefined : `==> ${STAGE_LABELS[event.stage]}`;
  }
  if (event.type === "message") {
    return event.level === "warn" ? `WARNING: ${event.text}` : `    ${event.text}`;
  }
  const { chunkIndex, chunkCount } = event.progress;
  const percent = Math.floor((chunkIndex * 100) / chunkCount);
  const previous = Math.floor(((chunkIndex - 1) * 100) / chunkCount);
  // one line per 10% step
  if (Math.floor(percent / 10) === Math.floor(previous / 10) && chunkIndex !== chunkCount) {
    return undefined;
  }
  return `    ${percent}% (${chunkIndex}/${chunkCount} chunks)`;
}

export async function runCli(args: readonly string[], io: CliIo): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(args);
  } catch (error) {
    io.err(errorMessage(error, "invalid arguments"));
    io.err(USAGE);
    return 2;
  }
  if (parsed.kind === "help") {
    io.out(USAGE);
    return 0;
  }

  let logger: FlashLogger = NOOP_LOGGER;
  const resources: { transcript?: SerialTranscript } = {};
  try {
    const config = resolveConfig(parsed.options);
    const verification = loadVerificationSpec(parsed.options.verifyPath);
    const payload = loadPayload(parsed.options.payloadPath, parsed.options.variants);
    if (config.logDir) {
      logger = new FlashLoggerFactory(config.logDir).create("rawrepl-flash");
    }

    const session = new FlashSession(config, {
      lister: systemPortLister,
      logger,
      openLink: (identity, serial) => {
        const transcript = createSerialTranscript(config.logDir, identity.path, config.transcript);
        resources.transcript = transcript;
        return NodeSerialLink.open({ path: identity.path, ...serial }, transcript);
      }
    });
    session.onDidEmit((event) => {
      const line = formatEvent(event);
      if (line !== undefined) {
        io.out(line);
      }
    });

    const result = await session.run({ payload, verification, portPath: parsed.options.portPath });
    io.out(`All checks passed. ${result.bytesWritten} bytes written to ${config.transfer.destination} on ${result.identity.path}.`);
    return 0;
  } catch (error) {
    const prefix = error instanceof FlasherError ? `[${error.code}] ` : "";
    io.err(`${prefix}${errorMessage(error, String(error))}`);
    return 1;
  } finally {
    resources.transcript?.close();
    logger.close();
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line)
  }).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error("Fatal error:", errorMessage(error, String(error)));
      process.exitCode = 1;
    }
  );
}
