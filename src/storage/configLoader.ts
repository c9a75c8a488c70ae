import { existsSync, readFileSync } from "node:fs";
import { ConfigError } from "../core/errors";
import { DEFAULT_FLASHER_CONFIG, type FlasherConfig, type VerificationSpec } from "../models/config";
import { validateFlasherConfig, validateVerificationSpec } from "../utils/validation";

const SECTIONS = ["device", "serial", "repl", "transfer"] as const;
const SCALARS = ["bootWaitMs", "rebootSettleMs", "logDir", "transcript"] as const;

function readJson(filepath: string, what: string): unknown {
  if (!existsSync(filepath)) {
    throw new ConfigError(`${what} ${filepath} does not exist`);
  }
  try {
    return JSON.parse(readFileSync(filepath, "utf8")) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${what} ${filepath} is not valid JSON: ${message}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function overlay<T extends object>(base: T, override: Record<string, unknown>, section: (typeof SECTIONS)[number]): T {
  const value = override[section];
  const result = { ...base };
  if (value === undefined) {
    return result;
  }
  if (!isRecord(value)) {
    throw new ConfigError(`Configuration section "${section}" must be an object`);
  }
  for (const [key, entry] of Object.entries(value)) {
    if (!(key in base)) {
      throw new ConfigError(`Unknown configuration key ${section}.${key}`);
    }
    Object.assign(result, { [key]: entry });
  }
  return result;
}

/**
 * Overlays a parsed config file onto `base`, section by section. Unknown keys
 * are rejected so typos do not silently fall back to defaults.
 */
export function mergeConfig(base: FlasherConfig, override: unknown): FlasherConfig {
  if (!isRecord(override)) {
    throw new ConfigError("Configuration must be a JSON object");
  }
  const known = new Set<string>([...SECTIONS, ...SCALARS]);
  const unknownKeys = Object.keys(override).filter((key) => !known.has(key));
  if (unknownKeys.length > 0) {
    throw new ConfigError(`Unknown configuration keys: ${unknownKeys.join(", ")}`);
  }

  const merged: FlasherConfig = {
    ...base,
    device: overlay(base.device, override, "device"),
    serial: overlay(base.serial, override, "serial"),
    repl: overlay(base.repl, override, "repl"),
    transfer: overlay(base.transfer, override, "transfer")
  };
  const { bootWaitMs, rebootSettleMs, logDir, transcript } = override;
  if (bootWaitMs !== undefined) {
    if (typeof bootWaitMs !== "number") {
      throw new ConfigError("bootWaitMs must be a number");
    }
    merged.bootWaitMs = bootWaitMs;
  }
  if (rebootSettleMs !== undefined) {
    if (typeof rebootSettleMs !== "number") {
      throw new ConfigError("rebootSettleMs must be a number");
    }
    merged.rebootSettleMs = rebootSettleMs;
  }
  if (logDir !== undefined) {
    if (typeof logDir !== "string") {
      throw new ConfigError("logDir must be a string");
    }
    merged.logDir = logDir;
  }
  if (transcript !== undefined) {
    if (typeof transcript !== "boolean") {
      throw new ConfigError("transcript must be true or false");
    }
    merged.transcript = transcript;
  }
  return merged;
}

export function assertValidConfig(config: FlasherConfig): FlasherConfig {
  const problems = validateFlasherConfig(config);
  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }
  return config;
}

export function loadConfig(filepath?: string): FlasherConfig {
  if (!filepath) {
    return assertValidConfig(DEFAULT_FLASHER_CONFIG);
  }
  return assertValidConfig(mergeConfig(DEFAULT_FLASHER_CONFIG, readJson(filepath, "Config file")));
}

export function loadVerificationSpec(filepath: string): VerificationSpec {
  const raw = readJson(filepath, "Verification file");
  if (!validateVerificationSpec(raw)) {
    throw new ConfigError(
      `Verification file ${filepath} must hold { "entries": [{ "namespace", "key", "expected" }], "fileChecks"?: [{ "path", "rejectPattern" }] }`
    );
  }
  return raw;
}
