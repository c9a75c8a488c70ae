import { DEFAULT_FLASHER_CONFIG, type FlasherConfig, type ReplTimingConfig } from "../../src/models/config";

export const FAST_TIMING: ReplTimingConfig = {
  interruptCount: 5,
  interruptDelayMs: 0,
  settleDelayMs: 0,
  rawEntryTimeoutMs: 30,
  readTimeoutMs: 30,
  writeChunkBytes: 128,
  writeDelayMs: 0
};

export function testConfig(overrides: Partial<FlasherConfig> = {}): FlasherConfig {
  return {
    ...DEFAULT_FLASHER_CONFIG,
    repl: FAST_TIMING,
    bootWaitMs: 0,
    rebootSettleMs: 0,
    ...overrides
  };
}

/** Deterministic bytes covering the whole 0-255 range. */
export function patternBytes(length: number): Buffer {
  const data = Buffer.alloc(length);
  for (let index = 0; index < length; index += 1) {
    data[index] = (index * 31 + 7) % 256;
  }
  return data;
}
