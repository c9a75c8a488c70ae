import { readFileSync } from "node:fs";
import { UnknownVariantError } from "../core/errors";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Turns on optional payload features. A variant `NAME` is a top-level
 * `NAME = False` assignment in the payload source; enabling it rewrites the
 * first such line to `NAME = True`.
 */
export function applyVariants(source: string, variants: readonly string[]): string {
  let result = source;
  for (const variant of variants) {
    const pattern = new RegExp(`^${escapeRegExp(variant)}(\\s*)=(\\s*)False\\b`, "m");
    if (!pattern.test(result)) {
      throw new UnknownVariantError(variant);
    }
    result = result.replace(pattern, `${variant}$1=$2True`);
  }
  return result;
}

export function buildPayload(source: string, variants: readonly string[] = []): Buffer {
  return Buffer.from(applyVariants(source, variants), "utf8");
}

export function loadPayload(filepath: string, variants: readonly string[] = []): Buffer {
  if (variants.length === 0) {
    return readFileSync(filepath);
  }
  return buildPayload(readFileSync(filepath, "utf8"), variants);
}
