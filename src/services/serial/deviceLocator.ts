import { AmbiguousDeviceError, DeviceNotFoundError } from "../../core/errors";
import type { DeviceIdentity, DeviceMatch } from "../../models/config";
import type { PortLister, SerialPortInfo } from "./protocol";

export interface LocateOptions {
  match: DeviceMatch;
  /** Explicit port path; must still be one of the matching descriptors. */
  path?: string;
  platform?: NodeJS.Platform;
}

export function normalizeUsbId(id: string | undefined): string | undefined {
  if (!id) {
    return undefined;
  }
  const trimmed = id.trim().toLowerCase().replace(/^0x/, "").replace(/^0+(?=.)/, "");
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * macOS lists `/dev/tty.*` call-in devices; outgoing use wants the `/dev/cu.*` twin.
 */
export function toOutgoingPath(portPath: string, platform: NodeJS.Platform): string {
  if (platform === "darwin" && portPath.startsWith("/dev/tty.")) {
    return `/dev/cu.${portPath.slice("/dev/tty.".length)}`;
  }
  return portPath;
}

function matches(port: SerialPortInfo, match: DeviceMatch): boolean {
  return (
    normalizeUsbId(port.vendorId) === normalizeUsbId(match.vendorId) &&
    normalizeUsbId(port.productId) === normalizeUsbId(match.productId)
  );
}

export async function locateDevice(lister: PortLister, options: LocateOptions): Promise<DeviceIdentity> {
  const platform = options.platform ?? process.platform;
  const ports = await lister.list();
  const candidates: string[] = [];
  for (const port of ports) {
    if (!matches(port, options.match)) {
      continue;
    }
    const outgoing = toOutgoingPath(port.path, platform);
    if (!candidates.includes(outgoing)) {
      candidates.push(outgoing);
    }
  }
  candidates.sort();

  if (options.path) {
    const wanted = toOutgoingPath(options.path, platform);
    if (!candidates.includes(wanted)) {
      throw new DeviceNotFoundError(
        options.match.vendorId,
        options.match.productId,
        ports.map((port) => port.path)
      );
    }
    return { ...options.match, path: wanted };
  }

  if (candidates.length === 0) {
    throw new DeviceNotFoundError(
      options.match.vendorId,
      options.match.productId,
      ports.map((port) => port.path)
    );
  }
  if (candidates.length > 1) {
    throw new AmbiguousDeviceError(candidates);
  }
  return { ...options.match, path: candidates[0] };
}
