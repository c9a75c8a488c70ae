import { describe, expect, it } from "vitest";
import { VerificationFailedError } from "../../src/core/errors";
import type { VerificationSpec } from "../../src/models/config";
import { RawReplController } from "../../src/services/repl/rawReplController";
import {
  buildReadBackStatement,
  compareEntry,
  parseReadBack,
  verifyDevice
} from "../../src/services/verify/verificationDriver";
import { FakeReplDevice } from "../fixtures/fakeReplDevice";
import { FAST_TIMING } from "../fixtures/testConfig";

const expectations: VerificationSpec = {
  entries: [
    { namespace: "game", key: "A", expected: 1 },
    { namespace: "game", key: "B", expected: 2 }
  ]
};

async function verify(device: FakeReplDevice, verification: VerificationSpec): Promise<unknown> {
  const controller = new RawReplController(device.connect(), FAST_TIMING);
  return verifyDevice(controller, verification).catch((reason: unknown) => reason);
}

describe("buildReadBackStatement", () => {
  it("reads integers with get_i32", () => {
    expect(buildReadBackStatement({ namespace: "game", key: "A", expected: 1 })).toBe(
      [
        "import esp32",
        "try:",
        "    print('VAL:' + str(esp32.NVS('game').get_i32('A')))",
        "except OSError:",
        "    print('MISSING')"
      ].join("\n")
    );
  });

  it("reads strings as base64-encoded blobs", () => {
    expect(buildReadBackStatement({ namespace: "game", key: "name", expected: "hero" })).toBe(
      [
        "import esp32, ubinascii",
        "try:",
        "    _b = bytearray(512)",
        "    _n = esp32.NVS('game').get_blob('name', _b)",
        "    print('B64:' + ubinascii.b2a_base64(_b[:_n]).decode().strip())",
        "except OSError:",
        "    print('MISSING')"
      ].join("\n")
    );
  });
});

describe("parseReadBack and compareEntry", () => {
  it("parses the printed marker lines", () => {
    expect(parseReadBack("VAL:42\n")).toEqual({ kind: "text", text: "42" });
    expect(parseReadBack("B64:aGVybw==\n")).toEqual({ kind: "text", text: "hero" });
    expect(parseReadBack("B64://4=\n")).toEqual({ kind: "bytes", bytes: Buffer.from([0xff, 0xfe]) });
    expect(parseReadBack("MISSING\n")).toEqual({ kind: "missing" });
    expect(parseReadBack("")).toEqual({ kind: "missing" });
  });

  it("compares numbers numerically and strings exactly", () => {
    const level = { namespace: "game", key: "level", expected: 5 };
    expect(compareEntry(level, { kind: "text", text: " 5" })).toBeUndefined();
    expect(compareEntry(level, { kind: "text", text: "6" })).toEqual({ target: "game/level", expected: 5, actual: 6 });
    expect(compareEntry(level, { kind: "text", text: "five" })).toEqual({
      target: "game/level",
      expected: 5,
      actual: "five"
    });
    expect(compareEntry(level, { kind: "missing" })).toEqual({ target: "game/level", expected: 5, actual: null });
    expect(compareEntry({ namespace: "game", key: "name", expected: "hero" }, { kind: "text", text: "Hero" })).toEqual({
      target: "game/name",
      expected: "hero",
      actual: "Hero"
    });
  });

  it("reports undecodable bytes as hex", () => {
    const name = { namespace: "game", key: "name", expected: "hero" };
    expect(compareEntry(name, { kind: "bytes", bytes: Buffer.from([0xff, 0xfe]) })).toEqual({
      target: "game/name",
      expected: "hero",
      actual: "hex:fffe"
    });
  });
});

describe("verifyDevice", () => {
  it("passes and leaves raw mode when every value matches", async () => {
    const device = new FakeReplDevice();
    device.setNvs("game", "A", 1);
    device.setNvs("game", "B", 2);
    expect(await verify(device, expectations)).toBeUndefined();
    expect(device.mode).toBe("friendly");
  });

  it("names only the key that differs", async () => {
    const device = new FakeReplDevice();
    device.setNvs("game", "A", 1);
    device.setNvs("game", "B", 3);
    const error = await verify(device, expectations);
    expect(error).toBeInstanceOf(VerificationFailedError);
    if (error instanceof VerificationFailedError) {
      expect(error.mismatches).toEqual([{ target: "game/B", expected: 2, actual: 3 }]);
      expect(error.message).toBe("Verification failed for 1 value(s):\n  game/B: expected 2, got 3");
    }
  });

  it("reports every mismatch before failing", async () => {
    const device = new FakeReplDevice();
    device.setNvs("game", "A", 9);
    device.setNvs("game", "B", 3);
    const error = await verify(device, expectations);
    expect(error).toBeInstanceOf(VerificationFailedError);
    if (error instanceof VerificationFailedError) {
      expect(error.mismatches.map((item) => item.target)).toEqual(["game/A", "game/B"]);
    }
  });

  it("treats an absent key as a mismatch with a null value", async () => {
    const device = new FakeReplDevice();
    device.setNvs("game", "A", 1);
    const error = await verify(device, expectations);
    expect(error).toBeInstanceOf(VerificationFailedError);
    if (error instanceof VerificationFailedError) {
      expect(error.mismatches).toEqual([{ target: "game/B", expected: 2, actual: null }]);
    }
  });

  it("matches string values exactly", async () => {
    const device = new FakeReplDevice();
    device.setNvs("profile", "name", "hero");
    expect(
      await verify(device, { entries: [{ namespace: "profile", key: "name", expected: "hero" }] })
    ).toBeUndefined();
  });

  it("matches string values that span several lines", async () => {
    const device = new FakeReplDevice();
    device.setNvs("profile", "motd", "line one\nVAL:7\nline three");
    expect(
      await verify(device, { entries: [{ namespace: "profile", key: "motd", expected: "line one\nVAL:7\nline three" }] })
    ).toBeUndefined();
  });

  it("lists a wrong number and a non-UTF-8 blob together", async () => {
    const device = new FakeReplDevice();
    device.setNvs("game", "A", 1);
    device.setNvs("game", "B", 3);
    device.setNvs("profile", "name", Buffer.from([0xff, 0xfe]));
    const error = await verify(device, {
      entries: [...expectations.entries, { namespace: "profile", key: "name", expected: "hero" }]
    });
    expect(error).toBeInstanceOf(VerificationFailedError);
    if (error instanceof VerificationFailedError) {
      expect(error.mismatches).toEqual([
        { target: "game/B", expected: 2, actual: 3 },
        { target: "profile/name", expected: "hero", actual: "hex:fffe" }
      ]);
    }
    expect(device.mode).toBe("raw");
  });

  it("records a device error on one key and keeps checking the rest", async () => {
    const device = new FakeReplDevice({ failOn: /get_i32\('A'\)/ });
    device.setNvs("game", "A", 1);
    device.setNvs("game", "B", 3);
    const error = await verify(device, expectations);
    expect(error).toBeInstanceOf(VerificationFailedError);
    if (error instanceof VerificationFailedError) {
      expect(error.mismatches).toEqual([
        { target: "game/A", expected: 1, actual: "error: OSError: [Errno 5] EIO" },
        { target: "game/B", expected: 2, actual: 3 }
      ]);
    }
  });

  it("rejects a log file that matches the failure pattern", async () => {
    const device = new FakeReplDevice();
    device.files.set("/patch.log", Buffer.from("stats patched\nERROR: bad key\n"));
    const error = await verify(device, {
      entries: [],
      fileChecks: [{ path: "/patch.log", rejectPattern: "error" }]
    });
    expect(error).toBeInstanceOf(VerificationFailedError);
    if (error instanceof VerificationFailedError) {
      expect(error.mismatches).toEqual([
        { target: "/patch.log", expected: "no match for /error/i", actual: "ERROR" }
      ]);
    }
  });

  it("accepts a clean log file and flags a missing one", async () => {
    const device = new FakeReplDevice();
    device.files.set("/patch.log", Buffer.from("stats patched\n"));
    const error = await verify(device, {
      entries: [],
      fileChecks: [
        { path: "/patch.log", rejectPattern: "error" },
        { path: "/other.log", rejectPattern: "error" }
      ]
    });
    expect(error).toBeInstanceOf(VerificationFailedError);
    if (error instanceof VerificationFailedError) {
      expect(error.mismatches).toEqual([
        { target: "/other.log", expected: "no match for /error/i", actual: null }
      ]);
    }
  });
});
