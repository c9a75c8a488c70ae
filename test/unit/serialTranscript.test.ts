import { mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { createSerialTranscript, renderTraffic } from "../../src/logging/serialTranscript";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = mkdtempSync(path.join(os.tmpdir(), "rawrepl-transcript-test-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe("renderTraffic", () => {
  it("keeps printable text and line breaks", () => {
    expect(renderTraffic(Buffer.from("OK\r\n>"))).toBe("OK\r\n>");
  });

  it("shows control and high bytes as hex", () => {
    expect(renderTraffic(Buffer.from([0x0d, 0x01, 0x04, 0xff, 0x41]))).toBe("\r<0x01><0x04><0xff>A");
  });
});

describe("createSerialTranscript", () => {
  it("does nothing when disabled", () => {
    const dir = makeTempDir();
    const transcript = createSerialTranscript(dir, "/dev/ttyUSB0", false);
    transcript.tx(Buffer.from([0x03]));
    transcript.close();
    expect(readdirSync(dir)).toEqual([]);
  });

  it("records both directions with markers", () => {
    const dir = makeTempDir();
    const transcript = createSerialTranscript(dir, "/dev/ttyUSB0", true);
    transcript.tx(Buffer.from([0x03]));
    transcript.tx(Buffer.from([0x03]));
    transcript.rx(Buffer.from(">>> "));
    transcript.tx(Buffer.from("a"));
    transcript.close();

    const files = readdirSync(dir);
    expect(files).toHaveLength(1);
    expect(files[0].startsWith("transcript__dev_ttyUSB0_")).toBe(true);
    const lines = readFileSync(path.join(dir, files[0]), "utf8").split("\n");
    expect(lines[0]).toMatch(/^--- Transcript started .+ ---$/);
    expect(lines.slice(1, 4)).toEqual(["[tx] <0x03><0x03>", "[rx] >>> ", "[tx] a"]);
    expect(lines[4]).toMatch(/^--- Transcript ended .+ ---$/);
  });
});
