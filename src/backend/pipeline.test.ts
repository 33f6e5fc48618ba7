import { decodeHexString } from "../utils/encoding/hex";
import { CorruptPayloadError, EmptyInputError, InvalidFormatError } from "./errors";
import { compress, computeStats, decompress, inspectContainer } from "./pipeline";

const bytesOf = (text: string) => Uint8Array.from(text, (c) => c.charCodeAt(0));

function pseudoRandomBytes(length: number, seed: number, range: number): Uint8Array {
  const out = new Uint8Array(length);
  let state = seed >>> 0;
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    out[i] = (state >>> 24) % range;
  }
  return out;
}

function allByteValues(): Uint8Array {
  const out = new Uint8Array(256 * 3);
  for (let i = 0; i < out.length; i++) out[i] = (i * 7) & 0xff;
  return out;
}

describe("compress", () => {
  it("produces the documented container for a small input", () => {
    const { container, stats } = compress(bytesOf("aaaabbbccd"), ".txt");
    expect(container).toEqual(
      decodeHexString(
        "48 55 46 50 01 04 00 2e 74 78 74 0a 00 00 00 05" + "00 01 61 00 01 62 00 01 64 01 63" + "0a bf c0",
      ),
    );
    expect(stats).toEqual({
      originalSize: 10,
      compressedSize: 30,
      compressionRatio: -200,
      spaceSaved: -20,
    });
  });

  it("packs the small input into fewer payload bytes than it had", () => {
    const summary = inspectContainer(compress(bytesOf("aaaabbbccd"), ".txt").container);
    expect(summary.payloadSize).toBe(3);
    expect(summary.payloadSize).toBeLessThan(10);
  });

  it("shrinks a run of one repeated byte", () => {
    const data = new Uint8Array(1000).fill(0x41);
    const { container, stats } = compress(data, "");
    // 12 header bytes + 2 tree bytes + 125 payload bytes
    expect(container.length).toBe(139);
    expect(stats.compressedSize).toBe(139);
    expect(stats.spaceSaved).toBe(861);
    expect(stats.compressionRatio).toBeCloseTo(86.1, 10);
  });

  it("is deterministic", () => {
    const data = pseudoRandomBytes(2000, 42, 40);
    expect(compress(data, ".bin").container).toEqual(compress(data, ".bin").container);
  });

  it("rejects empty input", () => {
    expect(() => compress(new Uint8Array(0), ".txt")).toThrow(EmptyInputError);
  });
});

describe("decompress", () => {
  it.each([
    ["small text", bytesOf("aaaabbbccd"), ".txt"],
    ["one byte", new Uint8Array([0x7f]), ""],
    ["repeated byte", new Uint8Array(1000).fill(0x41), ".dat"],
    ["two symbols", bytesOf("abababababbbbbbbbba"), ".ab"],
    ["every byte value", allByteValues(), ".bin"],
    ["random bytes", pseudoRandomBytes(5000, 7, 256), ".rnd"],
    ["skewed bytes", pseudoRandomBytes(5000, 9, 3), ".skw"],
    ["zeros and ones", new Uint8Array([0, 0, 0, 1, 0, 0, 1, 1, 0]), ".é"],
  ])("round-trips %s", (_name, data, extension) => {
    const result = decompress(compress(data, extension).container);
    expect(result.data).toEqual(data);
    expect(result.extension).toBe(extension);
  });

  it("restores 1000 copies of one byte exactly", () => {
    const { data } = decompress(compress(new Uint8Array(1000).fill(0x41), "").container);
    expect(data.length).toBe(1000);
    expect(data.every((b) => b === 0x41)).toBe(true);
  });

  it.each([
    ["small text", bytesOf("aaaabbbccd")],
    ["repeated byte", new Uint8Array(1000).fill(0x41)],
    ["random bytes", pseudoRandomBytes(3000, 11, 256)],
  ])("detects a payload truncated by one byte (%s)", (_name, data) => {
    const { container } = compress(data, ".x");
    expect(() => decompress(container.slice(0, container.length - 1))).toThrow(CorruptPayloadError);
  });

  it("rejects a header claiming more bytes than the payload can hold", () => {
    // single leaf 0x41, 200,000,000 bytes claimed, no payload
    const container = decodeHexString("48 55 46 50 01 00 00 00 c2 eb 0b 00 01 41");
    expect(() => decompress(container)).toThrow(CorruptPayloadError);
    expect(() => decompress(container)).toThrow("Corrupt payload: payload of 0 bits cannot hold 200000000 bytes");
  });

  it("detects bytes appended to the payload", () => {
    const { container } = compress(bytesOf("aaaabbbccd"), ".txt");
    const extended = new Uint8Array(container.length + 1);
    extended.set(container);
    extended[container.length] = 0x55;
    expect(() => decompress(extended)).toThrow(CorruptPayloadError);
  });

  it("rejects bytes that are not a container", () => {
    expect(() => decompress(bytesOf("just some text"))).toThrow(InvalidFormatError);
  });
});

describe("inspectContainer", () => {
  it("summarizes header and codes without decoding", () => {
    const summary = inspectContainer(compress(bytesOf("aaaabbbccd"), ".txt").container);
    expect(summary).toEqual({
      version: 1,
      extension: ".txt",
      originalSize: 10,
      padding: 5,
      payloadSize: 3,
      containerSize: 30,
      leafCount: 4,
      codes: [
        { byte: 0x61, code: [0] },
        { byte: 0x62, code: [1, 0] },
        { byte: 0x63, code: [1, 1, 1] },
        { byte: 0x64, code: [1, 1, 0] },
      ],
    });
  });
});

describe("computeStats", () => {
  it("reports the saving as a percentage of the original", () => {
    expect(computeStats(200, 50)).toEqual({
      originalSize: 200,
      compressedSize: 50,
      compressionRatio: 75,
      spaceSaved: 150,
    });
  });
});
