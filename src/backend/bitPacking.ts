import { assert } from "../utils/errorHandling";
import { Bit, CodeTable, encodedBitLength } from "./codeTable";
import { CorruptPayloadError } from "./errors";
import { getNode, HuffmanTree } from "./huffmanTree";

export type PackedPayload = {
  payload: Uint8Array;
  // zero bits appended after the last code, 0..7
  padding: number;
};

// Writes bits MSB-first into a buffer whose size is known up front.
export class BitWriter {
  private readonly data: Uint8Array;
  private bitPos = 0;

  constructor(readonly totalBits: number) {
    this.data = new Uint8Array(Math.ceil(totalBits / 8));
  }

  writeBit(bit: Bit): void {
    assert(this.bitPos < this.totalBits, "BitWriter overflow");
    if (bit) {
      this.data[this.bitPos >>> 3] |= 0x80 >>> (this.bitPos & 7);
    }
    this.bitPos++;
  }

  writeBits(bits: readonly Bit[]): void {
    for (const bit of bits) {
      this.writeBit(bit);
    }
  }

  // unused trailing bits in the last byte are already zero.
  finish(): PackedPayload {
    assert(this.bitPos === this.totalBits, `expected ${this.totalBits} bits, wrote ${this.bitPos}`);
    return { payload: this.data, padding: this.data.length * 8 - this.totalBits };
  }
}

// Reads bits MSB-first, stopping at `bitLimit` instead of the end of the buffer.
export class BitReader {
  private bitPos = 0;

  constructor(
    private readonly data: Uint8Array,
    readonly bitLimit: number = data.length * 8,
  ) {
    assert(bitLimit >= 0 && bitLimit <= data.length * 8, `bit limit ${bitLimit} out of range`);
  }

  get remaining(): number {
    return this.bitLimit - this.bitPos;
  }

  get position(): number {
    return this.bitPos;
  }

  // undefined once the limit is reached.
  readBit(): Bit | undefined {
    if (this.bitPos >= this.bitLimit) return undefined;
    const byte = this.data[this.bitPos >>> 3];
    const bit = (byte >>> (7 - (this.bitPos & 7))) & 1;
    this.bitPos++;
    return bit === 1 ? 1 : 0;
  }
}

export function packBits(data: Uint8Array, codes: CodeTable): PackedPayload {
  const byCode = new Array<readonly Bit[] | undefined>(256);
  for (const [byte, code] of codes) {
    byCode[byte] = code;
  }

  const writer = new BitWriter(encodedBitLength(data, codes));
  for (let i = 0; i < data.length; i++) {
    const code = byCode[data[i]];
    assert(code !== undefined, `no code for byte ${data[i]}`);
    writer.writeBits(code);
  }
  return writer.finish();
}

export function unpackBits(payload: Uint8Array, padding: number, originalSize: number, tree: HuffmanTree): Uint8Array {
  const totalBits = payload.length * 8;
  if (padding < 0 || padding > 7 || padding > totalBits) {
    throw new CorruptPayloadError(`padding of ${padding} bits does not fit a ${payload.length}-byte payload`, 0);
  }

  const dataBits = totalBits - padding;
  // every byte costs at least one bit, so check before allocating the output
  if (originalSize > dataBits) {
    throw new CorruptPayloadError(`payload of ${dataBits} bits cannot hold ${originalSize} bytes`, 0);
  }

  const reader = new BitReader(payload, dataBits);
  const out = new Uint8Array(originalSize);
  const rootNode = getNode(tree, tree.root);

  if (rootNode.kind === "leaf") {
    // single-symbol stream: one placeholder 0 bit per byte.
    for (let i = 0; i < originalSize; i++) {
      const bit = reader.readBit();
      if (bit === undefined) {
        throw new CorruptPayloadError(`stream ended after ${i} of ${originalSize} bytes`, i);
      }
      if (bit !== 0) {
        throw new CorruptPayloadError(`unexpected 1 bit in single-symbol stream at byte ${i}`, i);
      }
      out[i] = rootNode.byte;
    }
  } else {
    let emitted = 0;
    let current = tree.root;
    while (emitted < originalSize) {
      const bit = reader.readBit();
      if (bit === undefined) {
        const where = current === tree.root ? "" : " in the middle of a code";
        throw new CorruptPayloadError(`stream ended${where} after ${emitted} of ${originalSize} bytes`, emitted);
      }
      const node = getNode(tree, current);
      assert(node.kind === "internal", "decoder walk is parked on a leaf");
      current = bit === 0 ? node.left : node.right;

      const next = getNode(tree, current);
      if (next.kind === "leaf") {
        out[emitted++] = next.byte;
        current = tree.root;
      }
    }
  }

  if (reader.remaining > 0) {
    throw new CorruptPayloadError(
      `${reader.remaining} data bits left over after decoding ${originalSize} bytes`,
      originalSize,
    );
  }
  return out;
}
