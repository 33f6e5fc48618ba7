import { pushUint16LE, pushUint32LE, readUint16LE, readUint32LE } from "../utils/bin";
import { InvalidFormatError } from "./errors";
import { getNode, HuffmanNode, HuffmanTree } from "./huffmanTree";

/*

Container layout, integers little-endian:

  offset  size  field
  0       4     marker "HUFP"
  4       1     format version
  5       2     extension length (u16)
  7       n     extension, UTF-8
  7+n     4     original byte count (u32)
  11+n    1     padding bit count (0..7)
  12+n    t     tree, pre-order:
                  internal := 0x00 <left> <right>
                  leaf     := 0x01 <byte>
  12+n+t  ...   packed payload to end of buffer

*/

export const kFormatMarker = new Uint8Array([0x48, 0x55, 0x46, 0x50]); // "HUFP"
export const kFormatVersion = 1;

export const kTreeTagInternal = 0x00;
export const kTreeTagLeaf = 0x01;

const kMaxExtensionBytes = 0xffff;
const kMaxOriginalSize = 0xffffffff;
const kMaxLeaves = 256;
// a full binary tree with 256 leaves is at most 255 levels deep
const kMaxTreeDepth = kMaxLeaves - 1;

// marker + version + extension length + original size + padding
export const kFixedHeaderSize = kFormatMarker.length + 1 + 2 + 4 + 1;

export type Container = {
  version: number;
  extension: string;
  originalSize: number;
  padding: number;
  tree: HuffmanTree;
  payload: Uint8Array;
};

function serializeTree(tree: HuffmanTree, out: number[]): void {
  const visit = (index: number): void => {
    const node = getNode(tree, index);
    if (node.kind === "leaf") {
      out.push(kTreeTagLeaf, node.byte);
      return;
    }
    out.push(kTreeTagInternal);
    visit(node.left);
    visit(node.right);
  };
  visit(tree.root);
}

export function serializeContainer(container: Container): Uint8Array {
  const extensionBytes = new TextEncoder().encode(container.extension);
  if (extensionBytes.length > kMaxExtensionBytes) {
    throw new RangeError(`Extension is ${extensionBytes.length} bytes; the limit is ${kMaxExtensionBytes}`);
  }
  if (!Number.isInteger(container.originalSize) || container.originalSize < 0 || container.originalSize > kMaxOriginalSize) {
    throw new RangeError(`Original size ${container.originalSize} does not fit in 32 bits`);
  }
  if (!Number.isInteger(container.padding) || container.padding < 0 || container.padding > 7) {
    throw new RangeError(`Padding must be 0..7, got ${container.padding}`);
  }

  const header: number[] = [...kFormatMarker, container.version];
  pushUint16LE(header, extensionBytes.length);
  header.push(...extensionBytes);
  pushUint32LE(header, container.originalSize);
  header.push(container.padding);
  serializeTree(container.tree, header);

  const out = new Uint8Array(header.length + container.payload.length);
  out.set(header, 0);
  out.set(container.payload, header.length);
  return out;
}

// Rebuilds the tree from its pre-order encoding. Children are appended before
// their parent, same as a freshly built tree. Weights are not stored and
// come back as 0.
function deserializeTree(data: Uint8Array, start: number): { tree: HuffmanTree; next: number } {
  const nodes: HuffmanNode[] = [];
  const seenBytes = new Set<number>();
  let pos = start;

  const parseNode = (depth: number): number => {
    if (depth > kMaxTreeDepth) {
      throw new InvalidFormatError(`tree is deeper than ${kMaxTreeDepth} levels`);
    }
    if (pos >= data.length) {
      throw new InvalidFormatError(`tree is truncated at offset ${pos}`);
    }

    const tag = data[pos++];
    if (tag === kTreeTagLeaf) {
      if (pos >= data.length) {
        throw new InvalidFormatError(`leaf at offset ${pos - 1} has no byte value`);
      }
      const byte = data[pos++];
      if (seenBytes.has(byte)) {
        throw new InvalidFormatError(`byte 0x${byte.toString(16).padStart(2, "0")} appears in two leaves`);
      }
      if (seenBytes.size >= kMaxLeaves) {
        throw new InvalidFormatError(`tree has more than ${kMaxLeaves} leaves`);
      }
      seenBytes.add(byte);
      nodes.push({ kind: "leaf", byte, weight: 0 });
      return nodes.length - 1;
    }

    if (tag === kTreeTagInternal) {
      const left = parseNode(depth + 1);
      const right = parseNode(depth + 1);
      nodes.push({ kind: "internal", weight: 0, left, right });
      return nodes.length - 1;
    }

    throw new InvalidFormatError(`unknown tree tag 0x${tag.toString(16).padStart(2, "0")} at offset ${pos - 1}`);
  };

  const root = parseNode(0);
  return { tree: { nodes, root }, next: pos };
}

function hasMarker(data: Uint8Array): boolean {
  if (data.length < kFormatMarker.length) return false;
  for (let i = 0; i < kFormatMarker.length; i++) {
    if (data[i] !== kFormatMarker[i]) return false;
  }
  return true;
}

export function deserializeContainer(data: Uint8Array): Container {
  if (!hasMarker(data)) {
    throw new InvalidFormatError("format marker is missing; this is not a huffpack container");
  }
  if (data.length < kFixedHeaderSize) {
    throw new InvalidFormatError(`header needs at least ${kFixedHeaderSize} bytes, got ${data.length}`);
  }

  let pos = kFormatMarker.length;
  const version = data[pos++];
  if (version !== kFormatVersion) {
    throw new InvalidFormatError(`unsupported format version ${version} (expected ${kFormatVersion})`);
  }

  const extensionLength = readUint16LE(data, pos);
  pos += 2;
  // the extension is followed by 4 bytes of size and 1 byte of padding
  if (pos + extensionLength + 5 > data.length) {
    throw new InvalidFormatError(`extension of ${extensionLength} bytes runs past the end of the header`);
  }
  let extension: string;
  try {
    extension = new TextDecoder("utf-8", { fatal: true }).decode(data.subarray(pos, pos + extensionLength));
  } catch {
    throw new InvalidFormatError("extension is not valid UTF-8");
  }
  pos += extensionLength;

  const originalSize = readUint32LE(data, pos);
  pos += 4;

  const padding = data[pos++];
  if (padding > 7) {
    throw new InvalidFormatError(`padding count ${padding} is out of range 0..7`);
  }

  const { tree, next } = deserializeTree(data, pos);
  const payload = data.slice(next);

  return { version, extension, originalSize, padding, tree, payload };
}
