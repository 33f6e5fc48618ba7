import { packBits, unpackBits } from "./bitPacking";
import { Bit, buildCodeTable } from "./codeTable";
import { Container, deserializeContainer, kFormatVersion, serializeContainer } from "./container";
import { buildFrequencyTable } from "./frequencyTable";
import { buildHuffmanTree, countLeaves } from "./huffmanTree";

export type CompressionStats = {
  originalSize: number;
  // container byte length, header included
  compressedSize: number;
  // percent; negative when the container is larger than the input
  compressionRatio: number;
  spaceSaved: number;
};

export type CompressResult = {
  container: Uint8Array;
  stats: CompressionStats;
};

export type DecompressResult = {
  data: Uint8Array;
  extension: string;
};

export type ContainerSummary = {
  version: number;
  extension: string;
  originalSize: number;
  padding: number;
  payloadSize: number;
  containerSize: number;
  leafCount: number;
  // ascending by byte value
  codes: { byte: number; code: readonly Bit[] }[];
};

export function computeStats(originalSize: number, compressedSize: number): CompressionStats {
  return {
    originalSize,
    compressedSize,
    compressionRatio: (1 - compressedSize / originalSize) * 100,
    spaceSaved: originalSize - compressedSize,
  };
}

export function compress(data: Uint8Array, extension: string = ""): CompressResult {
  const frequencies = buildFrequencyTable(data);
  const tree = buildHuffmanTree(frequencies);
  const codes = buildCodeTable(tree);
  const { payload, padding } = packBits(data, codes);

  const container: Container = {
    version: kFormatVersion,
    extension,
    originalSize: data.length,
    padding,
    tree,
    payload,
  };
  const bytes = serializeContainer(container);
  return { container: bytes, stats: computeStats(data.length, bytes.length) };
}

export function decompress(containerBytes: Uint8Array): DecompressResult {
  const container = deserializeContainer(containerBytes);
  const data = unpackBits(container.payload, container.padding, container.originalSize, container.tree);
  return { data, extension: container.extension };
}

// Reads the header and tree without decoding the payload.
export function inspectContainer(containerBytes: Uint8Array): ContainerSummary {
  const container = deserializeContainer(containerBytes);
  const codes = [...buildCodeTable(container.tree)]
    .map(([byte, code]) => ({ byte, code }))
    .sort((a, b) => a.byte - b.byte);

  return {
    version: container.version,
    extension: container.extension,
    originalSize: container.originalSize,
    padding: container.padding,
    payloadSize: container.payload.length,
    containerSize: containerBytes.length,
    leafCount: countLeaves(container.tree),
    codes,
  };
}
