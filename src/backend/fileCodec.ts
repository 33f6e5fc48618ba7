import * as path from "node:path";
import { fileExists, readBinaryFileAsync, writeBinaryFile } from "../utils/fileSystem";
import { compress, CompressionStats, decompress } from "./pipeline";

const kCompressedSuffix = "_compressed";
const kDecompressedSuffix = "_decompressed";

export type CompressFileResult = CompressionStats & {
  originalFile: string;
  compressedFile: string;
};

export type DecompressFileResult = {
  compressedFile: string;
  decompressedFile: string;
  originalSize: number;
  decompressedSize: number;
};

// "dir/report.txt" => "dir/report_compressed.txt"
export function defaultCompressedPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}${kCompressedSuffix}${parsed.ext}`);
}

// "dir/report_compressed.txt" => "dir/report_decompressed.txt"
// The extension recorded in the container wins over the compressed file's own.
export function defaultDecompressedPath(compressedPath: string, storedExtension: string): string {
  const parsed = path.parse(compressedPath);
  let stem = parsed.name;
  if (stem.endsWith(kCompressedSuffix)) {
    stem = stem.substring(0, stem.length - kCompressedSuffix.length);
  }
  const ext = storedExtension.length > 0 ? storedExtension : parsed.ext;
  return path.join(parsed.dir, `${stem}${kDecompressedSuffix}${ext}`);
}

export async function compressFile(inputPath: string, outputPath?: string): Promise<CompressFileResult> {
  if (!fileExists(inputPath)) {
    throw new Error(`Input file ${inputPath} not found`);
  }

  const data = await readBinaryFileAsync(inputPath);
  const { container, stats } = compress(data, path.extname(inputPath));

  const compressedFile = outputPath ?? defaultCompressedPath(inputPath);
  await writeBinaryFile(compressedFile, container);

  return { originalFile: inputPath, compressedFile, ...stats };
}

export async function decompressFile(compressedPath: string, outputPath?: string): Promise<DecompressFileResult> {
  if (!fileExists(compressedPath)) {
    throw new Error(`Compressed file ${compressedPath} not found`);
  }

  const containerBytes = await readBinaryFileAsync(compressedPath);
  const { data, extension } = decompress(containerBytes);

  const decompressedFile = outputPath ?? defaultDecompressedPath(compressedPath, extension);
  await writeBinaryFile(decompressedFile, data);

  return {
    compressedFile: compressedPath,
    decompressedFile,
    originalSize: data.length,
    decompressedSize: data.length,
  };
}
