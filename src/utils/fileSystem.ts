import * as fs from "fs";
import * as path from "path";

export function fileExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

export async function readBinaryFileAsync(filePath: string): Promise<Uint8Array> {
  const data = await fs.promises.readFile(filePath);
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

// Writes the file, creating its parent directory when needed.
export async function writeBinaryFile(filePath: string, data: Uint8Array): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, data);
}
