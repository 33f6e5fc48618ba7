import { decompressFile } from "../backend/fileCodec";
import * as cons from "../utils/console";
import { errorMessage } from "../utils/errorHandling";
import { formatByteCount } from "../utils/utils";
import { CommandLineOptions, parseCodecOptions } from "./parseOptions";

export async function decompressCommand(compressedPath: string, options?: CommandLineOptions): Promise<void> {
  const { outputPath, logFilePath } = parseCodecOptions(options);
  cons.setLogFile(logFilePath);

  cons.info("Decompressing...");
  const startTime = Date.now();
  try {
    const result = await decompressFile(compressedPath, outputPath);

    cons.success(`Decompression successful in ${Date.now() - startTime}ms.`);
    cons.info(`  Compressed file  : ${result.compressedFile}`);
    cons.info(`  Decompressed file: ${result.decompressedFile}`);
    cons.info(`  Original size    : ${formatByteCount(result.originalSize)}`);
    cons.info(`  Decompressed size: ${formatByteCount(result.decompressedSize)}`);
  } catch (e) {
    cons.error(`Error during decompression: ${errorMessage(e)}`);
    process.exitCode = 1;
  }
}
