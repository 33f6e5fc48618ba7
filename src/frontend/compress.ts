import { compressFile } from "../backend/fileCodec";
import * as cons from "../utils/console";
import { errorMessage } from "../utils/errorHandling";
import { formatByteCount, formatPercent } from "../utils/utils";
import { CommandLineOptions, parseCodecOptions } from "./parseOptions";

export async function compressCommand(inputPath: string, options?: CommandLineOptions): Promise<void> {
  const { outputPath, logFilePath } = parseCodecOptions(options);
  cons.setLogFile(logFilePath);

  cons.info("Compressing...");
  const startTime = Date.now();
  try {
    const result = await compressFile(inputPath, outputPath);

    cons.success(`Compression successful in ${Date.now() - startTime}ms.`);
    cons.info(`  Original file    : ${result.originalFile}`);
    cons.info(`  Compressed file  : ${result.compressedFile}`);
    cons.info(`  Original size    : ${formatByteCount(result.originalSize)}`);
    cons.info(`  Compressed size  : ${formatByteCount(result.compressedSize)}`);
    cons.info(`  Space saved      : ${formatByteCount(result.spaceSaved)}`);
    cons.bold(`  Compression ratio: ${formatPercent(result.compressionRatio)}`);
    if (result.spaceSaved < 0) {
      cons.warning("Compressed output is larger than the input.");
    }
  } catch (e) {
    cons.error(`Error during compression: ${errorMessage(e)}`);
    process.exitCode = 1;
  }
}
