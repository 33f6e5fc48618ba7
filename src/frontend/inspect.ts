import { codeToString } from "../backend/codeTable";
import { kFormatMarker } from "../backend/container";
import { ContainerSummary, inspectContainer } from "../backend/pipeline";
import * as cons from "../utils/console";
import { encodeHexString } from "../utils/encoding/hex";
import { errorMessage } from "../utils/errorHandling";
import { fileExists, readBinaryFileAsync } from "../utils/fileSystem";
import { formatByteCount } from "../utils/utils";
import { CommandLineOptions, parseCodecOptions } from "./parseOptions";

// printable ASCII shows as itself, everything else as hex.
export function describeByte(byte: number): string {
  const hex = `0x${byte.toString(16).padStart(2, "0")}`;
  if (byte >= 0x21 && byte <= 0x7e) {
    return `'${String.fromCharCode(byte)}' ${hex}`;
  }
  return `    ${hex}`;
}

export function formatSummary(summary: ContainerSummary): string[] {
  const lines = [
    `Marker          : ${encodeHexString(kFormatMarker)}`,
    `Format version  : ${summary.version}`,
    `Extension       : ${summary.extension.length > 0 ? summary.extension : "(none)"}`,
    `Original size   : ${formatByteCount(summary.originalSize)}`,
    `Container size  : ${formatByteCount(summary.containerSize)}`,
    `Payload size    : ${formatByteCount(summary.payloadSize)}`,
    `Padding bits    : ${summary.padding}`,
    `Distinct bytes  : ${summary.leafCount}`,
    `Codes:`,
  ];
  for (const { byte, code } of summary.codes) {
    lines.push(`  ${describeByte(byte)}  ${codeToString(code)}`);
  }
  return lines;
}

export async function inspectCommand(containerPath: string, options?: CommandLineOptions): Promise<void> {
  const { logFilePath } = parseCodecOptions(options);
  cons.setLogFile(logFilePath);

  try {
    if (!fileExists(containerPath)) {
      throw new Error(`Compressed file ${containerPath} not found`);
    }
    const summary = inspectContainer(await readBinaryFileAsync(containerPath));
    cons.h1(`Container: ${containerPath}`);
    for (const line of formatSummary(summary)) {
      cons.info(`  ${line}`);
    }
  } catch (e) {
    cons.error(`Error during inspection: ${errorMessage(e)}`);
    process.exitCode = 1;
  }
}
