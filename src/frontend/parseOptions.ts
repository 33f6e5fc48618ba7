export interface CommandLineOptions {
  output?: string;
  logFile?: string;
}

export type CodecCommandOptions = {
  outputPath?: string;
  logFilePath: string | null;
};

export function parseCodecOptions(cmd?: CommandLineOptions | undefined): CodecCommandOptions {
  const options: CodecCommandOptions = {
    logFilePath: null,
  };
  const output = cmd?.output?.trim();
  if (output) {
    options.outputPath = output;
  }
  const logFile = cmd?.logFile?.trim();
  if (logFile) {
    options.logFilePath = logFile;
  }
  return options;
}
