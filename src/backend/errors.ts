export type CodecStage = "analyze" | "unpack" | "container";

// Base for every failure the codec reports to callers.
export class HuffpackError extends Error {
  constructor(
    message: string,
    public readonly stage: CodecStage,
  ) {
    super(message);
    this.name = "HuffpackError";
  }
}

export class EmptyInputError extends HuffpackError {
  constructor(message: string = "Input is empty; nothing to compress") {
    super(message, "analyze");
    this.name = "EmptyInputError";
  }
}

export class InvalidFormatError extends HuffpackError {
  constructor(message: string) {
    super(`Invalid container: ${message}`, "container");
    this.name = "InvalidFormatError";
  }
}

export class CorruptPayloadError extends HuffpackError {
  constructor(
    message: string,
    public readonly bytesDecoded: number,
  ) {
    super(`Corrupt payload: ${message}`, "unpack");
    this.name = "CorruptPayloadError";
  }
}
