// utilities for dealing with binary data / parsing / etc

export function readUint16LE(data: Uint8Array, offset: number): number {
  return data[offset] | (data[offset + 1] << 8);
}

export function readUint32LE(data: Uint8Array, offset: number): number {
  // >>> 0 keeps the top byte from going negative
  return (data[offset] | (data[offset + 1] << 8) | (data[offset + 2] << 16) | (data[offset + 3] << 24)) >>> 0;
}

export function pushUint16LE(out: number[], value: number): void {
  out.push(value & 0xff, (value >>> 8) & 0xff);
}

export function pushUint32LE(out: number[], value: number): void {
  out.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff);
}
