import { EmptyInputError } from "./errors";

// byte value (0..255) -> occurrence count. Only bytes that occur are present,
// and entries are in ascending byte order.
export type FrequencyTable = ReadonlyMap<number, number>;

export function buildFrequencyTable(data: Uint8Array): FrequencyTable {
  if (data.length === 0) {
    throw new EmptyInputError();
  }

  const counts = new Array<number>(256).fill(0);
  for (let i = 0; i < data.length; i++) {
    counts[data[i]]++;
  }

  const table = new Map<number, number>();
  for (let byte = 0; byte < 256; byte++) {
    if (counts[byte] > 0) {
      table.set(byte, counts[byte]);
    }
  }
  return table;
}
