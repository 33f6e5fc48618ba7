import { EmptyInputError } from "./errors";
import { buildFrequencyTable } from "./frequencyTable";

const bytesOf = (text: string) => Uint8Array.from(text, (c) => c.charCodeAt(0));

describe("buildFrequencyTable", () => {
  it("counts each byte value", () => {
    const table = buildFrequencyTable(bytesOf("aaaabbbccd"));
    expect([...table.entries()]).toEqual([
      [0x61, 4],
      [0x62, 3],
      [0x63, 2],
      [0x64, 1],
    ]);
  });

  it("lists bytes in ascending order regardless of input order", () => {
    const table = buildFrequencyTable(new Uint8Array([0xff, 0x00, 0x80, 0x00]));
    expect([...table.keys()]).toEqual([0x00, 0x80, 0xff]);
    expect(table.get(0x00)).toBe(2);
  });

  it("omits bytes that never occur", () => {
    const table = buildFrequencyTable(new Uint8Array([7]));
    expect(table.size).toBe(1);
    expect(table.has(0)).toBe(false);
  });

  it("handles every byte value", () => {
    const data = new Uint8Array(512);
    for (let i = 0; i < data.length; i++) data[i] = i & 0xff;
    const table = buildFrequencyTable(data);
    expect(table.size).toBe(256);
    expect([...table.values()].every((count) => count === 2)).toBe(true);
    expect(table.get(255)).toBe(2);
  });

  it("rejects empty input", () => {
    expect(() => buildFrequencyTable(new Uint8Array(0))).toThrow(EmptyInputError);
  });

  it("reports the analyze stage on empty input", () => {
    try {
      buildFrequencyTable(new Uint8Array(0));
      throw new Error("expected a throw");
    } catch (e) {
      expect(e).toBeInstanceOf(EmptyInputError);
      if (e instanceof EmptyInputError) {
        expect(e.stage).toBe("analyze");
        expect(e.name).toBe("EmptyInputError");
      }
    }
  });
});
