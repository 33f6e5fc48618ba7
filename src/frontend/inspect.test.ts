import { ContainerSummary } from "../backend/pipeline";
import { describeByte, formatSummary } from "./inspect";

describe("inspect formatting", () => {
  it("shows printable bytes as characters", () => {
    expect(describeByte(0x61)).toBe("'a' 0x61");
    expect(describeByte(0x7e)).toBe("'~' 0x7e");
  });

  it("shows other bytes as hex only", () => {
    expect(describeByte(0x0a)).toBe("    0x0a");
    expect(describeByte(0x20)).toBe("    0x20");
    expect(describeByte(0xff)).toBe("    0xff");
  });

  it("lists the header fields and every code", () => {
    const summary: ContainerSummary = {
      version: 1,
      extension: ".txt",
      originalSize: 10,
      padding: 5,
      payloadSize: 3,
      containerSize: 30,
      leafCount: 4,
      codes: [
        { byte: 0x61, code: [0] },
        { byte: 0x62, code: [1, 0] },
        { byte: 0x63, code: [1, 1, 1] },
        { byte: 0x64, code: [1, 1, 0] },
      ],
    };

    expect(formatSummary(summary)).toEqual([
      "Marker          : 48 55 46 50",
      "Format version  : 1",
      "Extension       : .txt",
      "Original size   : 10 bytes",
      "Container size  : 30 bytes",
      "Payload size    : 3 bytes",
      "Padding bits    : 5",
      "Distinct bytes  : 4",
      "Codes:",
      "  'a' 0x61  0",
      "  'b' 0x62  10",
      "  'c' 0x63  111",
      "  'd' 0x64  110",
    ]);
  });

  it("marks a missing extension", () => {
    const lines = formatSummary({
      version: 1,
      extension: "",
      originalSize: 1000,
      padding: 0,
      payloadSize: 125,
      containerSize: 139,
      leafCount: 1,
      codes: [{ byte: 0x41, code: [0] }],
    });
    expect(lines[2]).toBe("Extension       : (none)");
    expect(lines[3]).toBe("Original size   : 1,000 bytes");
    expect(lines[9]).toBe("  'A' 0x41  0");
  });
});
