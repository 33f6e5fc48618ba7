import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileExists, readBinaryFileAsync, writeBinaryFile } from "./fileSystem";

describe("fileSystem", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "huffpack-fs-"));

  it("reports existing and missing files", () => {
    const existing = path.join(dir, "present.bin");
    fs.writeFileSync(existing, "x");
    expect(fileExists(existing)).toBe(true);
    expect(fileExists(path.join(dir, "absent.bin"))).toBe(false);
    expect(fileExists("")).toBe(false);
  });

  it("writes into missing directories and reads the bytes back", async () => {
    const target = path.join(dir, "a", "b", "data.bin");
    await writeBinaryFile(target, new Uint8Array([1, 2, 250]));
    expect([...(await readBinaryFileAsync(target))]).toEqual([1, 2, 250]);
  });
});
