import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { FileRecordStore } from "../src/io/fileRecordStore.js";

const dir = mkdtempSync(join(tmpdir(), "tagcase-store-"));

describe("FileRecordStore", () => {
  it("reads non-empty lines", async () => {
    const path = join(dir, "Current");
    writeFileSync(path, "11=A\x0135=8\r\n\n11=B\x0135=8\n");

    await expect(new FileRecordStore(path).readLines()).resolves.toEqual(["11=A\x0135=8", "11=B\x0135=8"]);
  });

  it("reads a missing file as empty", async () => {
    await expect(new FileRecordStore(join(dir, "absent")).readLines()).resolves.toEqual([]);
  });
});
