import { readFile } from "node:fs/promises";
import type { RecordStore } from "../engine/correlation.js";

/** Reads the counterparty's log file; a file that does not exist yet reads as empty. */
export class FileRecordStore implements RecordStore {
  constructor(private readonly path: string) {}

  async readLines(): Promise<string[]> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }
    return text.split(/\r?\n/).filter((line) => line.length > 0);
  }
}
