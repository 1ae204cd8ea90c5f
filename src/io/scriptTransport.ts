import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { SubmitResult, Transport } from "../engine/correlation.js";
import { errorMessage } from "../engine/errors.js";
import type { ComponentLogger } from "../logger.js";

const execFileAsync = promisify(execFile);

export interface ScriptTransportOptions {
  timeoutMs?: number;
  logger?: ComponentLogger;
}

/** Runs `command <message>`; exit code 0 means the counterparty accepted it. */
export class ScriptTransport implements Transport {
  constructor(
    private readonly command: string,
    private readonly options: ScriptTransportOptions = {},
  ) {}

  async submit(message: string): Promise<SubmitResult> {
    try {
      const { stdout } = await execFileAsync(this.command, [message], {
        timeout: this.options.timeoutMs ?? 30_000,
        encoding: "utf8",
      });
      if (stdout.trim().length > 0) {
        this.options.logger?.debug("Transport output", { stdout: stdout.trim() });
      }
      return { ok: true };
    } catch (error) {
      const stderr = error instanceof Error && "stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
      const detail = stderr.trim() || errorMessage(error);
      this.options.logger?.error("Transport command failed", { command: this.command, detail });
      return { ok: false, detail };
    }
  }
}
