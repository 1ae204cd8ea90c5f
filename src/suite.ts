import { resolve } from "node:path";
import type { RunnerConfig } from "./config.js";
import type { RecordStore, Transport } from "./engine/correlation.js";
import { type RunHooks, type RunReport, SuiteRunner } from "./engine/runner.js";
import { saveRun } from "./data/runStore.js";
import { FileRecordStore } from "./io/fileRecordStore.js";
import { readCaseTemplates } from "./io/csvInput.js";
import { formatExecutionId, reportPaths, type ReportPaths, writeReports } from "./io/reportWriter.js";
import { ScriptTransport } from "./io/scriptTransport.js";
import { createLogger, type LogLevel } from "./logger.js";

export interface RunSuiteOptions {
  inputFile: string;
  config: RunnerConfig;
  transport?: Transport;
  recordStore?: RecordStore;
  hooks?: RunHooks;
  /** Persist the run to the history store. Defaults to true. */
  persist?: boolean;
  logLevel?: LogLevel;
  /** Echo log lines to stderr as well as the run log file. */
  echoLogs?: boolean;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunSuiteResult {
  runId?: string;
  executionId: string;
  report: RunReport;
  paths: ReportPaths;
}

/** Reads a case file, executes it, writes the report files and records the run. */
export async function runSuite(options: RunSuiteOptions): Promise<RunSuiteResult> {
  const { config } = options;
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const executionId = formatExecutionId(startedAt);
  const paths = reportPaths(config.outputDir, executionId);

  const runLogger = createLogger({
    component: "runner",
    requestId: executionId,
    minLevel: options.logLevel,
    filePath: paths.logFile,
    write: options.echoLogs === false ? () => undefined : undefined,
  });

  try {
    runLogger.info("Execution started", {
      inputFile: resolve(options.inputFile),
      resultFile: paths.resultFile,
      summaryFile: paths.summaryFile,
      logFile: paths.logFile,
    });

    const rows = await readCaseTemplates(options.inputFile);
    const runner = new SuiteRunner(config, {
      transport: options.transport ?? new ScriptTransport(config.transportCommand, { logger: runLogger }),
      recordStore: options.recordStore ?? new FileRecordStore(config.recordStorePath),
      logger: runLogger,
      now,
      sleep: options.sleep,
    });

    const report = await runner.runRows(rows, options.hooks);
    await writeReports(paths, report.results, report.summaries);

    let runId: string | undefined;
    if (options.persist !== false) {
      const record = await saveRun({
        inputFile: options.inputFile,
        executionId,
        startedAt,
        finishedAt: now(),
        totals: report.totals,
        summaries: report.summaries,
        results: report.results,
        reportFiles: { ...paths },
      });
      runId = record.id;
    }

    return { runId, executionId, report, paths };
  } finally {
    await runLogger.close();
  }
}
