import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { randomUUID } from "node:crypto";
import { JSONFilePreset } from "lowdb/node";
import type { CaseResult, RunRecord, RunSummaries, SummaryCounts } from "../schema/result.js";
import { logger } from "../logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function getProjectRoot(): string {
  // dist/data/runStore.js and src/data/runStore.ts both sit two levels below the root
  const candidate = resolve(__dirname, "../..");
  if (existsSync(resolve(candidate, "package.json"))) {
    return candidate;
  }
  return resolve(__dirname, "..");
}

function getRunsFilePath(): string {
  const override = process.env.TAGCASE_RUNS_PATH;
  if (override && override.trim().length > 0) {
    return override;
  }
  return resolve(getProjectRoot(), "data", "runs.json");
}

type DbSchema = { runs: RunRecord[] };
type Db = Awaited<ReturnType<typeof JSONFilePreset<DbSchema>>>;

const dbInstances = new Map<string, Db>();

async function getDb(): Promise<Db> {
  const filePath = getRunsFilePath();
  let db = dbInstances.get(filePath);
  if (!db) {
    logger.info("Opening run history", "runStore", { path: filePath });
    await mkdir(dirname(filePath), { recursive: true });
    db = await JSONFilePreset<DbSchema>(filePath, { runs: [] });
    if (!Array.isArray(db.data.runs)) {
      db.data.runs = [];
    }
    dbInstances.set(filePath, db);
  }
  return db;
}

async function loadRuns(): Promise<RunRecord[]> {
  const db = await getDb();
  await db.read();
  return Array.isArray(db.data.runs) ? db.data.runs : [];
}

export interface SaveRunInput {
  inputFile: string;
  executionId: string;
  startedAt: Date;
  finishedAt: Date;
  totals: SummaryCounts;
  summaries: RunSummaries;
  results: CaseResult[];
  reportFiles?: Record<string, string>;
}

export async function saveRun(input: SaveRunInput): Promise<RunRecord> {
  const record: RunRecord = {
    id: `run_${randomUUID()}`,
    inputFile: input.inputFile,
    executionId: input.executionId,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    totals: input.totals,
    summaries: input.summaries,
    results: input.results,
    reportFiles: input.reportFiles,
  };

  const db = await getDb();
  await db.read();
  db.data.runs = [...(db.data.runs ?? []), record];
  await db.write();

  return record;
}

export async function getRun(runId: string): Promise<RunRecord | null> {
  const runs = await loadRuns();
  return runs.find((run) => run.id === runId) ?? null;
}

export interface ListRunsOptions {
  useCaseId?: string;
  pageSize?: number;
  cursor?: string;
}

export interface RunSummary {
  id: string;
  inputFile: string;
  executionId: string;
  startedAt: string;
  finishedAt: string;
  totals: SummaryCounts;
  useCaseIds: string[];
}

export interface ListRunsResult {
  runs: RunSummary[];
  nextCursor?: string;
  total: number;
}

interface CursorPayload {
  offset: number;
  signature: string;
}

function encodeCursor(payload: CursorPayload): string {
  return Buffer.from(JSON.stringify(payload), "utf8").toString("base64url");
}

function decodeCursor(cursor: string): CursorPayload | null {
  try {
    const parsed: unknown = JSON.parse(Buffer.from(cursor, "base64url").toString("utf8"));
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "offset" in parsed &&
      "signature" in parsed &&
      typeof parsed.offset === "number" &&
      typeof parsed.signature === "string"
    ) {
      return { offset: parsed.offset, signature: parsed.signature };
    }
  } catch {
    // malformed cursors restart from the first page
  }
  return null;
}

function useCaseIdsOf(run: RunRecord): string[] {
  return run.summaries.byUseCase.map((row) => row.useCaseId);
}

export async function listRuns(options: ListRunsOptions = {}): Promise<ListRunsResult> {
  const runs = await loadRuns();
  const useCaseId = options.useCaseId?.trim() || undefined;

  const filtered = runs
    .filter((run) => !useCaseId || useCaseIdsOf(run).includes(useCaseId))
    .sort((a, b) => b.startedAt.localeCompare(a.startedAt));

  const pageSize = Math.min(Math.max(options.pageSize ?? 20, 1), 50);
  const signature = JSON.stringify({ useCaseId: useCaseId ?? null });
  let offset = 0;
  if (options.cursor) {
    const payload = decodeCursor(options.cursor);
    if (payload && payload.signature === signature) {
      offset = Math.max(payload.offset, 0);
    }
  }

  const page = filtered.slice(offset, offset + pageSize).map((run) => ({
    id: run.id,
    inputFile: run.inputFile,
    executionId: run.executionId,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    totals: run.totals,
    useCaseIds: useCaseIdsOf(run),
  }));

  const nextOffset = offset + pageSize;
  return {
    runs: page,
    nextCursor: nextOffset < filtered.length ? encodeCursor({ offset: nextOffset, signature }) : undefined,
    total: filtered.length,
  };
}
