import fs from "node:fs";
import path from "node:path";
import { nanoid } from "nanoid";
import { createModuleLogger } from "../observability/logger";
import { computeVersion, deepFreeze } from "./research-state";
import {
  LedgerEntrySchema,
  ResearchStateSchema,
  RunRecordSchema,
  isLedgerEntry,
  isResearchStateSnapshot,
  isRunRecord,
  schemaErrors,
} from "./schemas";
import {
  type LedgerEntry,
  type ResearchState,
  type RunId,
  type RunRecord,
  type StateVersion,
  asRunId,
} from "./types";

const log = createModuleLogger("ledger-store");

/**
 * File-backed persistence for runs. Each run keeps its ledger as an
 * append-only JSONL log; states are stored once per version under
 * `snapshots/`.
 */
export class LedgerStore {
  constructor(private readonly rootDir: string) {}

  ensure(): void {
    fs.mkdirSync(path.join(this.rootDir, "runs"), { recursive: true });
    fs.mkdirSync(path.join(this.rootDir, "snapshots"), { recursive: true });
  }

  runDir(runId: RunId): string {
    return path.join(this.rootDir, "runs", runId);
  }

  runPath(runId: RunId): string {
    return path.join(this.runDir(runId), "run.json");
  }

  ledgerPath(runId: RunId): string {
    return path.join(this.runDir(runId), "ledger.jsonl");
  }

  snapshotPath(version: StateVersion): string {
    return path.join(this.rootDir, "snapshots", `${version}.json`);
  }

  createRun(query: string, config: unknown, runId?: RunId): RunRecord {
    const record: RunRecord = {
      run_id: runId ?? asRunId(nanoid()),
      query,
      created_at: new Date().toISOString(),
      config,
    };

    if (fs.existsSync(this.runPath(record.run_id))) {
      throw new Error(`Run ${record.run_id} already exists`);
    }

    fs.mkdirSync(this.runDir(record.run_id), { recursive: true });
    fs.writeFileSync(
      this.runPath(record.run_id),
      JSON.stringify(record, null, 2),
    );
    return record;
  }

  loadRun(runId: RunId): RunRecord | null {
    const file = this.runPath(runId);
    if (!fs.existsSync(file)) {
      return null;
    }

    const parsed = JSON.parse(fs.readFileSync(file, "utf8")) as unknown;
    if (!isRunRecord(parsed)) {
      throw new Error(
        `Invalid run record ${file}: ${schemaErrors(RunRecordSchema, parsed).join("; ")}`,
      );
    }
    return parsed;
  }

  listRuns(): RunRecord[] {
    const runsDir = path.join(this.rootDir, "runs");
    if (!fs.existsSync(runsDir)) {
      return [];
    }

    return fs
      .readdirSync(runsDir)
      .flatMap((entry) => {
        const record = this.loadRun(asRunId(entry));
        return record ? [record] : [];
      })
      .sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  appendEntry(runId: RunId, entry: LedgerEntry): void {
    fs.mkdirSync(this.runDir(runId), { recursive: true });
    fs.appendFileSync(this.ledgerPath(runId), `${JSON.stringify(entry)}\n`);
  }

  /**
   * Read a run's ledger. A final line cut short by a crash mid-append is
   * dropped; any other unreadable or invalid line is an error.
   */
  loadLedger(runId: RunId): LedgerEntry[] {
    const file = this.ledgerPath(runId);
    if (!fs.existsSync(file)) {
      return [];
    }

    const lines = fs.readFileSync(file, "utf8").split("\n").filter(Boolean);
    const entries: LedgerEntry[] = [];

    for (const [index, line] of lines.entries()) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        if (index === lines.length - 1) {
          log.warn(`Dropping truncated final ledger line in ${file}`, {
            error: error instanceof Error ? error.message : String(error),
          });
          break;
        }
        throw new Error(`Unreadable ledger line ${index + 1} in ${file}`);
      }

      if (!isLedgerEntry(parsed)) {
        throw new Error(
          `Invalid ledger entry on line ${index + 1} of ${file}: ${schemaErrors(LedgerEntrySchema, parsed).join("; ")}`,
        );
      }
      entries.push(parsed);
    }

    return entries;
  }

  saveSnapshot(state: ResearchState): void {
    const file = this.snapshotPath(state.version);
    if (fs.existsSync(file)) {
      return;
    }
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(state, null, 2));
  }

  loadSnapshot(version: StateVersion): ResearchState | null {
    const file = this.snapshotPath(version);
    if (!fs.existsSync(file)) {
      return null;
    }

    const parsed = JSON.parse(fs.readFileSync(file, "utf8")) as unknown;
    if (!isResearchStateSnapshot(parsed)) {
      throw new Error(
        `Invalid snapshot ${file}: ${schemaErrors(ResearchStateSchema, parsed).join("; ")}`,
      );
    }

    const recomputed = computeVersion(parsed);
    if (recomputed !== version || parsed.version !== version) {
      throw new Error(
        `Snapshot ${file} does not hash to its version (got ${recomputed})`,
      );
    }
    return deepFreeze(parsed);
  }
}
