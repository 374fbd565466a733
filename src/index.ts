import {
  type OrchestratorConfigInput,
  loadOrchestratorConfig,
} from "./config/orchestrator-config";
import { LedgerStore } from "./core/ledger-store";
import {
  ResearchOrchestrator,
  type RunResult,
  type Sleep,
} from "./core/orchestrator";
import type { LedgerEntry, RunId } from "./core/types";
import type { CapabilityExecutor, ExecutorRegistry } from "./executors/contract";

export * from "./core/types";
export { ExecutionLedger, replayLedger } from "./core/ledger";
export { LedgerStore } from "./core/ledger-store";
export {
  ResearchOrchestrator,
  RunDeadlineExceeded,
  type Decision,
  type RunResult,
  type StepResult,
} from "./core/orchestrator";
export { createInitialState, applyTransition } from "./core/research-state";
export {
  type OrchestratorConfig,
  type OrchestratorConfigInput,
  defaultOrchestratorConfig,
  loadOrchestratorConfig,
  resolveOrchestratorConfig,
} from "./config/orchestrator-config";
export * from "./executors/contract";
export {
  ExecutorError,
  classifyError,
} from "./executors/error-classification";
export {
  LiteratureSearchExecutor,
  type PaperQuery,
  type PaperSource,
  type SourcePaper,
} from "./executors/literature-search";
export {
  type StructuredModelClient,
  type StructuredRequest,
  createModelExecutors,
} from "./executors/model-capabilities";
export * from "./gates/quality-gates";
export { buildMarkdownReport, buildRunReportLines } from "./observability/report";

export interface ResearchOptions {
  executors: ExecutorRegistry | readonly CapabilityExecutor[];
  config?: OrchestratorConfigInput;
  /** Read `.research/config.ts` or `.research/config.json` here when `config` is absent. */
  cwd?: string;
  /** Persist runs under this directory. */
  storeDir?: string;
  signal?: AbortSignal;
  sleep?: Sleep;
}

export type ResumeSource =
  | { query: string; entries: readonly LedgerEntry[] }
  | { runId: RunId };

const createOrchestrator = async (
  options: ResearchOptions,
): Promise<ResearchOrchestrator> => {
  const config =
    options.config ??
    (options.cwd ? await loadOrchestratorConfig(options.cwd) : undefined);

  return new ResearchOrchestrator({
    executors: options.executors,
    ...(config ? { config } : {}),
    ...(options.storeDir ? { store: new LedgerStore(options.storeDir) } : {}),
    ...(options.sleep ? { sleep: options.sleep } : {}),
  });
};

export const runResearch = async (
  query: string,
  options: ResearchOptions,
): Promise<RunResult> => {
  const orchestrator = await createOrchestrator(options);
  return orchestrator.run(query, options.signal ? { signal: options.signal } : {});
};

export const resumeResearch = async (
  source: ResumeSource,
  options: ResearchOptions,
): Promise<RunResult> => {
  const orchestrator = await createOrchestrator(options);
  const runOptions = options.signal ? { signal: options.signal } : {};

  if ("runId" in source) {
    return orchestrator.resumeStored(source.runId, runOptions);
  }
  return orchestrator.resume(source.query, source.entries, runOptions);
};
