import { nanoid } from "nanoid";
import {
  type OrchestratorConfig,
  type OrchestratorConfigInput,
  resolveOrchestratorConfig,
  timeoutFor,
} from "../config/orchestrator-config";
import {
  type CapabilityExecutor,
  ExecutorRegistry,
} from "../executors/contract";
import { fanOut } from "../executors/fan-out";
import { type InvocationOutcome, invokeWithTimeout } from "../executors/invoke";
import {
  hypothesisGate,
  literatureGate,
  synthesisGate,
  uncoveredHypotheses,
  validationGate,
  validationWorthy,
} from "../gates/quality-gates";
import { createModuleLogger } from "../observability/logger";
import { RetryController } from "../retry/retry-controller";
import {
  ExecutionLedger,
  isFatalEntry,
  isFollowUpEntry,
  isMergedEntry,
  replayLedger,
  transitionOf,
} from "./ledger";
import type { LedgerStore } from "./ledger-store";
import {
  applyTransition,
  createInitialState,
  filterDelta,
} from "./research-state";
import { toPlainDelta } from "./schemas";
import {
  type AttemptKey,
  type Capability,
  type ExecutorParams,
  type InvocationRecord,
  type LedgerEntry,
  type OutcomeStatus,
  type ResearchState,
  type RoutingDecision,
  type RunId,
  type StateDelta,
  TERMINATION_REASONS,
  type TerminationReason,
  type Validation,
  asRunId,
} from "./types";

const log = createModuleLogger("orchestrator");

const ADHOC_RUN = asRunId("adhoc");

export interface Decision {
  decision: RoutingDecision;
  /** Gate and retry diagnostics, in evaluation order. */
  diagnostics: string[];
  /** Counter the cycle charges; null for terminations. */
  attemptKey: AttemptKey | null;
}

export interface StepOptions {
  signal?: AbortSignal;
  /** Persist the committed entry under this run when a store is configured. */
  runId?: RunId;
}

export interface StepResult {
  decision: RoutingDecision;
  state: ResearchState;
  /** The committed entry, or the ledger head when nothing was committed. */
  entry: LedgerEntry | null;
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: RunId;
}

export interface RunResult {
  runId: RunId;
  state: ResearchState;
  ledger: readonly LedgerEntry[];
  reason: TerminationReason;
  partial: boolean;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface ResearchOrchestratorOptions {
  executors: ExecutorRegistry | readonly CapabilityExecutor[];
  config?: OrchestratorConfigInput;
  store?: LedgerStore;
  /** Backoff delay; must resolve early when the signal aborts. */
  sleep?: Sleep;
  now?: () => number;
}

interface Settled {
  hypothesisId: string | null;
  status: OutcomeStatus;
  delta: StateDelta | null;
  warnings: string[];
  reason: string | null;
  durationMs: number;
}

interface CycleRecord {
  decision: RoutingDecision;
  diagnostics: string[];
  capability: Capability | null;
  attemptKey: AttemptKey | null;
  outcome: OutcomeStatus;
  delta: StateDelta | null;
  invocations: InvocationRecord[];
  warnings: string[];
  reason: string | null;
  durationMs: number;
}

const FAILURE_OUTCOMES: ReadonlySet<OutcomeStatus> = new Set([
  "transient_failure",
  "timeout",
  "fatal_failure",
]);

export const abortableDelay: Sleep = (ms, signal) => {
  if (signal.aborted || ms <= 0) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve) => {
    const finish = (): void => {
      clearTimeout(timer);
      signal.removeEventListener("abort", finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal.addEventListener("abort", finish, { once: true });
  });
};

/** Abort reason used when a run outlives `maxRunDurationMs`. */
export class RunDeadlineExceeded extends Error {
  constructor(readonly deadlineMs: number) {
    super(`run exceeded ${deadlineMs}ms`);
    this.name = "RunDeadlineExceeded";
  }
}

/**
 * A signal that aborts with the caller's signal, or with
 * `RunDeadlineExceeded` once `deadlineMs` has passed.
 */
const boundedSignal = (
  signal: AbortSignal | undefined,
  deadlineMs: number | undefined,
): { signal: AbortSignal; dispose: () => void } => {
  const controller = new AbortController();
  const forward = (): void => controller.abort(signal?.reason);
  if (signal?.aborted) {
    forward();
  } else {
    signal?.addEventListener("abort", forward, { once: true });
  }

  const timer =
    deadlineMs === undefined
      ? undefined
      : setTimeout(
          () => controller.abort(new RunDeadlineExceeded(deadlineMs)),
          deadlineMs,
        );

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forward);
    },
  };
};

const describeDecision = (decision: RoutingDecision): string =>
  decision.kind === "terminate"
    ? `terminate (${decision.reason})`
    : `${decision.kind} ${decision.capability}`;

const toRecord = (settled: Settled): InvocationRecord => ({
  hypothesis_id: settled.hypothesisId,
  outcome: settled.status,
  reason: settled.reason,
  duration_ms: settled.durationMs,
});

/**
 * Routes a research run through its capabilities one cycle at a time.
 * Every cycle reads the current state and ledger, decides the next action,
 * runs at most one executor (or one validation fan-out) and commits exactly
 * one ledger entry.
 */
export class ResearchOrchestrator {
  readonly config: OrchestratorConfig;
  private readonly registry: ExecutorRegistry;
  private readonly retry: RetryController;
  private readonly store?: LedgerStore;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(options: ResearchOrchestratorOptions) {
    this.registry =
      options.executors instanceof ExecutorRegistry
        ? options.executors
        : new ExecutorRegistry(options.executors);
    this.config = resolveOrchestratorConfig(options.config);
    this.retry = new RetryController(this.config.retry);
    this.store = options.store;
    this.sleep = options.sleep ?? abortableDelay;
    this.now = options.now ?? Date.now;
  }

  decide(state: ResearchState, ledger: ExecutionLedger): Decision {
    const diagnostics: string[] = [];
    const terminate = (reason: TerminationReason): Decision => ({
      decision: { kind: "terminate", reason },
      diagnostics,
      attemptKey: null,
    });

    if (state.terminal) {
      return terminate(TERMINATION_REASONS.alreadyComplete);
    }

    const fatal = ledger.entries().find(isFatalEntry);
    if (fatal) {
      diagnostics.push(
        `${fatal.capability ?? "executor"}: fatal failure at seq ${fatal.seq}`,
      );
      return terminate(TERMINATION_REASONS.fatal);
    }

    const { thresholds } = this.config;

    const literature = literatureGate(state, thresholds);
    diagnostics.push(literature.diagnostic);
    if (!literature.passed) {
      return (
        this.schedule(
          "literature_search",
          "literature_search",
          ledger,
          diagnostics,
          (attempt) => this.literatureParams(attempt),
        ) ?? terminate(TERMINATION_REASONS.exhausted)
      );
    }

    const synthesis = synthesisGate(state, thresholds);
    diagnostics.push(synthesis.diagnostic);
    if (synthesis.passed) {
      const followUp = this.planFollowUp(state, ledger, diagnostics);
      if (followUp) {
        return followUp;
      }
    }

    const stale =
      synthesis.passed &&
      ledger.lastMergedSeq("literature_search") >
        ledger.lastMergedSeq("knowledge_synthesis");
    if (stale) {
      diagnostics.push("synthesis: stale, literature changed since it ran");
    }
    if (!synthesis.passed || stale) {
      const scheduled = this.schedule(
        "knowledge_synthesis",
        "knowledge_synthesis",
        ledger,
        diagnostics,
        (attempt) => ({ attempt }),
      );
      if (scheduled) {
        return scheduled;
      }
      if (!synthesis.passed) {
        return terminate(TERMINATION_REASONS.exhausted);
      }
    }

    const hypotheses = hypothesisGate(state, thresholds);
    diagnostics.push(hypotheses.diagnostic);
    if (!hypotheses.passed) {
      return (
        this.schedule(
          "hypothesis_generation",
          "hypothesis_generation",
          ledger,
          diagnostics,
          (attempt) => ({ attempt }),
        ) ?? terminate(TERMINATION_REASONS.exhausted)
      );
    }

    const methodology = this.planMethodology(state, ledger, diagnostics);
    if (methodology) {
      return methodology;
    }

    const validation = validationGate(state, thresholds);
    diagnostics.push(validation.diagnostic);
    if (!validation.passed) {
      const hypothesisIds = uncoveredHypotheses(state, thresholds).map(
        (hypothesis) => hypothesis.id,
      );
      return (
        this.schedule(
          "validation",
          "validation",
          ledger,
          diagnostics,
          (attempt) => ({ attempt, hypothesisIds }),
        ) ?? terminate(TERMINATION_REASONS.exhausted)
      );
    }

    return terminate(TERMINATION_REASONS.complete);
  }

  async step(
    state: ResearchState,
    ledger: ExecutionLedger,
    options: StepOptions = {},
  ): Promise<StepResult> {
    const head = ledger.last();
    if (head && head.state_version !== state.version) {
      throw new Error(
        `State ${state.version} is not the ledger head ${head.state_version}`,
      );
    }

    const planned = this.decide(state, ledger);
    const { decision, diagnostics } = planned;

    if (decision.kind === "terminate") {
      if (state.terminal) {
        return { decision, state, entry: head ?? null };
      }
      return this.commit(state, ledger, options.runId, {
        decision,
        diagnostics,
        capability: null,
        attemptKey: null,
        outcome: "none",
        delta: null,
        invocations: [],
        warnings: [],
        reason: diagnostics.at(-1) ?? null,
        durationMs: 0,
      });
    }

    const signal = options.signal ?? new AbortController().signal;
    const runId = options.runId ?? ADHOC_RUN;

    if (
      decision.kind === "retry" &&
      this.config.honorBackoff &&
      decision.backoffMs > 0
    ) {
      log.debug(
        `backing off ${decision.backoffMs}ms before ${decision.capability}`,
        { runId },
      );
      await this.sleep(decision.backoffMs, signal);
    }

    if (signal.aborted) {
      return this.cancelCycle(
        state,
        ledger,
        options.runId,
        decision.capability,
        diagnostics,
        [],
        0,
        signal.reason,
      );
    }

    const executor = this.registry.require(decision.capability);
    const startedAt = performance.now();
    const timeoutMs = timeoutFor(this.config, decision.capability);

    const settled =
      decision.capability === "validation"
        ? await this.runFanOut(
            executor,
            state,
            decision.params,
            runId,
            timeoutMs,
            signal,
          )
        : [
            this.settle(
              decision.capability,
              null,
              await invokeWithTimeout(executor, state, decision.params, {
                runId,
                timeoutMs,
                signal,
              }),
            ),
          ];
    const durationMs = Math.round(performance.now() - startedAt);

    if (signal.aborted || settled.some((item) => item.status === "cancelled")) {
      return this.cancelCycle(
        state,
        ledger,
        options.runId,
        decision.capability,
        diagnostics,
        settled.map(toRecord),
        durationMs,
        signal.reason,
      );
    }

    return this.commit(state, ledger, options.runId, {
      decision,
      diagnostics,
      capability: decision.capability,
      attemptKey: planned.attemptKey,
      ...this.aggregate(decision.capability, settled),
      invocations: settled.map(toRecord),
      durationMs,
    });
  }

  /** Start a fresh run and drive it until it terminates. */
  async run(query: string, options: RunOptions = {}): Promise<RunResult> {
    const initial = createInitialState(query);
    const runId = this.openRun(query, initial, [], options.runId);
    log.info(`run ${runId} started`, { query });
    return this.drive(runId, initial, new ExecutionLedger(), options.signal);
  }

  /**
   * Replay a ledger prefix and continue from where it stops. With a store
   * configured the prefix is copied into a new persisted run.
   */
  async resume(
    query: string,
    entries: readonly LedgerEntry[],
    options: RunOptions = {},
  ): Promise<RunResult> {
    const ledger = new ExecutionLedger(entries);
    const state = replayLedger(query, ledger.entries());
    const runId = this.openRun(
      query,
      createInitialState(query),
      ledger.entries(),
      options.runId,
    );
    if (this.store) {
      this.store.saveSnapshot(state);
    }
    log.info(`run ${runId} resumed at seq ${ledger.length}`, { query });
    return this.drive(runId, state, ledger, options.signal);
  }

  /** Continue a run persisted in the configured store, appending to its ledger. */
  async resumeStored(
    runId: RunId,
    options: { signal?: AbortSignal } = {},
  ): Promise<RunResult> {
    if (!this.store) {
      throw new Error("Resuming a stored run requires a LedgerStore");
    }

    const record = this.store.loadRun(runId);
    if (!record) {
      throw new Error(`Unknown run ${runId}`);
    }

    const ledger = new ExecutionLedger(this.store.loadLedger(runId));
    const state = replayLedger(record.query, ledger.entries());
    log.info(`run ${runId} resumed at seq ${ledger.length}`, {
      query: record.query,
    });
    return this.drive(runId, state, ledger, options.signal);
  }

  private async drive(
    runId: RunId,
    initial: ResearchState,
    ledger: ExecutionLedger,
    signal?: AbortSignal,
  ): Promise<RunResult> {
    const startedAt = this.now();
    const deadlineMs = this.config.maxRunDurationMs;
    const bounded = boundedSignal(signal, deadlineMs);
    let state = initial;

    try {
      while (!state.terminal) {
        if (bounded.signal.aborted) {
          state = this.cancelCycle(
            state,
            ledger,
            runId,
            null,
            [],
            [],
            0,
            bounded.signal.reason,
          ).state;
        } else if (
          deadlineMs !== undefined &&
          this.now() - startedAt >= deadlineMs
        ) {
          state = this.cancelCycle(
            state,
            ledger,
            runId,
            null,
            [],
            [],
            0,
            new RunDeadlineExceeded(deadlineMs),
          ).state;
        } else {
          const options = { signal: bounded.signal, runId };
          state = (await this.step(state, ledger, options)).state;
        }
      }
    } finally {
      bounded.dispose();
    }

    const reason = state.terminationReason;
    if (reason === null) {
      throw new Error("Terminal research state carries no termination reason");
    }

    log.info(`run ${runId} finished: ${reason}`, {
      cycles: ledger.length,
      partial: state.partial,
    });

    return {
      runId,
      state,
      ledger: ledger.entries(),
      reason,
      partial: state.partial,
    };
  }

  private openRun(
    query: string,
    initial: ResearchState,
    prefix: readonly LedgerEntry[],
    runId?: RunId,
  ): RunId {
    if (!this.store) {
      return runId ?? asRunId(nanoid());
    }

    this.store.ensure();
    const record = this.store.createRun(query, this.config, runId);
    this.store.saveSnapshot(initial);
    for (const entry of prefix) {
      this.store.appendEntry(record.run_id, entry);
    }
    return record.run_id;
  }

  private schedule(
    capability: Capability,
    key: AttemptKey,
    ledger: ExecutionLedger,
    diagnostics: string[],
    params: (attempt: number) => ExecutorParams,
    repeat?: boolean,
  ): Decision | null {
    const status = this.retry.evaluate(key, ledger);
    if (status.exhausted) {
      diagnostics.push(`${key}: retry ceiling ${status.ceiling} reached`);
      return null;
    }

    const next = params(status.attempts + 1);
    const decision: RoutingDecision =
      (repeat ?? status.attempts > 0)
        ? {
            kind: "retry",
            capability,
            params: next,
            backoffMs: status.backoffMs,
          }
        : { kind: "invoke", capability, params: next };

    return { decision, diagnostics, attemptKey: key };
  }

  private literatureParams(attempt: number): ExecutorParams {
    const { initialMaxResults, maxResultsCap, expandOnRetry, domainHint } =
      this.config.literature;
    const maxResults = expandOnRetry
      ? Math.min(initialMaxResults * 2 ** (attempt - 1), maxResultsCap)
      : initialMaxResults;

    return { attempt, maxResults, ...(domainHint ? { domainHint } : {}) };
  }

  private planFollowUp(
    state: ResearchState,
    ledger: ExecutionLedger,
    diagnostics: string[],
  ): Decision | null {
    const { enabled, minGaps, attemptPolicy } = this.config.followUpSearch;
    const gaps = state.synthesis?.gaps ?? [];
    if (!enabled || gaps.length < minGaps) {
      return null;
    }

    const previous = ledger.entries().filter(isFollowUpEntry);
    if (previous.some(isMergedEntry)) {
      return null;
    }

    diagnostics.push(`follow-up search: ${gaps.length} gaps reported`);
    const scheduled = this.schedule(
      "literature_search",
      attemptPolicy === "separate" ? "follow_up_search" : "literature_search",
      ledger,
      diagnostics,
      (attempt) => ({
        ...this.literatureParams(1),
        attempt,
        followUp: true,
        gaps: [...gaps],
      }),
      previous.length > 0,
    );
    if (!scheduled) {
      diagnostics.push("follow-up search: skipped");
    }
    return scheduled;
  }

  private planMethodology(
    state: ResearchState,
    ledger: ExecutionLedger,
    diagnostics: string[],
  ): Decision | null {
    const { enabled, maxHypotheses } = this.config.methodology;
    if (!enabled || !this.registry.has("methodology_design")) {
      return null;
    }

    const designed = new Set(
      state.methodologies.map((methodology) => methodology.hypothesisId),
    );
    const hypothesisIds = validationWorthy(state, this.config.thresholds)
      .slice(0, maxHypotheses)
      .map((hypothesis) => hypothesis.id)
      .filter((id) => !designed.has(id));
    if (hypothesisIds.length === 0) {
      return null;
    }

    diagnostics.push(
      `methodology: ${hypothesisIds.length} hypotheses without a design`,
    );
    const scheduled = this.schedule(
      "methodology_design",
      "methodology_design",
      ledger,
      diagnostics,
      (attempt) => ({ attempt, hypothesisIds }),
    );
    if (!scheduled) {
      diagnostics.push("methodology: skipped");
    }
    return scheduled;
  }

  private async runFanOut(
    executor: CapabilityExecutor,
    state: ResearchState,
    params: ExecutorParams,
    runId: RunId,
    timeoutMs: number,
    signal: AbortSignal,
  ): Promise<Settled[]> {
    const tasks = (params.hypothesisIds ?? []).map((hypothesisId) => ({
      hypothesisId,
      params: { ...params, hypothesisIds: [hypothesisId] },
    }));

    const results = await fanOut(executor, state, tasks, {
      runId,
      timeoutMs,
      signal,
      concurrency: this.config.concurrency.validationFanOut,
      onSettled: (completed, total) =>
        log.debug(`validation ${completed}/${total} settled`, { runId }),
    });

    return results.map((result) =>
      this.settle(executor.capability, result.hypothesisId, result.outcome),
    );
  }

  private settle(
    capability: Capability,
    hypothesisId: string | null,
    outcome: InvocationOutcome,
  ): Settled {
    const base = {
      hypothesisId,
      durationMs: outcome.durationMs,
      delta: null,
      warnings: [],
    };

    if (outcome.kind === "timeout") {
      return { ...base, status: "timeout", reason: "timeout" };
    }
    if (outcome.kind === "cancelled") {
      return { ...base, status: "cancelled", reason: "cancelled" };
    }

    const { result } = outcome;
    switch (result.kind) {
      case "transient_failure":
      case "fatal_failure":
        return { ...base, status: result.kind, reason: result.reason };
      case "success":
      case "partial_success": {
        const filtered = filterDelta(capability, result.delta);
        const checked = toPlainDelta(filtered.delta);
        if (!checked.ok) {
          return {
            ...base,
            status: "transient_failure",
            reason: `malformed delta: ${checked.errors.slice(0, 3).join("; ")}`,
          };
        }
        const warnings =
          result.kind === "partial_success" ? [result.warning] : [];
        if (filtered.dropped.length > 0) {
          warnings.push(
            `${capability} returned fields it does not own: ${filtered.dropped.join(", ")}`,
          );
        }
        return {
          ...base,
          status: result.kind,
          delta: checked.delta,
          warnings,
          reason: null,
        };
      }
    }
  }

  private aggregate(
    capability: Capability,
    settled: readonly Settled[],
  ): Pick<CycleRecord, "outcome" | "delta" | "warnings" | "reason"> {
    const merged = settled.filter((item) => item.delta !== null);
    const failed = settled.filter((item) => FAILURE_OUTCOMES.has(item.status));
    const warnings = settled.flatMap((item) => item.warnings);
    const reason =
      failed.length > 0
        ? failed
            .map((item) =>
              item.hypothesisId
                ? `${item.hypothesisId}: ${item.reason ?? item.status}`
                : (item.reason ?? item.status),
            )
            .join("; ")
        : null;

    const single = settled.length === 1 ? settled[0] : undefined;
    if (single) {
      return {
        outcome: single.status,
        delta: single.delta,
        warnings,
        reason,
      };
    }

    if (merged.length > 0 && failed.length > 0) {
      warnings.push(
        `${capability}: ${failed.length}/${settled.length} invocations failed (${failed
          .map((item) => item.hypothesisId ?? "?")
          .join(", ")})`,
      );
    }

    const validations: Validation[] = merged.flatMap(
      (item) => item.delta?.validations ?? [],
    );
    const delta = merged.length > 0 ? { validations } : null;

    let outcome: OutcomeStatus;
    if (failed.some((item) => item.status === "fatal_failure")) {
      outcome = "fatal_failure";
    } else if (merged.length === 0) {
      outcome =
        failed.length > 0 && failed.every((item) => item.status === "timeout")
          ? "timeout"
          : "transient_failure";
    } else if (
      failed.length > 0 ||
      merged.some((item) => item.status === "partial_success")
    ) {
      outcome = "partial_success";
    } else {
      outcome = "success";
    }

    return { outcome, delta, warnings, reason };
  }

  private cancelCycle(
    state: ResearchState,
    ledger: ExecutionLedger,
    runId: RunId | undefined,
    capability: Capability | null,
    diagnostics: string[],
    invocations: InvocationRecord[],
    durationMs: number,
    cause: unknown,
  ): StepResult {
    if (cause instanceof RunDeadlineExceeded) {
      return this.commit(state, ledger, runId, {
        decision: { kind: "terminate", reason: TERMINATION_REASONS.deadline },
        diagnostics: [...diagnostics, cause.message],
        capability,
        attemptKey: null,
        outcome: capability ? "cancelled" : "none",
        delta: null,
        invocations,
        warnings: [],
        reason: cause.message,
        durationMs,
      });
    }

    return this.commit(state, ledger, runId, {
      decision: { kind: "terminate", reason: TERMINATION_REASONS.cancelled },
      diagnostics,
      capability,
      attemptKey: null,
      outcome: "cancelled",
      delta: null,
      invocations,
      warnings: [],
      reason: capability ? `cancelled during ${capability}` : "cancelled",
      durationMs,
    });
  }

  private commit(
    state: ResearchState,
    ledger: ExecutionLedger,
    runId: RunId | undefined,
    cycle: CycleRecord,
  ): StepResult {
    const draft: Omit<LedgerEntry, "state_version"> = {
      seq: ledger.nextSeq(),
      at: new Date(this.now()).toISOString(),
      decision: cycle.decision,
      capability: cycle.capability,
      attempt_key: cycle.attemptKey,
      outcome: cycle.outcome,
      previous_version: state.version,
      duration_ms: cycle.durationMs,
      diagnostics: cycle.diagnostics,
      delta: cycle.delta,
      invocations: cycle.invocations,
      warning: cycle.warnings.length > 0 ? cycle.warnings.join("; ") : null,
      reason: cycle.reason,
    };

    const next = applyTransition(state, transitionOf(draft));
    const entry = ledger.append({ ...draft, state_version: next.version });

    if (this.store && runId) {
      this.store.appendEntry(runId, entry);
      this.store.saveSnapshot(next);
    }

    const message = `cycle ${entry.seq}: ${describeDecision(entry.decision)} -> ${entry.outcome}`;
    const meta = { runId: runId ?? ADHOC_RUN, version: entry.state_version };
    if (FAILURE_OUTCOMES.has(entry.outcome)) {
      log.warn(message, { ...meta, reason: entry.reason });
    } else {
      log.info(message, meta);
    }
    if (entry.warning) {
      log.warn(`cycle ${entry.seq}: ${entry.warning}`, meta);
    }

    return { decision: cycle.decision, state: next, entry };
  }
}
