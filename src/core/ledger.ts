import {
  type CycleTransition,
  applyTransition,
  createInitialState,
  deepFreeze,
} from "./research-state";
import type {
  AttemptKey,
  Capability,
  LedgerEntry,
  OutcomeStatus,
  ResearchState,
} from "./types";

const MERGED_OUTCOMES: ReadonlySet<OutcomeStatus> = new Set([
  "success",
  "partial_success",
]);

const FAILED_OUTCOMES: ReadonlySet<OutcomeStatus> = new Set([
  "transient_failure",
  "timeout",
]);

/**
 * An attempt failed when the executor (or any invocation of a fan-out
 * batch) reported a transient failure or ran out of time. A successful
 * attempt whose output later fails a quality gate is not a failure.
 */
export const isFailedAttempt = (entry: LedgerEntry): boolean =>
  FAILED_OUTCOMES.has(entry.outcome) ||
  entry.invocations.some((invocation) =>
    FAILED_OUTCOMES.has(invocation.outcome),
  );

/** The entry merged executor output into the state. */
export const isMergedEntry = (entry: LedgerEntry): boolean =>
  MERGED_OUTCOMES.has(entry.outcome) && entry.delta !== null;

/** The entry invoked a literature search for gaps a synthesis reported. */
export const isFollowUpEntry = (entry: LedgerEntry): boolean =>
  entry.decision.kind !== "terminate" && entry.decision.params.followUp === true;

export const isFatalEntry = (entry: LedgerEntry): boolean =>
  entry.outcome === "fatal_failure" ||
  entry.invocations.some(
    (invocation) => invocation.outcome === "fatal_failure",
  );

export const transitionOf = (
  entry: Omit<LedgerEntry, "state_version">,
): CycleTransition => ({
  capability: entry.capability,
  attemptKey: entry.attempt_key,
  delta: entry.delta,
  completed: MERGED_OUTCOMES.has(entry.outcome) && entry.delta !== null,
  warning: entry.warning,
  terminate: entry.decision.kind === "terminate" ? entry.decision.reason : null,
});

export class ExecutionLedger {
  private readonly items: LedgerEntry[] = [];

  constructor(entries: readonly LedgerEntry[] = []) {
    for (const entry of entries) {
      this.append(entry);
    }
  }

  get length(): number {
    return this.items.length;
  }

  entries(): readonly LedgerEntry[] {
    return [...this.items];
  }

  last(): LedgerEntry | undefined {
    return this.items.at(-1);
  }

  nextSeq(): number {
    return this.items.length + 1;
  }

  append(entry: LedgerEntry): LedgerEntry {
    const expectedSeq = this.nextSeq();
    if (entry.seq !== expectedSeq) {
      throw new Error(
        `Ledger sequence gap: expected ${expectedSeq}, got ${entry.seq}`,
      );
    }

    const previous = this.last();
    if (previous && previous.state_version !== entry.previous_version) {
      throw new Error(
        `Ledger entry ${entry.seq} does not follow state ${previous.state_version}`,
      );
    }

    const frozen = deepFreeze(structuredClone(entry));
    this.items.push(frozen);
    return frozen;
  }

  attemptsFor(key: AttemptKey): number {
    return this.items.filter((entry) => entry.attempt_key === key).length;
  }

  lastAttempt(key: AttemptKey): LedgerEntry | undefined {
    return this.items.findLast((entry) => entry.attempt_key === key);
  }

  /** Failed attempts for `key` since its last clean attempt. */
  consecutiveFailures(key: AttemptKey): number {
    let streak = 0;
    for (const entry of [...this.items].reverse()) {
      if (entry.attempt_key !== key) continue;
      if (!isFailedAttempt(entry)) break;
      streak += 1;
    }
    return streak;
  }

  hasFatal(key?: AttemptKey): boolean {
    return this.items.some(
      (entry) =>
        isFatalEntry(entry) &&
        (key === undefined || entry.attempt_key === key),
    );
  }

  /** Sequence number of the newest entry that merged output for the capability, or 0. */
  lastMergedSeq(capability: Capability): number {
    const entry = this.items.findLast(
      (item) => item.capability === capability && isMergedEntry(item),
    );
    return entry?.seq ?? 0;
  }
}

/**
 * Rebuild the state a ledger describes by folding every entry over the
 * initial state. Each recomputed version must match the recorded one.
 */
export const replayLedger = (
  query: string,
  entries: readonly LedgerEntry[],
): ResearchState => {
  let state = createInitialState(query);

  for (const entry of entries) {
    if (entry.previous_version !== state.version) {
      throw new Error(
        `Ledger entry ${entry.seq} expects state ${entry.previous_version}, replay is at ${state.version}`,
      );
    }

    state = applyTransition(state, transitionOf(entry));

    if (state.version !== entry.state_version) {
      throw new Error(
        `Ledger entry ${entry.seq} recorded state ${entry.state_version}, replay produced ${state.version}`,
      );
    }
  }

  return state;
};
