import { describe, expect, it } from "vitest";
import {
  ExecutionLedger,
  isFailedAttempt,
  isFollowUpEntry,
  replayLedger,
  transitionOf,
} from "../src/core/ledger";
import { applyTransition, createInitialState } from "../src/core/research-state";
import {
  type AttemptKey,
  type Capability,
  type LedgerEntry,
  type OutcomeStatus,
  type ResearchState,
  type StateDelta,
  asStateVersion,
} from "../src/core/types";
import { makePapers } from "./helpers/stub-executors";

type EntryOptions = {
  attemptKey?: AttemptKey;
  delta?: StateDelta;
  followUp?: boolean;
};

type Draft = Omit<LedgerEntry, "previous_version" | "state_version">;

const draft = (
  seq: number,
  capability: Capability,
  outcome: OutcomeStatus,
  options: EntryOptions = {},
): Draft => ({
  seq,
  at: "2026-01-01T00:00:00.000Z",
  decision: {
    kind: "invoke",
    capability,
    params: { attempt: 1, ...(options.followUp ? { followUp: true } : {}) },
  },
  capability,
  attempt_key: options.attemptKey ?? capability,
  outcome,
  duration_ms: 5,
  diagnostics: [],
  delta: options.delta ?? null,
  invocations: [],
  warning: null,
  reason: null,
});

/** An entry chained by placeholder versions v0, v1, ... */
const entry = (
  seq: number,
  capability: Capability,
  outcome: OutcomeStatus,
  options: EntryOptions = {},
): LedgerEntry => ({
  ...draft(seq, capability, outcome, options),
  previous_version: asStateVersion(`v${seq - 1}`),
  state_version: asStateVersion(`v${seq}`),
});

/** Commit entries the way the orchestrator does, with real versions. */
const commitAll = (
  query: string,
  drafts: Draft[],
): { state: ResearchState; entries: LedgerEntry[] } => {
  let state = createInitialState(query);
  const entries: LedgerEntry[] = [];
  for (const item of drafts) {
    const chained = { ...item, previous_version: state.version };
    const next = applyTransition(state, transitionOf(chained));
    entries.push({ ...chained, state_version: next.version });
    state = next;
  }
  return { state, entries };
};

describe("ExecutionLedger", () => {
  it("rejects sequence gaps and broken version chains", () => {
    const ledger = new ExecutionLedger([entry(1, "literature_search", "success")]);

    expect(() => ledger.append(entry(3, "literature_search", "success"))).toThrow(
      "Ledger sequence gap: expected 2, got 3",
    );
    expect(() =>
      ledger.append({
        ...entry(2, "literature_search", "success"),
        previous_version: asStateVersion("elsewhere"),
      }),
    ).toThrow("Ledger entry 2 does not follow state v1");
    expect(ledger.length).toBe(1);
  });

  it("stores frozen copies", () => {
    const original = entry(1, "literature_search", "success");
    const ledger = new ExecutionLedger([original]);
    original.diagnostics.push("mutated later");

    expect(ledger.last()?.diagnostics).toEqual([]);
    expect(Object.isFrozen(ledger.last())).toBe(true);
  });

  it("derives attempts and failure streaks from entries", () => {
    const ledger = new ExecutionLedger([
      entry(1, "literature_search", "transient_failure"),
      entry(2, "literature_search", "success"),
      entry(3, "knowledge_synthesis", "timeout"),
      entry(4, "literature_search", "timeout"),
      entry(5, "literature_search", "transient_failure"),
    ]);

    expect(ledger.attemptsFor("literature_search")).toBe(4);
    expect(ledger.attemptsFor("validation")).toBe(0);
    expect(ledger.consecutiveFailures("literature_search")).toBe(2);
    expect(ledger.consecutiveFailures("knowledge_synthesis")).toBe(1);
    expect(ledger.lastAttempt("literature_search")?.seq).toBe(5);
    expect(ledger.hasFatal()).toBe(false);
    expect(ledger.nextSeq()).toBe(6);
  });

  it("treats a partially failed fan-out as a failed attempt", () => {
    const batch: LedgerEntry = {
      ...entry(1, "validation", "partial_success"),
      invocations: [
        { hypothesis_id: "h1", outcome: "success", reason: null, duration_ms: 3 },
        { hypothesis_id: "h2", outcome: "timeout", reason: "timeout", duration_ms: 9 },
      ],
    };

    expect(isFailedAttempt(batch)).toBe(true);
    expect(isFailedAttempt(entry(1, "validation", "partial_success"))).toBe(false);
  });

  it("finds fatal entries per attempt key", () => {
    const ledger = new ExecutionLedger([
      entry(1, "literature_search", "success"),
      entry(2, "knowledge_synthesis", "fatal_failure"),
    ]);

    expect(ledger.hasFatal()).toBe(true);
    expect(ledger.hasFatal("knowledge_synthesis")).toBe(true);
    expect(ledger.hasFatal("literature_search")).toBe(false);
  });

  it("tracks the newest merge per capability", () => {
    const papers = { papers: makePapers(1, 0.9) };
    const ledger = new ExecutionLedger([
      entry(1, "literature_search", "success", { delta: papers }),
      entry(2, "literature_search", "transient_failure"),
      entry(3, "literature_search", "partial_success", {
        delta: papers,
        attemptKey: "follow_up_search",
        followUp: true,
      }),
    ]);

    expect(ledger.lastMergedSeq("literature_search")).toBe(3);
    expect(ledger.lastMergedSeq("knowledge_synthesis")).toBe(0);
    expect(ledger.attemptsFor("follow_up_search")).toBe(1);
    expect(ledger.entries().map(isFollowUpEntry)).toEqual([false, false, true]);
  });
});

describe("replayLedger", () => {
  const drafts = (): Draft[] => [
    draft(1, "literature_search", "success", {
      delta: { papers: makePapers(2, 0.7) },
    }),
    draft(2, "literature_search", "timeout"),
  ];

  it("reproduces the recorded state", () => {
    const { state, entries } = commitAll("q", drafts());

    const replayed = replayLedger("q", entries);

    expect(replayed.version).toBe(state.version);
    expect(replayed.papers.map((paper) => paper.id)).toEqual(["p1", "p2"]);
    expect(replayed.attemptCounters.literature_search).toBe(2);
    expect(replayed.stage).toBe("literature_search");
  });

  it("detects a tampered delta", () => {
    const { entries } = commitAll("q", drafts());
    const [first, second] = entries;
    if (!first || !second) throw new Error("expected two entries");

    const tampered = { ...first, delta: { papers: makePapers(3, 0.7) } };

    expect(() => replayLedger("q", [tampered, second])).toThrow(
      `Ledger entry 1 recorded state ${first.state_version}, replay produced`,
    );
  });

  it("detects a ledger from another query", () => {
    const { entries } = commitAll("q", drafts());
    expect(() => replayLedger("other", entries)).toThrow(
      "Ledger entry 1 expects state",
    );
  });
});
