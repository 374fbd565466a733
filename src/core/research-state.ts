import { createHash } from "node:crypto";
import { toPlainDelta } from "./schemas";
import {
  type AttemptKey,
  type Capability,
  DELTA_FIELDS,
  type Paper,
  type ResearchState,
  STAGE_ORDER,
  type Stage,
  type StateDelta,
  type StateVersion,
  TERMINATION_REASONS,
  type TerminationReason,
  type Validation,
  asStateVersion,
} from "./types";

/**
 * Everything one orchestrator cycle changes. The live orchestrator and
 * ledger replay both go through `applyTransition`, so a replayed run lands
 * on the same versions as the original run.
 */
export interface CycleTransition {
  capability: Capability | null;
  attemptKey: AttemptKey | null;
  delta: StateDelta | null;
  /** The capability produced a merged result this cycle. */
  completed: boolean;
  warning: string | null;
  terminate: TerminationReason | null;
}

type StateContent = Omit<ResearchState, "version">;

const PARTIAL_REASONS: ReadonlySet<TerminationReason> = new Set([
  TERMINATION_REASONS.exhausted,
  TERMINATION_REASONS.fatal,
  TERMINATION_REASONS.cancelled,
  TERMINATION_REASONS.deadline,
]);

export const deepFreeze = <T>(value: T): T => {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }
  for (const key of Reflect.ownKeys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  Object.freeze(value);
  return value;
};

const canonicalize = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : canonicalize(item)));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .flatMap((key) => {
          const item: unknown = Reflect.get(value, key);
          return item === undefined ? [] : [[key, canonicalize(item)]];
        }),
    );
  }
  return value;
};

export const canonicalJson = (value: unknown): string =>
  JSON.stringify(canonicalize(value));

const versionedFields = (content: StateContent): StateContent => ({
  query: content.query,
  papers: content.papers,
  synthesis: content.synthesis,
  hypotheses: content.hypotheses,
  methodologies: content.methodologies,
  validations: content.validations,
  attemptCounters: content.attemptCounters,
  stage: content.stage,
  terminal: content.terminal,
  terminationReason: content.terminationReason,
  partial: content.partial,
  warnings: content.warnings,
});

export const computeVersion = (content: StateContent): StateVersion =>
  asStateVersion(
    createHash("sha256")
      .update(canonicalJson(versionedFields(content)))
      .digest("hex")
      .slice(0, 32),
  );

const seal = (content: StateContent): ResearchState =>
  deepFreeze({ ...versionedFields(content), version: computeVersion(content) });

const emptyCounters = (): Record<AttemptKey, number> => ({
  literature_search: 0,
  knowledge_synthesis: 0,
  hypothesis_generation: 0,
  methodology_design: 0,
  validation: 0,
  follow_up_search: 0,
});

export const createInitialState = (query: string): ResearchState => {
  if (query.trim().length === 0) {
    throw new Error("Research query must not be empty");
  }

  return seal({
    query,
    papers: [],
    synthesis: null,
    hypotheses: [],
    methodologies: [],
    validations: [],
    attemptCounters: emptyCounters(),
    stage: "initialized",
    terminal: false,
    terminationReason: null,
    partial: false,
    warnings: [],
  });
};

const DELTA_KEYS: readonly (keyof StateDelta)[] = [
  "papers",
  "removePaperIds",
  "synthesis",
  "hypotheses",
  "methodologies",
  "validations",
];

export const stageRank = (stage: Stage): number => STAGE_ORDER.indexOf(stage);

/**
 * Keep only the fields the capability owns. Anything else an executor
 * returns is reported back so it can be surfaced as a warning.
 */
export const filterDelta = (
  capability: Capability,
  delta: StateDelta,
): { delta: StateDelta; dropped: (keyof StateDelta)[] } => {
  const allowed = new Set(DELTA_FIELDS[capability]);
  const kept: StateDelta = {};
  const dropped: (keyof StateDelta)[] = [];

  for (const key of DELTA_KEYS) {
    if (delta[key] === undefined) continue;
    if (allowed.has(key)) {
      Object.assign(kept, { [key]: delta[key] });
    } else {
      dropped.push(key);
    }
  }

  return { delta: kept, dropped };
};

const mergePapers = (
  current: readonly Paper[],
  incoming: readonly Paper[],
  removeIds: readonly string[],
): Paper[] => {
  const removed = new Set(removeIds);
  const merged = current.filter((paper) => !removed.has(paper.id));
  const positions = new Map(merged.map((paper, index) => [paper.id, index]));

  for (const paper of incoming) {
    const existing = positions.get(paper.id);
    if (existing === undefined) {
      positions.set(paper.id, merged.length);
      merged.push(paper);
    } else {
      merged[existing] = paper;
    }
  }

  return merged;
};

const mergeValidations = (
  current: readonly Validation[],
  incoming: readonly Validation[],
): Validation[] => {
  const merged = [...current];
  for (const validation of incoming) {
    const index = merged.findIndex(
      (item) => item.hypothesisRef === validation.hypothesisRef,
    );
    if (index >= 0) {
      merged[index] = validation;
    } else {
      merged.push(validation);
    }
  }
  return merged;
};

export const mergeDelta = (
  state: ResearchState,
  delta: StateDelta,
): StateContent => {
  const papers =
    delta.papers || delta.removePaperIds
      ? mergePapers(state.papers, delta.papers ?? [], delta.removePaperIds ?? [])
      : state.papers;

  return {
    ...versionedFields(state),
    papers,
    synthesis: delta.synthesis ?? state.synthesis,
    hypotheses: delta.hypotheses ?? state.hypotheses,
    methodologies: delta.methodologies ?? state.methodologies,
    validations: delta.validations
      ? mergeValidations(state.validations, delta.validations)
      : state.validations,
  };
};

export const applyTransition = (
  state: ResearchState,
  transition: CycleTransition,
): ResearchState => {
  if (state.terminal) {
    throw new Error("Research state is terminal and cannot change");
  }

  let merged: StateContent = versionedFields(state);
  if (transition.delta) {
    const checked = toPlainDelta(transition.delta);
    if (!checked.ok) {
      throw new Error(`Invalid state delta: ${checked.errors.join("; ")}`);
    }
    merged = mergeDelta(state, checked.delta);
  }

  const attemptCounters = { ...state.attemptCounters };
  if (transition.attemptKey) {
    attemptCounters[transition.attemptKey] += 1;
  }

  const stage =
    transition.completed &&
    transition.capability &&
    stageRank(transition.capability) > stageRank(state.stage)
      ? transition.capability
      : state.stage;

  const reason = transition.terminate;

  return seal({
    ...merged,
    attemptCounters,
    stage,
    terminal: reason !== null,
    terminationReason: reason,
    partial: reason !== null && PARTIAL_REASONS.has(reason),
    warnings: transition.warning
      ? [...state.warnings, transition.warning]
      : state.warnings,
  });
};
