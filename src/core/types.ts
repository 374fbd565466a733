export type Brand<T, B extends string> = T & { readonly __brand: B };

export type RunId = Brand<string, "RunId">;
export type StateVersion = Brand<string, "StateVersion">;

export const asRunId = (value: string): RunId => value as RunId;
export const asStateVersion = (value: string): StateVersion =>
  value as StateVersion;

export const CAPABILITIES = [
  "literature_search",
  "knowledge_synthesis",
  "hypothesis_generation",
  "methodology_design",
  "validation",
] as const;

export type Capability = (typeof CAPABILITIES)[number];

/**
 * Attempt counters are keyed per capability, plus a dedicated key for
 * follow-up literature searches when they are accounted separately.
 */
export type AttemptKey = Capability | "follow_up_search";

export const ATTEMPT_KEYS: readonly AttemptKey[] = [
  ...CAPABILITIES,
  "follow_up_search",
];

export type Stage = "initialized" | Capability;

export const STAGE_ORDER: readonly Stage[] = ["initialized", ...CAPABILITIES];

export interface Paper {
  readonly id: string;
  readonly title: string;
  readonly relevance: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface Synthesis {
  readonly themes: readonly string[];
  readonly contradictions: readonly (readonly [string, string])[];
  readonly gaps: readonly string[];
  readonly confidence: number;
}

export interface Hypothesis {
  readonly id: string;
  readonly text: string;
  readonly confidence: number;
  readonly supportingEvidenceIds: readonly string[];
}

export interface Methodology {
  readonly hypothesisId: string;
  readonly approach: string;
  readonly sampleSize?: number;
  readonly estimatedDuration?: string;
  readonly requirements: readonly string[];
}

export type Verdict = "supported" | "contested" | "inconclusive";

export interface Validation {
  readonly hypothesisRef: string;
  readonly verdict: Verdict;
  readonly rationale: string;
  readonly score: number;
}

export const TERMINATION_REASONS = {
  alreadyComplete: "already complete",
  complete: "workflow complete",
  exhausted: "quality gate exhausted — returning partial results",
  fatal: "fatal dependency failure",
  cancelled: "cancelled",
  deadline: "deadline exceeded — returning partial results",
} as const;

export type TerminationReason =
  (typeof TERMINATION_REASONS)[keyof typeof TERMINATION_REASONS];

export interface ResearchState {
  readonly version: StateVersion;
  readonly query: string;
  readonly papers: readonly Paper[];
  readonly synthesis: Synthesis | null;
  readonly hypotheses: readonly Hypothesis[];
  readonly methodologies: readonly Methodology[];
  readonly validations: readonly Validation[];
  readonly attemptCounters: Readonly<Record<AttemptKey, number>>;
  readonly stage: Stage;
  readonly terminal: boolean;
  readonly terminationReason: TerminationReason | null;
  /** Set when the run ended without satisfying every gate. */
  readonly partial: boolean;
  readonly warnings: readonly string[];
}

/**
 * What an executor hands back. Only the fields owned by the executor's
 * capability are merged; see `DELTA_FIELDS`.
 */
export interface StateDelta {
  papers?: Paper[];
  removePaperIds?: string[];
  synthesis?: Synthesis;
  hypotheses?: Hypothesis[];
  methodologies?: Methodology[];
  validations?: Validation[];
}

export const DELTA_FIELDS: Record<Capability, (keyof StateDelta)[]> = {
  literature_search: ["papers", "removePaperIds"],
  knowledge_synthesis: ["synthesis"],
  hypothesis_generation: ["hypotheses"],
  methodology_design: ["methodologies"],
  validation: ["validations"],
};

export interface ExecutorParams {
  /** 1-based attempt number for the attempt key being invoked. */
  attempt: number;
  maxResults?: number;
  domainHint?: string;
  followUp?: boolean;
  gaps?: string[];
  hypothesisIds?: string[];
}

export type RoutingDecision =
  | { kind: "invoke"; capability: Capability; params: ExecutorParams }
  | {
      kind: "retry";
      capability: Capability;
      params: ExecutorParams;
      backoffMs: number;
    }
  | { kind: "terminate"; reason: TerminationReason };

export type ExecutorResult =
  | { kind: "success"; delta: StateDelta }
  | { kind: "partial_success"; delta: StateDelta; warning: string }
  | { kind: "transient_failure"; reason: string }
  | { kind: "fatal_failure"; reason: string };

export type OutcomeStatus =
  | "success"
  | "partial_success"
  | "transient_failure"
  | "timeout"
  | "fatal_failure"
  | "cancelled"
  | "none";

export interface InvocationRecord {
  hypothesis_id: string | null;
  outcome: OutcomeStatus;
  reason: string | null;
  duration_ms: number;
}

export interface LedgerEntry {
  seq: number;
  at: string;
  decision: RoutingDecision;
  capability: Capability | null;
  attempt_key: AttemptKey | null;
  outcome: OutcomeStatus;
  previous_version: StateVersion;
  state_version: StateVersion;
  duration_ms: number;
  diagnostics: string[];
  delta: StateDelta | null;
  invocations: InvocationRecord[];
  warning: string | null;
  reason: string | null;
}

export interface RunRecord {
  run_id: RunId;
  query: string;
  created_at: string;
  config: unknown;
}
