import { type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  ATTEMPT_KEYS,
  CAPABILITIES,
  type LedgerEntry,
  type ResearchState,
  type RunRecord,
  STAGE_ORDER,
  type StateDelta,
  TERMINATION_REASONS,
} from "./types";

const UnitInterval = Type.Number({ minimum: 0, maximum: 1 });

export const CapabilitySchema = Type.Union(
  CAPABILITIES.map((capability) => Type.Literal(capability)),
);

const AttemptKeySchema = Type.Union(
  ATTEMPT_KEYS.map((key) => Type.Literal(key)),
);

const StageSchema = Type.Union(STAGE_ORDER.map((stage) => Type.Literal(stage)));

const TerminationReasonSchema = Type.Union(
  Object.values(TERMINATION_REASONS).map((reason) => Type.Literal(reason)),
);

export const PaperSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  title: Type.String(),
  relevance: UnitInterval,
  metadata: Type.Record(Type.String(), Type.Unknown()),
});

export const SynthesisSchema = Type.Object({
  themes: Type.Array(Type.String()),
  contradictions: Type.Array(Type.Tuple([Type.String(), Type.String()])),
  gaps: Type.Array(Type.String()),
  confidence: UnitInterval,
});

export const HypothesisSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  text: Type.String(),
  confidence: UnitInterval,
  supportingEvidenceIds: Type.Array(Type.String()),
});

export const MethodologySchema = Type.Object({
  hypothesisId: Type.String({ minLength: 1 }),
  approach: Type.String(),
  sampleSize: Type.Optional(Type.Integer({ minimum: 0 })),
  estimatedDuration: Type.Optional(Type.String()),
  requirements: Type.Array(Type.String()),
});

export const VerdictSchema = Type.Union([
  Type.Literal("supported"),
  Type.Literal("contested"),
  Type.Literal("inconclusive"),
]);

export const ValidationSchema = Type.Object({
  hypothesisRef: Type.String({ minLength: 1 }),
  verdict: VerdictSchema,
  rationale: Type.String(),
  score: UnitInterval,
});

export const StateDeltaSchema = Type.Object({
  papers: Type.Optional(Type.Array(PaperSchema)),
  removePaperIds: Type.Optional(Type.Array(Type.String())),
  synthesis: Type.Optional(SynthesisSchema),
  hypotheses: Type.Optional(Type.Array(HypothesisSchema)),
  methodologies: Type.Optional(Type.Array(MethodologySchema)),
  validations: Type.Optional(Type.Array(ValidationSchema)),
});

const ExecutorParamsSchema = Type.Object({
  attempt: Type.Integer({ minimum: 1 }),
  maxResults: Type.Optional(Type.Integer({ minimum: 1 })),
  domainHint: Type.Optional(Type.String()),
  followUp: Type.Optional(Type.Boolean()),
  gaps: Type.Optional(Type.Array(Type.String())),
  hypothesisIds: Type.Optional(Type.Array(Type.String())),
});

const RoutingDecisionSchema = Type.Union([
  Type.Object({
    kind: Type.Literal("invoke"),
    capability: CapabilitySchema,
    params: ExecutorParamsSchema,
  }),
  Type.Object({
    kind: Type.Literal("retry"),
    capability: CapabilitySchema,
    params: ExecutorParamsSchema,
    backoffMs: Type.Number({ minimum: 0 }),
  }),
  Type.Object({
    kind: Type.Literal("terminate"),
    reason: TerminationReasonSchema,
  }),
]);

const OutcomeStatusSchema = Type.Union(
  [
    "success",
    "partial_success",
    "transient_failure",
    "timeout",
    "fatal_failure",
    "cancelled",
    "none",
  ].map((outcome) => Type.Literal(outcome)),
);

const InvocationRecordSchema = Type.Object({
  hypothesis_id: Type.Union([Type.String(), Type.Null()]),
  outcome: OutcomeStatusSchema,
  reason: Type.Union([Type.String(), Type.Null()]),
  duration_ms: Type.Number({ minimum: 0 }),
});

const VersionSchema = Type.String({ pattern: "^[0-9a-f]{32}$" });

export const LedgerEntrySchema = Type.Object({
  seq: Type.Integer({ minimum: 1 }),
  at: Type.String(),
  decision: RoutingDecisionSchema,
  capability: Type.Union([CapabilitySchema, Type.Null()]),
  attempt_key: Type.Union([AttemptKeySchema, Type.Null()]),
  outcome: OutcomeStatusSchema,
  previous_version: VersionSchema,
  state_version: VersionSchema,
  duration_ms: Type.Number({ minimum: 0 }),
  diagnostics: Type.Array(Type.String()),
  delta: Type.Union([StateDeltaSchema, Type.Null()]),
  invocations: Type.Array(InvocationRecordSchema),
  warning: Type.Union([Type.String(), Type.Null()]),
  reason: Type.Union([Type.String(), Type.Null()]),
});

export const ResearchStateSchema = Type.Object({
  version: VersionSchema,
  query: Type.String({ minLength: 1 }),
  papers: Type.Array(PaperSchema),
  synthesis: Type.Union([SynthesisSchema, Type.Null()]),
  hypotheses: Type.Array(HypothesisSchema),
  methodologies: Type.Array(MethodologySchema),
  validations: Type.Array(ValidationSchema),
  attemptCounters: Type.Object(
    Object.fromEntries(
      ATTEMPT_KEYS.map((key) => [key, Type.Integer({ minimum: 0 })]),
    ),
  ),
  stage: StageSchema,
  terminal: Type.Boolean(),
  terminationReason: Type.Union([TerminationReasonSchema, Type.Null()]),
  partial: Type.Boolean(),
  warnings: Type.Array(Type.String()),
});

export const RunRecordSchema = Type.Object({
  run_id: Type.String({ minLength: 1 }),
  query: Type.String({ minLength: 1 }),
  created_at: Type.String(),
  config: Type.Unknown(),
});

/** Human-readable schema violations, empty when `value` conforms. */
export const schemaErrors = (schema: TSchema, value: unknown): string[] =>
  [...Value.Errors(schema, value)].map(
    (error) => `${error.path || "/"}: ${error.message}`,
  );

export const isLedgerEntry = (value: unknown): value is LedgerEntry =>
  Value.Check(LedgerEntrySchema, value);

export const isResearchStateSnapshot = (
  value: unknown,
): value is ResearchState => Value.Check(ResearchStateSchema, value);

export const isRunRecord = (value: unknown): value is RunRecord =>
  Value.Check(RunRecordSchema, value);

export const isStateDelta = (value: unknown): value is StateDelta =>
  Value.Check(StateDeltaSchema, value);

export type DeltaCheck =
  | { ok: true; delta: StateDelta }
  | { ok: false; errors: string[] };

/**
 * The JSON form of an executor delta, checked against `StateDeltaSchema`.
 * Merged state and persisted ledger entries both hold this form, so a
 * stored run hashes the same when it is replayed.
 */
export const toPlainDelta = (delta: unknown): DeltaCheck => {
  let plain: unknown;
  try {
    plain = JSON.parse(JSON.stringify(delta) ?? "null") as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, errors: [`not serialisable as JSON (${message})`] };
  }
  return isStateDelta(plain)
    ? { ok: true, delta: plain }
    : { ok: false, errors: schemaErrors(StateDeltaSchema, plain) };
};
