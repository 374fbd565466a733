import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { nanoid } from "nanoid";
import {
  MethodologySchema,
  SynthesisSchema,
  VerdictSchema,
} from "../core/schemas";
import type {
  ExecutorParams,
  ExecutorResult,
  Hypothesis,
  Methodology,
  ResearchState,
} from "../core/types";
import {
  type CapabilityExecutor,
  type ExecutionContext,
  fatalFailure,
  partialSuccess,
  success,
  transientFailure,
} from "./contract";
import { failureResult } from "./error-classification";
import { type ModelCapability, buildCapabilityPrompt } from "./prompts";

export interface StructuredRequest {
  capability: ModelCapability;
  prompt: string;
  signal: AbortSignal;
}

/**
 * A language model behind a single call that returns JSON, either parsed
 * or as text. Transport, authentication and model choice live behind it.
 */
export interface StructuredModelClient {
  complete(request: StructuredRequest): Promise<unknown>;
}

const HypothesisDraftSchema = Type.Object({
  text: Type.String({ minLength: 1 }),
  confidence: Type.Number({ minimum: 0, maximum: 1 }),
  supportingEvidenceIds: Type.Array(Type.String()),
});

const HypothesesOutputSchema = Type.Object({
  hypotheses: Type.Array(HypothesisDraftSchema),
});

const MethodologiesOutputSchema = Type.Object({
  methodologies: Type.Array(MethodologySchema),
});

const ValidationOutputSchema = Type.Object({
  verdict: VerdictSchema,
  rationale: Type.String(),
  score: Type.Number({ minimum: 0, maximum: 1 }),
});

type Parsed<T extends TSchema> =
  | { ok: true; value: Static<T> }
  | { ok: false; reason: string };

const MAX_REPORTED_ERRORS = 3;

/** Validate model output; JSON text is parsed first, fenced or not. */
export const parseModelOutput = <T extends TSchema>(
  schema: T,
  raw: unknown,
): Parsed<T> => {
  let value = raw;
  if (typeof raw === "string") {
    const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(raw);
    try {
      value = JSON.parse(fenced?.[1] ?? raw) as unknown;
    } catch {
      return { ok: false, reason: "malformed model output: not JSON" };
    }
  }

  if (Value.Check(schema, value)) {
    return { ok: true, value };
  }

  const errors = [...Value.Errors(schema, value)]
    .slice(0, MAX_REPORTED_ERRORS)
    .map((error) => `${error.path || "/"} ${error.message}`);
  return {
    ok: false,
    reason: `malformed model output: ${errors.join("; ")}`,
  };
};

abstract class ModelExecutor implements CapabilityExecutor {
  abstract readonly capability: ModelCapability;

  constructor(protected readonly client: StructuredModelClient) {}

  async execute(
    snapshot: ResearchState,
    params: ExecutorParams,
    context: ExecutionContext,
  ): Promise<ExecutorResult> {
    try {
      return await this.run(snapshot, params, context);
    } catch (error) {
      return failureResult(error);
    }
  }

  protected abstract run(
    snapshot: ResearchState,
    params: ExecutorParams,
    context: ExecutionContext,
  ): Promise<ExecutorResult>;

  protected complete(
    snapshot: ResearchState,
    params: ExecutorParams,
    context: ExecutionContext,
    focus: readonly Hypothesis[] = [],
  ): Promise<unknown> {
    return this.client.complete({
      capability: this.capability,
      prompt: buildCapabilityPrompt({
        capability: this.capability,
        snapshot,
        params,
        focus,
      }),
      signal: context.signal,
    });
  }
}

export class SynthesisExecutor extends ModelExecutor {
  readonly capability = "knowledge_synthesis" as const;

  protected async run(
    snapshot: ResearchState,
    params: ExecutorParams,
    context: ExecutionContext,
  ): Promise<ExecutorResult> {
    if (snapshot.papers.length === 0) {
      return fatalFailure("invalid_input: synthesis needs at least one paper");
    }

    const parsed = parseModelOutput(
      SynthesisSchema,
      await this.complete(snapshot, params, context),
    );
    if (!parsed.ok) {
      return transientFailure(parsed.reason);
    }

    return success({ synthesis: parsed.value });
  }
}

export interface HypothesisExecutorOptions {
  /** Id factory for generated hypotheses. */
  createId?: () => string;
}

export class HypothesisExecutor extends ModelExecutor {
  readonly capability = "hypothesis_generation" as const;
  private readonly createId: () => string;

  constructor(client: StructuredModelClient, options: HypothesisExecutorOptions = {}) {
    super(client);
    this.createId = options.createId ?? (() => `hyp_${nanoid(10)}`);
  }

  protected async run(
    snapshot: ResearchState,
    params: ExecutorParams,
    context: ExecutionContext,
  ): Promise<ExecutorResult> {
    const parsed = parseModelOutput(
      HypothesesOutputSchema,
      await this.complete(snapshot, params, context),
    );
    if (!parsed.ok) {
      return transientFailure(parsed.reason);
    }
    if (parsed.value.hypotheses.length === 0) {
      return transientFailure("model proposed no hypotheses");
    }

    const known = new Set(snapshot.papers.map((paper) => paper.id));
    let unknownCitations = 0;
    const hypotheses: Hypothesis[] = parsed.value.hypotheses.map((draft) => {
      const supportingEvidenceIds = draft.supportingEvidenceIds.filter((id) =>
        known.has(id),
      );
      unknownCitations +=
        draft.supportingEvidenceIds.length - supportingEvidenceIds.length;
      return {
        id: this.createId(),
        text: draft.text,
        confidence: draft.confidence,
        supportingEvidenceIds,
      };
    });

    return unknownCitations > 0
      ? partialSuccess(
          { hypotheses },
          `dropped ${unknownCitations} citations of unknown papers`,
        )
      : success({ hypotheses });
  }
}

/**
 * Designs methodologies for the hypotheses named in `params.hypothesisIds`.
 * The delta carries the full list, so designs for other hypotheses are
 * kept as they are.
 */
export class MethodologyExecutor extends ModelExecutor {
  readonly capability = "methodology_design" as const;

  protected async run(
    snapshot: ResearchState,
    params: ExecutorParams,
    context: ExecutionContext,
  ): Promise<ExecutorResult> {
    const targets = snapshot.hypotheses.filter((hypothesis) =>
      (params.hypothesisIds ?? []).includes(hypothesis.id),
    );
    if (targets.length === 0) {
      return fatalFailure("invalid_input: no known hypotheses to design for");
    }

    const parsed = parseModelOutput(
      MethodologiesOutputSchema,
      await this.complete(snapshot, params, context, targets),
    );
    if (!parsed.ok) {
      return transientFailure(parsed.reason);
    }

    const targetIds = new Set(targets.map((hypothesis) => hypothesis.id));
    const designed: Methodology[] = parsed.value.methodologies.filter(
      (methodology) => targetIds.has(methodology.hypothesisId),
    );
    if (designed.length === 0) {
      return transientFailure("model designed no methodology for the requested hypotheses");
    }

    const designedIds = new Set(designed.map((item) => item.hypothesisId));
    const methodologies = [
      ...snapshot.methodologies.filter(
        (methodology) => !designedIds.has(methodology.hypothesisId),
      ),
      ...designed,
    ];
    const missing = targets.filter((hypothesis) => !designedIds.has(hypothesis.id));

    return missing.length > 0
      ? partialSuccess(
          { methodologies },
          `no methodology for ${missing.map((hypothesis) => hypothesis.id).join(", ")}`,
        )
      : success({ methodologies });
  }
}

/** Validates the single hypothesis named in `params.hypothesisIds`. */
export class ValidationExecutor extends ModelExecutor {
  readonly capability = "validation" as const;

  protected async run(
    snapshot: ResearchState,
    params: ExecutorParams,
    context: ExecutionContext,
  ): Promise<ExecutorResult> {
    const [hypothesisId, ...rest] = params.hypothesisIds ?? [];
    const hypothesis = snapshot.hypotheses.find((item) => item.id === hypothesisId);
    if (!hypothesis || rest.length > 0) {
      return fatalFailure(
        `invalid_input: validation takes exactly one known hypothesis, got ${JSON.stringify(params.hypothesisIds ?? [])}`,
      );
    }

    const parsed = parseModelOutput(
      ValidationOutputSchema,
      await this.complete(snapshot, params, context, [hypothesis]),
    );
    if (!parsed.ok) {
      return transientFailure(parsed.reason);
    }

    return success({
      validations: [{ hypothesisRef: hypothesis.id, ...parsed.value }],
    });
  }
}

export const createModelExecutors = (
  client: StructuredModelClient,
  options: HypothesisExecutorOptions = {},
): CapabilityExecutor[] => [
  new SynthesisExecutor(client),
  new HypothesisExecutor(client, options),
  new MethodologyExecutor(client),
  new ValidationExecutor(client),
];
