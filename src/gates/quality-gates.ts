import type { Hypothesis, ResearchState } from "../core/types";

export interface QualityThresholds {
  minPapers: number;
  /** How many of the most relevant papers feed the relevance mean. */
  topN: number;
  minRelevance: number;
  minSynthesisConfidence: number;
  minThemes: number;
  minHypothesisConfidence: number;
  validationWorthyThreshold: number;
}

export interface GateResult {
  passed: boolean;
  diagnostic: string;
}

const format = (value: number): string => value.toFixed(2);

export const meanTopRelevance = (state: ResearchState, topN: number): number => {
  const top = state.papers
    .map((paper) => paper.relevance)
    .sort((a, b) => b - a)
    .slice(0, Math.max(topN, 0));
  if (top.length === 0) {
    return 0;
  }
  return top.reduce((sum, value) => sum + value, 0) / top.length;
};

export const literatureGate = (
  state: ResearchState,
  thresholds: QualityThresholds,
): GateResult => {
  const count = state.papers.length;
  const relevance = meanTopRelevance(state, thresholds.topN);

  if (count < thresholds.minPapers) {
    return {
      passed: false,
      diagnostic: `literature: ${count} papers < minPapers ${thresholds.minPapers}`,
    };
  }

  if (relevance < thresholds.minRelevance) {
    return {
      passed: false,
      diagnostic: `literature: top-${thresholds.topN} mean relevance ${format(relevance)} < ${format(thresholds.minRelevance)}`,
    };
  }

  return {
    passed: true,
    diagnostic: `literature: ${count} papers, top-${thresholds.topN} mean relevance ${format(relevance)}`,
  };
};

export const synthesisGate = (
  state: ResearchState,
  thresholds: QualityThresholds,
): GateResult => {
  const synthesis = state.synthesis;
  if (!synthesis) {
    return { passed: false, diagnostic: "synthesis: absent" };
  }

  if (synthesis.confidence < thresholds.minSynthesisConfidence) {
    return {
      passed: false,
      diagnostic: `synthesis: confidence ${format(synthesis.confidence)} < ${format(thresholds.minSynthesisConfidence)}`,
    };
  }

  if (synthesis.themes.length < thresholds.minThemes) {
    return {
      passed: false,
      diagnostic: `synthesis: ${synthesis.themes.length} themes < minThemes ${thresholds.minThemes}`,
    };
  }

  return {
    passed: true,
    diagnostic: `synthesis: ${synthesis.themes.length} themes, confidence ${format(synthesis.confidence)}`,
  };
};

export const bestHypothesis = (
  hypotheses: readonly Hypothesis[],
): Hypothesis | undefined =>
  hypotheses.reduce<Hypothesis | undefined>(
    (best, hypothesis) =>
      !best || hypothesis.confidence > best.confidence ? hypothesis : best,
    undefined,
  );

export const hypothesisGate = (
  state: ResearchState,
  thresholds: QualityThresholds,
): GateResult => {
  const best = bestHypothesis(state.hypotheses);
  if (!best) {
    return { passed: false, diagnostic: "hypotheses: none generated" };
  }

  if (best.confidence < thresholds.minHypothesisConfidence) {
    return {
      passed: false,
      diagnostic: `hypotheses: best confidence ${format(best.confidence)} < ${format(thresholds.minHypothesisConfidence)}`,
    };
  }

  return {
    passed: true,
    diagnostic: `hypotheses: best confidence ${format(best.confidence)} (${best.id})`,
  };
};

/**
 * Hypotheses at or above the validation-worthy threshold, strongest first.
 * Equal confidences keep their generation order.
 */
export const validationWorthy = (
  state: ResearchState,
  thresholds: QualityThresholds,
): Hypothesis[] =>
  state.hypotheses
    .map((hypothesis, index) => ({ hypothesis, index }))
    .filter(
      ({ hypothesis }) =>
        hypothesis.confidence >= thresholds.validationWorthyThreshold,
    )
    .sort(
      (a, b) =>
        b.hypothesis.confidence - a.hypothesis.confidence || a.index - b.index,
    )
    .map(({ hypothesis }) => hypothesis);

export const uncoveredHypotheses = (
  state: ResearchState,
  thresholds: QualityThresholds,
): Hypothesis[] => {
  const validated = new Set(
    state.validations.map((validation) => validation.hypothesisRef),
  );
  return validationWorthy(state, thresholds).filter(
    (hypothesis) => !validated.has(hypothesis.id),
  );
};

export const validationGate = (
  state: ResearchState,
  thresholds: QualityThresholds,
): GateResult => {
  const worthy = validationWorthy(state, thresholds);
  const missing = uncoveredHypotheses(state, thresholds);

  if (missing.length > 0) {
    return {
      passed: false,
      diagnostic: `validation: ${missing.length}/${worthy.length} worthy hypotheses unvalidated (${missing.map((h) => h.id).join(", ")})`,
    };
  }

  return {
    passed: true,
    diagnostic: `validation: ${worthy.length} worthy hypotheses covered`,
  };
};
