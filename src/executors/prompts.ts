import type {
  Capability,
  ExecutorParams,
  Hypothesis,
  Paper,
  ResearchState,
} from "../core/types";

const INSTRUCTIONS: Record<Exclude<Capability, "literature_search">, string> =
  {
    knowledge_synthesis:
      "Synthesise the papers below. Identify recurring themes, pairs of claims that contradict each other, and open gaps. Rate your overall confidence between 0 and 1.",
    hypothesis_generation:
      "Propose testable hypotheses that follow from the synthesis. Each hypothesis cites the ids of the papers that support it and carries a confidence between 0 and 1.",
    methodology_design:
      "Design a study for each listed hypothesis: the approach, the sample size where one applies, an estimated duration and the resources it requires.",
    validation:
      "Assess the hypothesis against the evidence. Answer with a verdict of supported, contested or inconclusive, a short rationale and a score between 0 and 1.",
  };

const OUTPUT_SHAPES: Record<Exclude<Capability, "literature_search">, string> =
  {
    knowledge_synthesis: `{
  "themes": ["<string>"],
  "contradictions": [["<claim>", "<conflicting claim>"]],
  "gaps": ["<string>"],
  "confidence": <number>
}`,
    hypothesis_generation: `{
  "hypotheses": [
    { "text": "<string>", "confidence": <number>, "supportingEvidenceIds": ["<paper id>"] }
  ]
}`,
    methodology_design: `{
  "methodologies": [
    { "hypothesisId": "<id>", "approach": "<string>", "sampleSize": <number>, "estimatedDuration": "<string>", "requirements": ["<string>"] }
  ]
}`,
    validation: `{
  "verdict": "supported" | "contested" | "inconclusive",
  "rationale": "<string>",
  "score": <number>
}`,
  };

export type ModelCapability = keyof typeof INSTRUCTIONS;

const formatPapers = (papers: readonly Paper[], limit: number): string =>
  [...papers]
    .sort((a, b) => b.relevance - a.relevance)
    .slice(0, limit)
    .map(
      (paper) =>
        `- [${paper.id}] ${paper.title} (relevance ${paper.relevance.toFixed(2)})`,
    )
    .join("\n");

const formatHypotheses = (hypotheses: readonly Hypothesis[]): string =>
  hypotheses
    .map(
      (hypothesis) =>
        `- [${hypothesis.id}] ${hypothesis.text} (confidence ${hypothesis.confidence.toFixed(2)})`,
    )
    .join("\n");

export interface BuildCapabilityPromptInput {
  capability: ModelCapability;
  snapshot: ResearchState;
  params: ExecutorParams;
  /** Hypotheses the call is scoped to; empty for synthesis and generation. */
  focus?: readonly Hypothesis[];
  maxPapers?: number;
}

export const buildCapabilityPrompt = (
  input: BuildCapabilityPromptInput,
): string => {
  const { capability, snapshot, params } = input;
  const sections: string[] = [];

  sections.push(`# Task: ${capability.replace(/_/g, " ")}`);
  sections.push(`## Research Question\n\n${snapshot.query}`);
  sections.push(`## Instructions\n\n${INSTRUCTIONS[capability]}`);

  if (snapshot.papers.length > 0) {
    sections.push(
      `## Evidence\n\n${formatPapers(snapshot.papers, input.maxPapers ?? 20)}`,
    );
  }

  const synthesis = snapshot.synthesis;
  if (synthesis && capability !== "knowledge_synthesis") {
    const lines = [
      `- Themes: ${synthesis.themes.join("; ") || "(none)"}`,
      `- Gaps: ${synthesis.gaps.join("; ") || "(none)"}`,
      `- Confidence: ${synthesis.confidence.toFixed(2)}`,
    ];
    sections.push(`## Synthesis\n\n${lines.join("\n")}`);
  }

  const focus = input.focus ?? [];
  if (focus.length > 0) {
    sections.push(`## Hypotheses\n\n${formatHypotheses(focus)}`);
  }

  if (params.attempt > 1) {
    sections.push(
      `## Retry Context\n\nThis is attempt #${params.attempt}. The previous output did not meet the quality bar; be more thorough.`,
    );
  }

  sections.push(
    `## Output\n\nRespond with JSON only, shaped as:\n\`\`\`json\n${OUTPUT_SHAPES[capability]}\n\`\`\``,
  );

  return sections.join("\n\n");
};
