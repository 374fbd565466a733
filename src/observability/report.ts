import type {
  AttemptKey,
  LedgerEntry,
  ResearchState,
  RoutingDecision,
} from "../core/types";

export interface RunSummary {
  query: string;
  stage: string;
  status: string;
  partial: boolean;
  cycles: number;
  papers: number;
  hypotheses: number;
  validations: number;
  methodologies: number;
  failedCycles: number;
  attempts: Readonly<Record<AttemptKey, number>>;
}

const FAILED_OUTCOMES = new Set(["transient_failure", "timeout", "fatal_failure"]);

export const buildRunSummary = (
  state: ResearchState,
  entries: readonly LedgerEntry[],
): RunSummary => ({
  query: state.query,
  stage: state.stage,
  status: state.terminationReason ?? "running",
  partial: state.partial,
  cycles: entries.length,
  papers: state.papers.length,
  hypotheses: state.hypotheses.length,
  validations: state.validations.length,
  methodologies: state.methodologies.length,
  failedCycles: entries.filter((entry) => FAILED_OUTCOMES.has(entry.outcome))
    .length,
  attempts: state.attemptCounters,
});

export const buildOverviewLines = (summary: RunSummary): string[] => [
  `status=${summary.status}`,
  `stage=${summary.stage}`,
  `partial=${summary.partial}`,
  `cycles=${summary.cycles}`,
  `failed_cycles=${summary.failedCycles}`,
  `papers=${summary.papers}`,
  `hypotheses=${summary.hypotheses}`,
  `validations=${summary.validations}`,
];

const describeDecision = (decision: RoutingDecision): string => {
  switch (decision.kind) {
    case "invoke":
      return `invoke ${decision.capability}`;
    case "retry":
      return `retry ${decision.capability} (+${decision.backoffMs}ms)`;
    case "terminate":
      return "terminate";
  }
};

const renderSection = (title: string, lines: string[]): string[] => [
  `=== ${title} ===`,
  ...(lines.length > 0 ? lines : ["(empty)"]),
];

const renderTable = (headers: string[], rows: string[][]): string[] => {
  if (rows.length === 0) {
    return ["(empty)"];
  }

  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => (row[index] ?? "").length)),
  );

  const formatRow = (values: string[]): string =>
    values
      .map((value, index) => value.padEnd(widths[index] ?? 0))
      .join(" | ")
      .trimEnd();

  return [
    formatRow(headers),
    widths.map((width) => "-".repeat(width)).join("-+-"),
    ...rows.map((row) => formatRow(row)),
  ];
};

export const buildLedgerRows = (entries: readonly LedgerEntry[]): string[][] =>
  entries.map((entry) => [
    `${entry.seq}`,
    describeDecision(entry.decision),
    entry.outcome,
    `${entry.duration_ms}ms`,
  ]);

export const buildRunReportLines = (
  state: ResearchState,
  entries: readonly LedgerEntry[],
): string[] => [
  ...renderSection("run", buildOverviewLines(buildRunSummary(state, entries))),
  ...renderSection(
    "cycles",
    renderTable(["seq", "decision", "outcome", "duration"], buildLedgerRows(entries)),
  ),
  ...renderSection("warnings", [...state.warnings]),
];

/** Human-readable report of a finished (or partial) run. */
export const buildMarkdownReport = (
  state: ResearchState,
  entries: readonly LedgerEntry[],
  options: { maxPapers?: number } = {},
): string => {
  const summary = buildRunSummary(state, entries);
  const sections: string[] = [];

  sections.push(`# Research report: ${state.query}`);
  sections.push(
    [
      `- Status: ${summary.status}${summary.partial ? " (partial)" : ""}`,
      `- Stage reached: ${summary.stage}`,
      `- Cycles: ${summary.cycles}`,
    ].join("\n"),
  );

  const papers = [...state.papers]
    .sort((a, b) => b.relevance - a.relevance)
    .slice(0, options.maxPapers ?? 10);
  sections.push(
    `## Evidence\n\n${
      papers.length > 0
        ? papers
            .map(
              (paper) =>
                `- ${paper.title} (\`${paper.id}\`, relevance ${paper.relevance.toFixed(2)})`,
            )
            .join("\n")
        : "No papers found."
    }`,
  );

  if (state.synthesis) {
    const { themes, gaps, contradictions, confidence } = state.synthesis;
    const lines = [
      `Confidence: ${confidence.toFixed(2)}`,
      "",
      ...themes.map((theme) => `- Theme: ${theme}`),
      ...contradictions.map(([a, b]) => `- Contradiction: ${a} vs. ${b}`),
      ...gaps.map((gap) => `- Gap: ${gap}`),
    ];
    sections.push(`## Synthesis\n\n${lines.join("\n")}`);
  }

  if (state.hypotheses.length > 0) {
    const blocks = state.hypotheses.map((hypothesis) => {
      const lines = [
        `### ${hypothesis.text}`,
        "",
        `- Confidence: ${hypothesis.confidence.toFixed(2)}`,
      ];
      const validation = state.validations.find(
        (item) => item.hypothesisRef === hypothesis.id,
      );
      lines.push(
        validation
          ? `- Verdict: ${validation.verdict} (${validation.score.toFixed(2)}): ${validation.rationale}`
          : "- Verdict: not validated",
      );
      const methodology = state.methodologies.find(
        (item) => item.hypothesisId === hypothesis.id,
      );
      if (methodology) {
        lines.push(`- Methodology: ${methodology.approach}`);
      }
      return lines.join("\n");
    });
    sections.push(`## Hypotheses\n\n${blocks.join("\n\n")}`);
  }

  if (state.warnings.length > 0) {
    sections.push(
      `## Warnings\n\n${state.warnings.map((warning) => `- ${warning}`).join("\n")}`,
    );
  }

  return `${sections.join("\n\n")}\n`;
};
