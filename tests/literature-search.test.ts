import { describe, expect, it } from "vitest";
import { asRunId } from "../src/core/types";
import { ExecutorError } from "../src/executors/error-classification";
import {
  LiteratureSearchExecutor,
  type PaperQuery,
  type PaperSource,
  type SourcePaper,
  deduplicatePapers,
  keywordRelevance,
  normalizeTitle,
} from "../src/executors/literature-search";
import { makePapers, seededState } from "./helpers/stub-executors";

const QUERY = "caffeine improves memory recall";

const context = { runId: asRunId("run-test"), signal: new AbortController().signal };

const source = (
  name: string,
  result: SourcePaper[] | Error,
): PaperSource & { queries: PaperQuery[] } => {
  const queries: PaperQuery[] = [];
  return {
    name,
    queries,
    async search(query) {
      queries.push(query);
      if (result instanceof Error) throw result;
      return result;
    },
  };
};

const sourceA = (): ReturnType<typeof source> =>
  source("arxiv", [
    { id: "a1", title: "Caffeine improves memory recall", relevance: 0.9 },
    { id: "a2", title: "Sleep and memory", abstract: "caffeine" },
  ]);

const sourceB = (): ReturnType<typeof source> =>
  source("pubmed", [
    { id: "b1", title: "Caffeine Improves Memory Recall!", relevance: 0.95 },
  ]);

describe("literature helpers", () => {
  it("normalizes titles for duplicate detection", () => {
    expect(normalizeTitle("Caffeine, Memory & Recall (2024)")).toBe(
      "caffeinememoryrecall2024",
    );
  });

  it("scores keyword overlap with the query", () => {
    expect(
      keywordRelevance(QUERY, { id: "x", title: "Caffeine improves memory recall" }),
    ).toBeCloseTo(0.7);
    expect(
      keywordRelevance(QUERY, { id: "x", title: "Sleep and memory", abstract: "caffeine" }),
    ).toBeCloseTo(0.25);
    expect(keywordRelevance("   ", { id: "x", title: "anything" })).toBe(0);
  });

  it("keeps the more relevant copy of a duplicate in the first position", () => {
    const papers = deduplicatePapers([
      { id: "a1", title: "Same Title", relevance: 0.4, metadata: {} },
      { id: "a2", title: "Other", relevance: 0.6, metadata: {} },
      { id: "b9", title: "same title", relevance: 0.8, metadata: {} },
      { id: "a2", title: "Other (preprint)", relevance: 0.1, metadata: {} },
    ]);

    expect(papers.map((paper) => paper.id)).toEqual(["b9", "a2"]);
  });
});

describe("LiteratureSearchExecutor", () => {
  it("requires at least one source", () => {
    expect(() => new LiteratureSearchExecutor({ sources: [] })).toThrow(
      "LiteratureSearchExecutor needs at least one source",
    );
  });

  it("merges sources, deduplicates and ranks by relevance", async () => {
    const a = sourceA();
    const executor = new LiteratureSearchExecutor({ sources: [a, sourceB()] });

    const result = await executor.execute(
      seededState({}, QUERY),
      { attempt: 2, maxResults: 100, domainHint: "neuroscience", followUp: true, gaps: ["dose"] },
      context,
    );

    expect(result.kind).toBe("success");
    if (result.kind !== "success") return;
    expect(result.delta.removePaperIds).toBeUndefined();
    const papers = result.delta.papers ?? [];
    expect(papers.map((paper) => paper.id)).toEqual(["b1", "a2"]);
    expect(papers[0]?.metadata).toEqual({ source: "pubmed" });
    expect(papers[1]?.metadata).toEqual({ source: "arxiv", abstract: "caffeine" });
    expect(papers[1]?.relevance).toBeCloseTo(0.25);
    expect(a.queries[0]).toMatchObject({
      query: QUERY,
      maxResults: 100,
      domainHint: "neuroscience",
      gaps: ["dose"],
    });
  });

  it("clamps relevance and truncates to maxResults", async () => {
    const executor = new LiteratureSearchExecutor({
      sources: [
        source("s", [
          { id: "x1", title: "Overconfident", relevance: 1.4 },
          { id: "x2", title: "Negative", relevance: -0.2 },
        ]),
      ],
    });

    const result = await executor.execute(
      seededState({}, QUERY),
      { attempt: 1, maxResults: 1 },
      context,
    );

    expect(result).toEqual({
      kind: "success",
      delta: {
        papers: [
          { id: "x1", title: "Overconfident", relevance: 1, metadata: { source: "s" } },
        ],
      },
    });
  });

  it("replaces a known paper only with a more relevant copy", async () => {
    const executor = new LiteratureSearchExecutor({ sources: [sourceB()] });
    const weaker = seededState(
      {
        papers: [
          { id: "x1", title: "Caffeine improves memory recall", relevance: 0.5, metadata: {} },
        ],
      },
      QUERY,
    );
    const stronger = seededState(
      {
        papers: [
          { id: "x1", title: "Caffeine improves memory recall", relevance: 0.99, metadata: {} },
        ],
      },
      QUERY,
    );

    const replaced = await executor.execute(weaker, { attempt: 1 }, context);
    const kept = await executor.execute(stronger, { attempt: 1 }, context);

    expect(replaced.kind === "success" && replaced.delta.removePaperIds).toEqual(["x1"]);
    expect(replaced.kind === "success" && replaced.delta.papers?.map((p) => p.id)).toEqual([
      "b1",
    ]);
    expect(kept).toEqual({ kind: "success", delta: { papers: [] } });
  });

  it("keeps a known paper when a copy with the same id is less relevant", async () => {
    const executor = new LiteratureSearchExecutor({ sources: [sourceB()] });
    const known = seededState(
      {
        papers: [
          { id: "b1", title: "Caffeine improves memory recall", relevance: 0.99, metadata: {} },
        ],
      },
      QUERY,
    );
    const weaker = seededState(
      {
        papers: [
          { id: "b1", title: "Caffeine improves memory recall", relevance: 0.6, metadata: {} },
        ],
      },
      QUERY,
    );

    const kept = await executor.execute(known, { attempt: 1 }, context);
    const upgraded = await executor.execute(weaker, { attempt: 1 }, context);

    expect(kept).toEqual({ kind: "success", delta: { papers: [] } });
    expect(upgraded.kind === "success" && upgraded.delta.removePaperIds).toBeUndefined();
    expect(upgraded.kind === "success" && upgraded.delta.papers?.map((p) => p.relevance)).toEqual([
      0.95,
    ]);
  });

  it("reports a partial success when some sources fail", async () => {
    const executor = new LiteratureSearchExecutor({
      sources: [source("arxiv", new Error("503 Service Unavailable")), sourceB()],
    });

    const result = await executor.execute(
      seededState({ papers: makePapers(1, 0.2) }, QUERY),
      { attempt: 1 },
      context,
    );

    expect(result.kind).toBe("partial_success");
    expect(result.kind === "partial_success" && result.warning).toBe(
      "literature sources failed: arxiv (unavailable: 503 Service Unavailable)",
    );
  });

  it("fails transiently when every source fails and any could recover", async () => {
    const executor = new LiteratureSearchExecutor({
      sources: [
        source("arxiv", new Error("rate limit exceeded")),
        source("pubmed", new ExecutorError("bad key", true, "auth")),
      ],
    });

    expect(await executor.execute(seededState({}, QUERY), { attempt: 1 }, context)).toEqual({
      kind: "transient_failure",
      reason:
        "all literature sources failed: arxiv (rate_limit: rate limit exceeded), pubmed (auth: bad key)",
    });
  });

  it("fails fatally when every source fails fatally", async () => {
    const executor = new LiteratureSearchExecutor({
      sources: [source("pubmed", new ExecutorError("bad key", true, "auth"))],
    });

    expect(await executor.execute(seededState({}, QUERY), { attempt: 1 }, context)).toEqual({
      kind: "fatal_failure",
      reason: "all literature sources failed: pubmed (auth: bad key)",
    });
  });
});
