import type {
  ExecutorParams,
  ExecutorResult,
  Paper,
  ResearchState,
} from "../core/types";
import { createModuleLogger } from "../observability/logger";
import {
  type CapabilityExecutor,
  type ExecutionContext,
  fatalFailure,
  partialSuccess,
  success,
  transientFailure,
} from "./contract";
import { classifyError } from "./error-classification";

const log = createModuleLogger("literature-search");

export interface PaperQuery {
  query: string;
  maxResults: number;
  domainHint?: string;
  /** Gaps a synthesis reported; set on follow-up searches. */
  gaps: readonly string[];
  signal: AbortSignal;
}

/** One paper as a source reports it, before scoring and deduplication. */
export interface SourcePaper {
  id: string;
  title: string;
  abstract?: string;
  relevance?: number;
  metadata?: Record<string, unknown>;
}

export interface PaperSource {
  readonly name: string;
  search(query: PaperQuery): Promise<SourcePaper[]>;
}

export const normalizeTitle = (title: string): string =>
  title.toLowerCase().replace(/[^a-z0-9]+/g, "");

const clamp = (value: number): number =>
  Number.isFinite(value) ? Math.min(Math.max(value, 0), 1) : 0;

const words = (text: string): Set<string> =>
  new Set(text.toLowerCase().split(/\s+/).filter(Boolean));

/**
 * Keyword overlap with the query for sources that report no score:
 * title overlap weighs 0.7, abstract overlap 0.3.
 */
export const keywordRelevance = (query: string, paper: SourcePaper): number => {
  const queryWords = words(query);
  if (queryWords.size === 0) {
    return 0;
  }

  const overlap = (text: string): number => {
    const candidate = words(text);
    let shared = 0;
    for (const word of queryWords) {
      if (candidate.has(word)) shared += 1;
    }
    return shared / queryWords.size;
  };

  return overlap(paper.title) * 0.7 + overlap(paper.abstract ?? "") * 0.3;
};

const toPaper = (query: string, source: string, raw: SourcePaper): Paper => ({
  id: raw.id,
  title: raw.title,
  relevance: clamp(raw.relevance ?? keywordRelevance(query, raw)),
  metadata: {
    ...raw.metadata,
    source,
    ...(raw.abstract ? { abstract: raw.abstract } : {}),
  },
});

/**
 * Collapse duplicates by id or normalised title, keeping the more relevant
 * copy in the position of the first one seen.
 */
export const deduplicatePapers = (papers: readonly Paper[]): Paper[] => {
  const unique: Paper[] = [];
  const byKey = new Map<string, number>();

  for (const paper of papers) {
    const keys = [`id:${paper.id}`, `title:${normalizeTitle(paper.title)}`];
    const index = keys
      .map((key) => byKey.get(key))
      .find((value) => value !== undefined);

    if (index === undefined) {
      for (const key of keys) byKey.set(key, unique.length);
      unique.push(paper);
      continue;
    }

    const existing = unique[index];
    if (existing && paper.relevance > existing.relevance) {
      unique[index] = paper;
    }
    for (const key of keys) byKey.set(key, index);
  }

  return unique;
};

export interface LiteratureSearchOptions {
  sources: readonly PaperSource[];
  defaultMaxResults?: number;
}

/**
 * Queries every source in parallel and merges what comes back. Papers
 * that duplicate one already in the state under another id replace it
 * only when they are more relevant.
 */
export class LiteratureSearchExecutor implements CapabilityExecutor {
  readonly capability = "literature_search" as const;

  constructor(private readonly options: LiteratureSearchOptions) {
    if (options.sources.length === 0) {
      throw new Error("LiteratureSearchExecutor needs at least one source");
    }
  }

  async execute(
    snapshot: ResearchState,
    params: ExecutorParams,
    context: ExecutionContext,
  ): Promise<ExecutorResult> {
    const query: PaperQuery = {
      query: snapshot.query,
      maxResults: params.maxResults ?? this.options.defaultMaxResults ?? 50,
      gaps: params.gaps ?? [],
      signal: context.signal,
      ...(params.domainHint ? { domainHint: params.domainHint } : {}),
    };

    const settled = await Promise.allSettled(
      this.options.sources.map((source) => source.search(query)),
    );

    const found: Paper[] = [];
    const failures: { source: string; fatal: boolean; message: string }[] = [];
    settled.forEach((result, index) => {
      const source = this.options.sources[index]?.name ?? `source-${index}`;
      if (result.status === "fulfilled") {
        found.push(
          ...result.value.map((raw) => toPaper(snapshot.query, source, raw)),
        );
        return;
      }
      const classified = classifyError(result.reason);
      failures.push({
        source,
        fatal: classified.fatal,
        message: `${classified.category}: ${classified.message}`,
      });
    });

    const summary = failures
      .map((failure) => `${failure.source} (${failure.message})`)
      .join(", ");

    if (failures.length === settled.length) {
      return failures.every((failure) => failure.fatal)
        ? fatalFailure(`all literature sources failed: ${summary}`)
        : transientFailure(`all literature sources failed: ${summary}`);
    }

    const papers = deduplicatePapers(found)
      .sort((a, b) => b.relevance - a.relevance)
      .slice(0, query.maxResults);

    const existingById = new Map(
      snapshot.papers.map((paper) => [paper.id, paper]),
    );
    const existingByTitle = new Map(
      snapshot.papers.map((paper) => [normalizeTitle(paper.title), paper]),
    );
    const incoming: Paper[] = [];
    const removePaperIds: string[] = [];
    for (const paper of papers) {
      const existing =
        existingById.get(paper.id) ??
        existingByTitle.get(normalizeTitle(paper.title));
      if (!existing) {
        incoming.push(paper);
      } else if (paper.relevance > existing.relevance) {
        if (existing.id !== paper.id) {
          removePaperIds.push(existing.id);
        }
        incoming.push(paper);
      }
    }

    log.debug(`found ${found.length} papers, kept ${incoming.length}`, {
      runId: context.runId,
      followUp: params.followUp === true,
    });

    const delta = {
      papers: incoming,
      ...(removePaperIds.length > 0 ? { removePaperIds } : {}),
    };

    return failures.length > 0
      ? partialSuccess(delta, `literature sources failed: ${summary}`)
      : success(delta);
  }
}
