import fs from "node:fs";
import path from "node:path";
import { createJiti } from "jiti";
import {
  ATTEMPT_KEYS,
  type AttemptKey,
  CAPABILITIES,
  type Capability,
} from "../core/types";
import type { QualityThresholds } from "../gates/quality-gates";
import { createModuleLogger } from "../observability/logger";
import type { BackoffPolicy, RetryPolicy } from "../retry/retry-controller";

const log = createModuleLogger("config");

/**
 * How follow-up literature searches (triggered by gaps a synthesis
 * reports) are counted: against the `literature_search` ceiling, or
 * under their own `follow_up_search` ceiling.
 */
export type FollowUpAttemptPolicy = "shared" | "separate";

export interface OrchestratorConfig {
  thresholds: QualityThresholds;
  retry: RetryPolicy;
  concurrency: {
    /** Upper bound on validation invocations in flight at once. */
    validationFanOut: number;
  };
  timeouts: {
    defaultMs: number;
    perCapability: Partial<Record<Capability, number>>;
  };
  literature: {
    initialMaxResults: number;
    maxResultsCap: number;
    /** Double `maxResults` on every repeated search, up to the cap. */
    expandOnRetry: boolean;
    domainHint?: string;
  };
  followUpSearch: {
    enabled: boolean;
    minGaps: number;
    attemptPolicy: FollowUpAttemptPolicy;
  };
  methodology: {
    enabled: boolean;
    /** Methodologies are designed for at most this many worthy hypotheses. */
    maxHypotheses: number;
  };
  /** Sleep for the retry controller's backoff hint before a retried invocation. */
  honorBackoff: boolean;
  maxRunDurationMs?: number;
}

export interface OrchestratorConfigInput {
  thresholds?: Partial<QualityThresholds>;
  retry?: {
    defaultCeiling?: number;
    ceilings?: Partial<Record<AttemptKey, number>>;
    backoff?: Partial<BackoffPolicy>;
  };
  concurrency?: Partial<OrchestratorConfig["concurrency"]>;
  timeouts?: {
    defaultMs?: number;
    perCapability?: Partial<Record<Capability, number>>;
  };
  literature?: Partial<OrchestratorConfig["literature"]>;
  followUpSearch?: Partial<OrchestratorConfig["followUpSearch"]>;
  methodology?: Partial<OrchestratorConfig["methodology"]>;
  honorBackoff?: boolean;
  maxRunDurationMs?: number;
}

export const defaultOrchestratorConfig: OrchestratorConfig = {
  thresholds: {
    minPapers: 5,
    topN: 5,
    minRelevance: 0.5,
    minSynthesisConfidence: 0.6,
    minThemes: 2,
    minHypothesisConfidence: 0.5,
    validationWorthyThreshold: 0.5,
  },
  retry: {
    defaultCeiling: 3,
    ceilings: { follow_up_search: 1 },
    backoff: { baseMs: 1_000, factor: 2, maxMs: 30_000 },
  },
  concurrency: { validationFanOut: 4 },
  timeouts: {
    defaultMs: 60_000,
    perCapability: {
      literature_search: 60_000,
      knowledge_synthesis: 45_000,
      hypothesis_generation: 30_000,
      methodology_design: 30_000,
      validation: 20_000,
    },
  },
  literature: {
    initialMaxResults: 50,
    maxResultsCap: 200,
    expandOnRetry: true,
  },
  followUpSearch: { enabled: false, minGaps: 1, attemptPolicy: "shared" },
  methodology: { enabled: true, maxHypotheses: 3 },
  honorBackoff: true,
};

const UNIT_INTERVAL_THRESHOLDS: (keyof QualityThresholds)[] = [
  "minRelevance",
  "minSynthesisConfidence",
  "minHypothesisConfidence",
  "validationWorthyThreshold",
];

const COUNT_THRESHOLDS: (keyof QualityThresholds)[] = [
  "minPapers",
  "topN",
  "minThemes",
];

const validateConfig = (config: OrchestratorConfig): string[] => {
  const problems: string[] = [];
  const { thresholds, retry } = config;

  for (const key of UNIT_INTERVAL_THRESHOLDS) {
    const value = thresholds[key];
    if (!(value >= 0 && value <= 1)) {
      problems.push(`thresholds.${key} must be within [0, 1], got ${value}`);
    }
  }
  for (const key of COUNT_THRESHOLDS) {
    const value = thresholds[key];
    if (!Number.isInteger(value) || value < 0) {
      problems.push(`thresholds.${key} must be a non-negative integer, got ${value}`);
    }
  }

  const ceilings: [string, number][] = [
    ["retry.defaultCeiling", retry.defaultCeiling],
    ...Object.entries(retry.ceilings).map(
      ([key, value]): [string, number] => [`retry.ceilings.${key}`, value ?? 0],
    ),
  ];
  for (const [name, value] of ceilings) {
    if (!Number.isInteger(value) || value < 1) {
      problems.push(`${name} must be a positive integer, got ${value}`);
    }
  }

  if (retry.backoff.baseMs < 0 || retry.backoff.maxMs < 0) {
    problems.push("retry.backoff delays must not be negative");
  }
  if (retry.backoff.factor < 1) {
    problems.push(`retry.backoff.factor must be >= 1, got ${retry.backoff.factor}`);
  }

  const timeouts: [string, number][] = [
    ["timeouts.defaultMs", config.timeouts.defaultMs],
    ...Object.entries(config.timeouts.perCapability).map(
      ([key, value]): [string, number] => [`timeouts.perCapability.${key}`, value ?? 0],
    ),
  ];
  for (const [name, value] of timeouts) {
    if (!(value > 0)) {
      problems.push(`${name} must be positive, got ${value}`);
    }
  }

  const { validationFanOut } = config.concurrency;
  if (!Number.isInteger(validationFanOut) || validationFanOut < 1) {
    problems.push(
      `concurrency.validationFanOut must be a positive integer, got ${validationFanOut}`,
    );
  }
  if (config.literature.initialMaxResults > config.literature.maxResultsCap) {
    problems.push("literature.initialMaxResults must not exceed literature.maxResultsCap");
  }
  if (config.maxRunDurationMs !== undefined && !(config.maxRunDurationMs > 0)) {
    problems.push(`maxRunDurationMs must be positive, got ${config.maxRunDurationMs}`);
  }

  return problems;
};

/** Shallow merge that leaves base values in place where the override is undefined. */
const mergeDefined = <T extends object>(base: T, override?: Partial<T>): T => {
  const merged = { ...base };
  for (const [key, value] of Object.entries(override ?? {})) {
    if (value !== undefined) {
      Reflect.set(merged, key, value);
    }
  }
  return merged;
};

export const resolveOrchestratorConfig = (
  input: OrchestratorConfigInput = {},
  base: OrchestratorConfig = defaultOrchestratorConfig,
): OrchestratorConfig => {
  const maxRunDurationMs = input.maxRunDurationMs ?? base.maxRunDurationMs;
  const config: OrchestratorConfig = {
    thresholds: mergeDefined(base.thresholds, input.thresholds),
    retry: {
      defaultCeiling: input.retry?.defaultCeiling ?? base.retry.defaultCeiling,
      ceilings: mergeDefined(base.retry.ceilings, input.retry?.ceilings),
      backoff: mergeDefined(base.retry.backoff, input.retry?.backoff),
    },
    concurrency: mergeDefined(base.concurrency, input.concurrency),
    timeouts: {
      defaultMs: input.timeouts?.defaultMs ?? base.timeouts.defaultMs,
      perCapability: mergeDefined(
        base.timeouts.perCapability,
        input.timeouts?.perCapability,
      ),
    },
    literature: mergeDefined(base.literature, input.literature),
    followUpSearch: mergeDefined(base.followUpSearch, input.followUpSearch),
    methodology: mergeDefined(base.methodology, input.methodology),
    honorBackoff: input.honorBackoff ?? base.honorBackoff,
    ...(maxRunDurationMs !== undefined ? { maxRunDurationMs } : {}),
  };

  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new Error(`Invalid orchestrator config:\n- ${problems.join("\n- ")}`);
  }

  return config;
};

export const timeoutFor = (
  config: OrchestratorConfig,
  capability: Capability,
): number => config.timeouts.perCapability[capability] ?? config.timeouts.defaultMs;

// --- Loading from disk ---

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const pickNumbers = <K extends string>(
  raw: unknown,
  keys: readonly K[],
): Partial<Record<K, number>> => {
  if (!isRecord(raw)) return {};
  const picked: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === "number" && Number.isFinite(value)) {
      picked[key] = value;
    }
  }
  return picked;
};

const pickBoolean = (
  raw: Record<string, unknown>,
  key: string,
): boolean | undefined => {
  const value = raw[key];
  return typeof value === "boolean" ? value : undefined;
};

const THRESHOLD_KEYS: readonly (keyof QualityThresholds)[] = [
  ...COUNT_THRESHOLDS,
  ...UNIT_INTERVAL_THRESHOLDS,
];

export const normalizeConfigInput = (parsed: unknown): OrchestratorConfigInput => {
  if (!isRecord(parsed)) {
    return {};
  }

  const input: OrchestratorConfigInput = {
    thresholds: pickNumbers(parsed.thresholds, THRESHOLD_KEYS),
  };

  if (isRecord(parsed.retry)) {
    const retry = parsed.retry;
    input.retry = {
      ...pickNumbers(retry, ["defaultCeiling"] as const),
      ceilings: pickNumbers(retry.ceilings, ATTEMPT_KEYS),
      backoff: pickNumbers(retry.backoff, ["baseMs", "factor", "maxMs"] as const),
    };
  }

  input.concurrency = pickNumbers(parsed.concurrency, ["validationFanOut"] as const);

  if (isRecord(parsed.timeouts)) {
    input.timeouts = {
      ...pickNumbers(parsed.timeouts, ["defaultMs"] as const),
      perCapability: pickNumbers(parsed.timeouts.perCapability, CAPABILITIES),
    };
  }

  if (isRecord(parsed.literature)) {
    const literature = parsed.literature;
    input.literature = {
      ...pickNumbers(literature, ["initialMaxResults", "maxResultsCap"] as const),
      expandOnRetry: pickBoolean(literature, "expandOnRetry"),
      domainHint:
        typeof literature.domainHint === "string" ? literature.domainHint : undefined,
    };
  }

  if (isRecord(parsed.followUpSearch)) {
    const followUp = parsed.followUpSearch;
    const policy = followUp.attemptPolicy;
    input.followUpSearch = {
      ...pickNumbers(followUp, ["minGaps"] as const),
      enabled: pickBoolean(followUp, "enabled"),
      attemptPolicy:
        policy === "shared" || policy === "separate" ? policy : undefined,
    };
  }

  if (isRecord(parsed.methodology)) {
    input.methodology = {
      ...pickNumbers(parsed.methodology, ["maxHypotheses"] as const),
      enabled: pickBoolean(parsed.methodology, "enabled"),
    };
  }

  const honorBackoff = pickBoolean(parsed, "honorBackoff");
  if (honorBackoff !== undefined) input.honorBackoff = honorBackoff;

  const { maxRunDurationMs } = pickNumbers(parsed, ["maxRunDurationMs"] as const);
  if (maxRunDurationMs !== undefined) input.maxRunDurationMs = maxRunDurationMs;

  return input;
};

const unwrapDefault = (loaded: unknown): unknown =>
  isRecord(loaded) && "default" in loaded ? (loaded.default ?? loaded) : loaded;

/**
 * Load `.research/config.ts` (preferred) or `.research/config.json` from
 * `cwd`. Missing files yield the defaults; a TypeScript config that fails
 * to load is logged and ignored. Values that fail validation throw.
 */
export const loadOrchestratorConfig = async (
  cwd: string,
): Promise<OrchestratorConfig> => {
  const tsPath = path.join(cwd, ".research", "config.ts");
  if (fs.existsSync(tsPath)) {
    let loaded: unknown;
    try {
      const jiti = createJiti(import.meta.url);
      loaded = await jiti.import(tsPath);
    } catch (error) {
      log.warn(
        `Ignoring ${tsPath}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return defaultOrchestratorConfig;
    }
    return resolveOrchestratorConfig(normalizeConfigInput(unwrapDefault(loaded)));
  }

  const jsonPath = path.join(cwd, ".research", "config.json");
  if (!fs.existsSync(jsonPath)) {
    return defaultOrchestratorConfig;
  }

  const parsed = JSON.parse(fs.readFileSync(jsonPath, "utf8")) as unknown;
  return resolveOrchestratorConfig(normalizeConfigInput(parsed));
};
