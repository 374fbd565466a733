import type {
  Capability,
  ExecutorParams,
  ExecutorResult,
  ResearchState,
  RunId,
  StateDelta,
} from "../core/types";

export interface ExecutionContext {
  runId: RunId;
  /** Aborted on per-invocation timeout or when the run is cancelled. */
  signal: AbortSignal;
}

/**
 * One research capability behind a uniform contract. Executors receive a
 * frozen snapshot and hand back a delta; classifying their own failures
 * as transient or fatal is part of the contract.
 */
export interface CapabilityExecutor {
  readonly capability: Capability;
  execute(
    snapshot: ResearchState,
    params: ExecutorParams,
    context: ExecutionContext,
  ): Promise<ExecutorResult>;
}

export const success = (delta: StateDelta): ExecutorResult => ({
  kind: "success",
  delta,
});

export const partialSuccess = (
  delta: StateDelta,
  warning: string,
): ExecutorResult => ({ kind: "partial_success", delta, warning });

export const transientFailure = (reason: string): ExecutorResult => ({
  kind: "transient_failure",
  reason,
});

export const fatalFailure = (reason: string): ExecutorResult => ({
  kind: "fatal_failure",
  reason,
});

export class ExecutorRegistry {
  private readonly executors = new Map<Capability, CapabilityExecutor>();

  constructor(executors: readonly CapabilityExecutor[] = []) {
    for (const executor of executors) {
      this.register(executor);
    }
  }

  register(executor: CapabilityExecutor): void {
    if (this.executors.has(executor.capability)) {
      throw new Error(
        `Executor already registered for ${executor.capability}`,
      );
    }
    this.executors.set(executor.capability, executor);
  }

  has(capability: Capability): boolean {
    return this.executors.has(capability);
  }

  require(capability: Capability): CapabilityExecutor {
    const executor = this.executors.get(capability);
    if (!executor) {
      throw new Error(`No executor registered for ${capability}`);
    }
    return executor;
  }

  capabilities(): Capability[] {
    return [...this.executors.keys()];
  }
}
