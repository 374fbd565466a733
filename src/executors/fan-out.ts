import pLimit from "p-limit";
import type { ExecutorParams, ResearchState } from "../core/types";
import type { CapabilityExecutor } from "./contract";
import {
  type InvocationOutcome,
  type InvokeOptions,
  invokeWithTimeout,
} from "./invoke";

export interface FanOutTask {
  hypothesisId: string;
  params: ExecutorParams;
}

export interface FanOutResult {
  hypothesisId: string;
  outcome: InvocationOutcome;
}

export interface FanOutOptions extends InvokeOptions {
  concurrency: number;
  onSettled?: (completed: number, total: number) => void;
}

/**
 * Invoke one executor once per task, at most `concurrency` at a time.
 * Results come back in task order regardless of completion order. Tasks
 * still queued when the run is cancelled resolve as cancelled without
 * being started.
 */
export const fanOut = async (
  executor: CapabilityExecutor,
  snapshot: ResearchState,
  tasks: readonly FanOutTask[],
  options: FanOutOptions,
): Promise<FanOutResult[]> => {
  const limit = pLimit(Math.max(1, options.concurrency));
  let settled = 0;

  return Promise.all(
    tasks.map((task) =>
      limit(async (): Promise<FanOutResult> => {
        const outcome: InvocationOutcome = options.signal.aborted
          ? { kind: "cancelled", durationMs: 0 }
          : await invokeWithTimeout(executor, snapshot, task.params, options);
        settled += 1;
        options.onSettled?.(settled, tasks.length);
        return { hypothesisId: task.hypothesisId, outcome };
      }),
    ),
  );
};
