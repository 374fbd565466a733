import type {
  ExecutorParams,
  ExecutorResult,
  ResearchState,
  RunId,
} from "../core/types";
import type { CapabilityExecutor } from "./contract";
import { failureResult } from "./error-classification";

export type InvocationOutcome =
  | { kind: "result"; result: ExecutorResult; durationMs: number }
  | { kind: "timeout"; durationMs: number }
  | { kind: "cancelled"; durationMs: number };

export interface InvokeOptions {
  runId: RunId;
  timeoutMs: number;
  /** Run-level cancellation. */
  signal: AbortSignal;
}

/**
 * Run one executor call under a mandatory timeout. The executor sees an
 * abort signal that fires on timeout or run cancellation; whatever it
 * returns after that point is discarded.
 */
export const invokeWithTimeout = async (
  executor: CapabilityExecutor,
  snapshot: ResearchState,
  params: ExecutorParams,
  options: InvokeOptions,
): Promise<InvocationOutcome> => {
  const startedAt = performance.now();
  const elapsed = (): number => Math.round(performance.now() - startedAt);

  if (options.signal.aborted) {
    return { kind: "cancelled", durationMs: 0 };
  }

  const controller = new AbortController();
  let timedOut = false;

  const onRunAbort = (): void => controller.abort(options.signal.reason);
  options.signal.addEventListener("abort", onRunAbort, { once: true });

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`timeout after ${options.timeoutMs}ms`));
  }, options.timeoutMs);

  const interrupted = new Promise<InvocationOutcome>((resolve) => {
    controller.signal.addEventListener(
      "abort",
      () =>
        resolve(
          timedOut
            ? { kind: "timeout", durationMs: elapsed() }
            : { kind: "cancelled", durationMs: elapsed() },
        ),
      { once: true },
    );
  });

  const work = Promise.resolve()
    .then(() =>
      executor.execute(snapshot, params, {
        runId: options.runId,
        signal: controller.signal,
      }),
    )
    .then(
      (result): InvocationOutcome => ({
        kind: "result",
        result,
        durationMs: elapsed(),
      }),
      (error: unknown): InvocationOutcome => ({
        kind: "result",
        result: failureResult(error),
        durationMs: elapsed(),
      }),
    );

  try {
    return await Promise.race([work, interrupted]);
  } finally {
    clearTimeout(timer);
    options.signal.removeEventListener("abort", onRunAbort);
  }
};
