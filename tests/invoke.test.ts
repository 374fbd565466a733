import { describe, expect, it } from "vitest";
import { createInitialState } from "../src/core/research-state";
import { asRunId } from "../src/core/types";
import { ExecutorRegistry, success } from "../src/executors/contract";
import { fanOut } from "../src/executors/fan-out";
import { invokeWithTimeout } from "../src/executors/invoke";
import { hangUntilAborted, scripted } from "./helpers/stub-executors";

const snapshot = createInitialState("does caffeine improve recall");
const runId = asRunId("run-test");

const options = (signal: AbortSignal = new AbortController().signal) => ({
  runId,
  timeoutMs: 50,
  signal,
});

const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

describe("invokeWithTimeout", () => {
  it("returns the executor result", async () => {
    const executor = scripted("literature_search", success({ papers: [] }));

    const outcome = await invokeWithTimeout(
      executor,
      snapshot,
      { attempt: 1 },
      options(),
    );

    expect(outcome.kind).toBe("result");
    expect(outcome.kind === "result" && outcome.result).toEqual({
      kind: "success",
      delta: { papers: [] },
    });
    expect(executor.calls).toEqual([{ attempt: 1 }]);
  });

  it("classifies a thrown error", async () => {
    const executor = scripted("knowledge_synthesis", () => {
      throw new Error("Request failed with status code 401");
    });

    const outcome = await invokeWithTimeout(
      executor,
      snapshot,
      { attempt: 1 },
      options(),
    );

    expect(outcome.kind === "result" && outcome.result).toEqual({
      kind: "fatal_failure",
      reason: "auth: Request failed with status code 401",
    });
  });

  it("times out and aborts the executor", async () => {
    let aborted = false;
    const executor = scripted("validation", (snap, params, context) => {
      context.signal.addEventListener("abort", () => {
        aborted = true;
      });
      return hangUntilAborted(snap, params, context);
    });

    const outcome = await invokeWithTimeout(
      executor,
      snapshot,
      { attempt: 1 },
      options(),
    );

    expect(outcome.kind).toBe("timeout");
    expect(aborted).toBe(true);
  });

  it("does not start when the run is already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const executor = scripted("validation", success({}));

    const outcome = await invokeWithTimeout(
      executor,
      snapshot,
      { attempt: 1 },
      options(controller.signal),
    );

    expect(outcome).toEqual({ kind: "cancelled", durationMs: 0 });
    expect(executor.calls).toEqual([]);
  });

  it("reports cancellation mid-call", async () => {
    const controller = new AbortController();
    const executor = scripted("validation", hangUntilAborted);

    const pending = invokeWithTimeout(executor, snapshot, { attempt: 1 }, {
      runId,
      timeoutMs: 5_000,
      signal: controller.signal,
    });
    await delay(5);
    controller.abort();

    expect((await pending).kind).toBe("cancelled");
  });
});

describe("fanOut", () => {
  it("returns results in task order with bounded concurrency", async () => {
    let inFlight = 0;
    let peak = 0;
    const executor = scripted("validation", async (_snap, params) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      const [id = "?"] = params.hypothesisIds ?? [];
      await delay(id === "h1" ? 20 : 5);
      inFlight -= 1;
      return success({
        validations: [
          { hypothesisRef: id, verdict: "supported", rationale: "ok", score: 0.7 },
        ],
      });
    });
    const progress: string[] = [];

    const results = await fanOut(
      executor,
      snapshot,
      ["h1", "h2", "h3", "h4"].map((id) => ({
        hypothesisId: id,
        params: { attempt: 1, hypothesisIds: [id] },
      })),
      {
        ...options(),
        concurrency: 2,
        onSettled: (done, total) => progress.push(`${done}/${total}`),
      },
    );

    expect(results.map((result) => result.hypothesisId)).toEqual([
      "h1",
      "h2",
      "h3",
      "h4",
    ]);
    expect(results.every((result) => result.outcome.kind === "result")).toBe(true);
    expect(peak).toBe(2);
    expect(progress).toEqual(["1/4", "2/4", "3/4", "4/4"]);
  });

  it("cancels queued tasks without starting them", async () => {
    const controller = new AbortController();
    const executor = scripted("validation", () => {
      controller.abort();
      return success({});
    });

    const results = await fanOut(
      executor,
      snapshot,
      ["h1", "h2", "h3"].map((id) => ({
        hypothesisId: id,
        params: { attempt: 1, hypothesisIds: [id] },
      })),
      { ...options(controller.signal), concurrency: 1 },
    );

    expect(executor.calls).toHaveLength(1);
    expect(results.map((result) => result.outcome.kind)).toEqual([
      "cancelled",
      "cancelled",
      "cancelled",
    ]);
  });
});

describe("ExecutorRegistry", () => {
  it("holds one executor per capability", () => {
    const registry = new ExecutorRegistry([
      scripted("literature_search", success({})),
    ]);

    expect(registry.has("literature_search")).toBe(true);
    expect(registry.capabilities()).toEqual(["literature_search"]);
    expect(() => registry.register(scripted("literature_search", success({})))).toThrow(
      "Executor already registered for literature_search",
    );
    expect(() => registry.require("validation")).toThrow(
      "No executor registered for validation",
    );
  });
});
