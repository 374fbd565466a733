import { describe, expect, it } from "vitest";
import {
  ExecutorError,
  classifyError,
  failureResult,
} from "../src/executors/error-classification";

describe("classifyError", () => {
  it("trusts an explicit ExecutorError", () => {
    expect(classifyError(new ExecutorError("quota spent", false, "rate_limit"))).toEqual({
      category: "rate_limit",
      fatal: false,
      message: "quota spent",
    });
    expect(classifyError(new ExecutorError("no such field", true))).toEqual({
      category: "invalid_input",
      fatal: true,
      message: "no such field",
    });
  });

  it("treats auth and bad input as fatal", () => {
    expect(classifyError(new Error("401 Unauthorized"))).toMatchObject({
      category: "auth",
      fatal: true,
    });
    expect(classifyError(new Error("invalid query: empty string"))).toMatchObject({
      category: "invalid_input",
      fatal: true,
    });
    expect(
      classifyError(new Error("timed out while checking the API key")),
    ).toMatchObject({ category: "auth", fatal: true });
  });

  it("treats transport problems as transient", () => {
    expect(
      classifyError(new Error("Request failed with status code 429")).category,
    ).toBe("rate_limit");
    expect(classifyError(new Error("socket hang up: ECONNRESET")).category).toBe(
      "timeout",
    );
    expect(classifyError(new Error("503 Service Unavailable")).category).toBe(
      "unavailable",
    );

    const aborted = new Error("This operation was aborted");
    aborted.name = "AbortError";
    expect(classifyError(aborted)).toEqual({
      category: "timeout",
      fatal: false,
      message: "AbortError: This operation was aborted",
    });
  });

  it("leaves unrecognised errors to the retry ceiling", () => {
    expect(classifyError("something odd")).toEqual({
      category: "unknown",
      fatal: false,
      message: "something odd",
    });
  });
});

describe("failureResult", () => {
  it("prefixes the reason with the category", () => {
    expect(failureResult(new Error("connect ECONNREFUSED 127.0.0.1:443"))).toEqual({
      kind: "transient_failure",
      reason: "unavailable: connect ECONNREFUSED 127.0.0.1:443",
    });
    expect(failureResult(new ExecutorError("unknown field", true))).toEqual({
      kind: "fatal_failure",
      reason: "invalid_input: unknown field",
    });
  });
});
