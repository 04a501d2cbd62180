import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  DegradableError,
  DependencyUnavailableError,
  isRagError,
  LifecycleError,
  StoreError,
  toErrorMessage,
  ValidationError,
} from "../errors/ragError";
import { err, isErr, isOk, mapResult, ok, tryCatchAsync, unwrapOr } from "../types/result";

describe("RagError taxonomy", () => {
  it("wraps store failures with backend, operation and cause", () => {
    const cause = new Error("connection refused");
    const error = new StoreError("qdrant", "search", "connection refused", { cause });

    expect(error.message).toBe("qdrant search failed: connection refused");
    expect(error.code).toBe("STORE_SEARCH_FAILED");
    expect(error.cause).toBe(cause);
    expect(error.solutions).toHaveLength(2);
    expect(error.solutions[0]).toBe("Check that the qdrant server is running and reachable.");
  });

  it("prefers explicit solutions over defaults", () => {
    const error = new ConfigurationError("alpha must be within [0, 1]", {
      solutions: ["Set HYBRID_ALPHA between 0 and 1."],
    });

    expect(error.solutions).toEqual(["Set HYBRID_ALPHA between 0 and 1."]);
    expect(error.toJSON()).toMatchObject({
      name: "ConfigurationError",
      code: "CONFIGURATION_INVALID",
      message: "alpha must be within [0, 1]",
    });
  });

  it("reports a missing optional package as a lifecycle error", () => {
    const error = new DependencyUnavailableError("pg", "the pgvector store");

    expect(error).toBeInstanceOf(LifecycleError);
    expect(error.message).toBe("install pg to use the pgvector store");
    expect(error.code).toBe("DEPENDENCY_UNAVAILABLE");
    expect(error.solutions).toEqual(["Run `npm install pg` and restart the service."]);
  });

  it("keeps validation issues and degradation reasons", () => {
    expect(new ValidationError("bad", ["content: too short"]).issues).toEqual([
      "content: too short",
    ]);
    expect(new DegradableError("timeout", "slow").reason).toBe("timeout");
  });

  it("narrows unknown values", () => {
    expect(isRagError(new LifecycleError("not wired"))).toBe(true);
    expect(isRagError(new Error("plain"))).toBe(false);
    expect(toErrorMessage("text")).toBe("text");
    expect(toErrorMessage(new Error("boxed"))).toBe("boxed");
  });
});

describe("Result", () => {
  it("maps and unwraps", () => {
    const doubled = mapResult(ok(2), (value) => value * 2);
    expect(isOk(doubled) && doubled.value).toBe(4);
    expect(unwrapOr(err("nope"), 7)).toBe(7);
  });

  it("captures a rejected operation as Err", async () => {
    const result = await tryCatchAsync(
      async () => {
        throw new Error("down");
      },
      (error) => toErrorMessage(error)
    );

    expect(isErr(result) && result.error).toBe("down");
  });
});
