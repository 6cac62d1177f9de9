import { describe, it, expect } from "vitest";

import { AppError } from "@trackprint/shared";

import { classifyIndexError, isConnectionError, isTransientIndexError, toDenseVector, toMetadata } from "./transport";

function withProps<T extends Error>(err: T, props: Record<string, unknown>): T {
  return Object.assign(err, props);
}

describe("classifyIndexError", () => {
  it("treats 5xx and 429 as an unavailable service", () => {
    const err = classifyIndexError(withProps(new Error("Service Unavailable"), { status: 503 }), "upsert");
    expect(err.code).toBe("INDEX_UNAVAILABLE");
    expect(err.retryable).toBe(true);
    expect(err.message).toBe("Vector index upsert: HTTP 503 Service Unavailable");
    expect(classifyIndexError(withProps(new Error("slow down"), { status: 429 }), "search").code).toBe(
      "INDEX_UNAVAILABLE"
    );
  });

  it("treats other statuses as permanent", () => {
    const err = classifyIndexError(withProps(new Error("Bad Request"), { status: 400 }), "upsert");
    expect(err.code).toBe("INDEX_REQUEST_FAILED");
    expect(err.retryable).toBe(false);
    expect(isTransientIndexError(err)).toBe(false);
  });

  it("detects connection failures from the error or its cause", () => {
    const reset = classifyIndexError(withProps(new Error("read ECONNRESET"), { code: "ECONNRESET" }), "search");
    expect(reset.code).toBe("INDEX_CONNECTION");
    expect(isConnectionError(reset)).toBe(true);

    const fetchFailed = new TypeError("fetch failed", {
      cause: withProps(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" }),
    });
    expect(classifyIndexError(fetchFailed, "list collections").code).toBe("INDEX_CONNECTION");
  });

  it("treats unparsable responses as transient", () => {
    const err = classifyIndexError(new SyntaxError("Unexpected token < in JSON"), "retrieve");
    expect(err.code).toBe("INDEX_BAD_RESPONSE");
    expect(isTransientIndexError(err)).toBe(true);
    expect(isConnectionError(err)).toBe(false);
  });

  it("passes AppErrors through", () => {
    const original = new AppError({ code: "BAD_INPUT", message: "x", retryable: false });
    expect(classifyIndexError(original, "upsert")).toBe(original);
  });

  it("falls back to a permanent failure", () => {
    expect(classifyIndexError("weird", "delete")).toMatchObject({
      code: "INDEX_REQUEST_FAILED",
      message: "Vector index delete: weird",
      retryable: false,
    });
  });
});

describe("payload helpers", () => {
  it("keeps scalar metadata only", () => {
    expect(toMetadata({ a: "x", b: 1, c: true, d: null, e: { nested: 1 }, f: [1] })).toEqual({
      a: "x",
      b: 1,
      c: true,
      d: null,
    });
    expect(toMetadata(null)).toEqual({});
  });

  it("accepts only dense numeric vectors", () => {
    expect(toDenseVector([0.5, 1])).toEqual([0.5, 1]);
    expect(toDenseVector([[1, 2]])).toBeUndefined();
    expect(toDenseVector({ default: [1] })).toBeUndefined();
  });
});
