import { describe, it, expect } from "vitest";
import {
  AuthError,
  ConfigurationError,
  FieldResolutionError,
  RequestError,
  WrappedError,
  exitCodeFor,
} from "./errors";

describe("exitCodeFor", () => {
  it("gives authentication and request failures their own codes", () => {
    expect(exitCodeFor(new AuthError("rejected", 401))).toBe(2);
    expect(exitCodeFor(new RequestError("failed", 500, "/search"))).toBe(3);
  });

  it("uses 1 for everything else", () => {
    expect(exitCodeFor(new ConfigurationError("missing"))).toBe(1);
    expect(exitCodeFor(new FieldResolutionError("unknown"))).toBe(1);
    expect(exitCodeFor(new Error("boom"))).toBe(1);
    expect(exitCodeFor("boom")).toBe(1);
  });
});

describe("error classes", () => {
  it("share the WrappedError base and keep their names", () => {
    const error = new RequestError("failed", null, "/field");

    expect(error).toBeInstanceOf(WrappedError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("RequestError");
    expect(error.status).toBeNull();
  });
});
