import { describe, expect, test } from "vitest";
import { EXTERNAL_FAILURE_NOTE, ExternalFailure, KeyNotFoundError } from "../src/index";

describe("ExternalFailure", () => {
  test("appends the outside-cause note when printed", () => {
    const error = new ExternalFailure("Could not connect to the display");
    expect(error.message).toBe("Could not connect to the display");
    expect(String(error)).toBe(
      "Could not connect to the display\n\t(The cause of this error lies outside of this application)"
    );
    expect(EXTERNAL_FAILURE_NOTE).toBe(
      "(The cause of this error lies outside of this application)"
    );
  });

  test("keeps the underlying cause", () => {
    const cause = new Error("connection refused");
    const error = new ExternalFailure("Display unavailable", { cause });
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ExternalFailure");
  });
});

describe("KeyNotFoundError", () => {
  test("carries the missing key", () => {
    const error = new KeyNotFoundError(42n);
    expect(error.key).toBe(42n);
    expect(error.message).toBe("Key not found: 42n.");
    expect(error.name).toBe("KeyNotFoundError");
  });
});
