import { describe, expect, it } from "vitest";
import { API_ERROR_MESSAGES, makeErrorBody } from "../utils/errors.js";

describe("makeErrorBody", () => {
  it("uses the given message", () => {
    expect(makeErrorBody("NOT_FOUND", "Pokemon not found")).toEqual({
      code: "NOT_FOUND",
      message: "Pokemon not found",
    });
  });

  it("falls back to the code's default message", () => {
    expect(makeErrorBody("UPSTREAM_FAILED")).toEqual({
      code: "UPSTREAM_FAILED",
      message: API_ERROR_MESSAGES.UPSTREAM,
    });
    expect(makeErrorBody("INTERNAL").message).toBe("Internal server error");
  });
});
