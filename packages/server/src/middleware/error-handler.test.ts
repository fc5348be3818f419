import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { ValidateError } from "@tsoa/runtime";
import { ChecksumMismatchError } from "@dted-terrain/dted";
import { describeError } from "./error-handler.js";
import { NotFoundError } from "../errors.js";

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("describeError", () => {
  it("maps validation errors to 422 with field details", () => {
    const fields = { lat: { message: "max 90", value: "91" } };
    expect(describeError(new ValidateError(fields, ""))).toEqual({
      status: 422,
      body: { message: "Validation failed", details: fields },
    });
    expect(console.warn).toHaveBeenCalledWith(`[validation] {"lat":{"message":"max 90","value":"91"}}`);
  });

  it("maps decode errors to 422", () => {
    const err = new ChecksumMismatchError(3428, 10, 11);
    expect(describeError(err)).toEqual({
      status: 422,
      body: { message: "Checksum mismatch for record at offset 3428: stored 10, computed 11" },
    });
  });

  it("uses the status carried by an error", () => {
    expect(describeError(new NotFoundError("No tile covers 1,2"))).toEqual({
      status: 404,
      body: { message: "No tile covers 1,2" },
    });
    expect(console.error).toHaveBeenCalledWith("[error] No tile covers 1,2");
  });

  it("falls back to 500", () => {
    expect(describeError(new Error("boom"))).toEqual({ status: 500, body: { message: "boom" } });
  });

  it("ignores values that are not errors", () => {
    expect(describeError("boom")).toBeNull();
  });
});
