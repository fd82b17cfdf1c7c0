import { describe, it, expect } from "vitest";
import { RootError, errnoCode, isRootError, wrapIo } from "../errors";

describe("RootError", () => {
  it("carries a code, details and cause", () => {
    const cause = new Error("inner");
    const err = new RootError("NoRootFound", "no root found", { cause, details: { marker: "app.id" } });

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("RootError");
    expect(err.code).toBe("NoRootFound");
    expect(err.details).toEqual({ marker: "app.id" });
    expect(err.cause).toBe(cause);
  });

  it("narrows by code", () => {
    const err = new RootError("RootNotSet", "root not set");
    expect(isRootError(err)).toBe(true);
    expect(isRootError(err, "RootNotSet")).toBe(true);
    expect(isRootError(err, "NoEnvDefined")).toBe(false);
    expect(isRootError(new Error("plain"))).toBe(false);
  });
});

describe("wrapIo", () => {
  it("wraps filesystem errors with the operation and path", () => {
    const enoent = Object.assign(new Error("no such file"), { code: "ENOENT" });
    const wrapped = wrapIo(enoent, "stat", "/srv/app");

    expect(wrapped.code).toBe("Io");
    expect(wrapped.message).toBe("stat /srv/app: no such file");
    expect(wrapped.details).toEqual({ operation: "stat", path: "/srv/app", errno: "ENOENT" });
    expect(wrapped.cause).toBe(enoent);
  });

  it("passes RootErrors through", () => {
    const original = new RootError("BadPattern", "bad");
    expect(wrapIo(original, "readdir", "/x")).toBe(original);
  });

  it("reads errno codes only when present", () => {
    expect(errnoCode({ code: "EACCES" })).toBe("EACCES");
    expect(errnoCode({ code: 13 })).toBeUndefined();
    expect(errnoCode("boom")).toBeUndefined();
  });
});
