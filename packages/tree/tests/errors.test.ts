/**
 * Error categorization tests
 */
import { describe, expect, it } from "vitest";
import { categorizeError, isPermissionError, rootStatError, WalkError } from "../src/errors.ts";

const fsError = (code: string, message: string) => Object.assign(new Error(message), { code });

describe("categorizeError", () => {
  it("should treat EACCES and EPERM as permission denied", () => {
    expect(categorizeError(fsError("EACCES", "EACCES: permission denied")).kind).toBe(
      "permission-denied"
    );
    expect(categorizeError(fsError("EPERM", "EPERM: operation not permitted")).kind).toBe(
      "permission-denied"
    );
  });

  it("should treat ENOENT as not found", () => {
    expect(categorizeError(fsError("ENOENT", "gone"))).toEqual({
      kind: "not-found",
      code: "ENOENT",
      message: "gone",
    });
  });

  it("should treat anything else as other", () => {
    expect(categorizeError(fsError("ELOOP", "too many links")).kind).toBe("other");
    expect(categorizeError(new Error("  "))).toEqual({ kind: "other", message: "error" });
    expect(categorizeError("plain failure")).toEqual({ kind: "other", message: "plain failure" });
  });
});

describe("isPermissionError", () => {
  it("should only match the permission category", () => {
    expect(isPermissionError({ kind: "permission-denied", message: "x" })).toBe(true);
    expect(isPermissionError({ kind: "other", message: "x" })).toBe(false);
    expect(isPermissionError(undefined)).toBe(false);
  });
});

describe("rootStatError", () => {
  it("should map a missing root to ROOT_NOT_FOUND", () => {
    const error = rootStatError("./nope", fsError("ENOENT", "ENOENT"));
    expect(error).toBeInstanceOf(WalkError);
    expect(error.code).toBe("ROOT_NOT_FOUND");
    expect(error.path).toBe("./nope");
    expect(error.message).toBe("./nope: no such file or directory");
  });

  it("should map a permission failure to ROOT_UNREADABLE", () => {
    const error = rootStatError("/secret", fsError("EACCES", "EACCES"));
    expect(error.code).toBe("ROOT_UNREADABLE");
    expect(error.permissionDenied).toBe(true);
  });
});
