import { afterEach, describe, expect, it, vi } from "vitest";
import {
  AlreadyExistsError,
  EmptyContentError,
  ErrorKind,
  FileGuardError,
  IsADirectoryError,
  OperationFailedError,
  PathNotFoundError,
  PermissionDeniedError,
  WrongKindError,
  attempt,
  getErrorMessage,
  guard,
  toFileGuardError,
  unwrap,
  withErrorHandling,
} from "../../src/errors/index.js";
import { getLogger, resetLogger } from "../../src/utils/logger.js";

function errno(code: string, message = "boom"): Error {
  return Object.assign(new Error(message), { code });
}

describe("toFileGuardError", () => {
  it("maps errno codes to error kinds", () => {
    expect(toFileGuardError(errno("ENOENT"), "read", "/x")).toBeInstanceOf(PathNotFoundError);
    expect(toFileGuardError(errno("EACCES"), "read", "/x")).toBeInstanceOf(PermissionDeniedError);
    expect(toFileGuardError(errno("EPERM"), "read", "/x")).toBeInstanceOf(PermissionDeniedError);
    expect(toFileGuardError(errno("EEXIST"), "read", "/x")).toBeInstanceOf(AlreadyExistsError);
    expect(toFileGuardError(errno("ENOTDIR"), "read", "/x")).toBeInstanceOf(WrongKindError);
    expect(toFileGuardError(errno("EISDIR"), "read", "/x")).toBeInstanceOf(IsADirectoryError);
  });

  it("names the operation in permission errors", () => {
    const converted = toFileGuardError(errno("EACCES"), "write file", "/x");
    expect(converted.message).toBe("Path validation failed (/x): permission denied: cannot write file");
  });

  it("wraps other failures as OperationFailed and keeps the cause", () => {
    const original = errno("EIO");
    const converted = toFileGuardError(original, "write", "/x");

    expect(converted).toBeInstanceOf(OperationFailedError);
    expect(converted.message).toBe("Path validation failed (/x): write failed: boom");
    expect(converted.cause).toBe(original);
    expect(converted.isUserError()).toBe(false);
  });

  it("wraps plain errors and thrown values", () => {
    expect(toFileGuardError(new Error("plain"), "op", "/p").message).toBe(
      "Path validation failed (/p): op failed: plain"
    );
    expect(toFileGuardError("text", "op", "/p").kind).toBe(ErrorKind.OPERATION_FAILED);
  });

  it("passes FileGuardErrors through", () => {
    const original = new EmptyContentError();
    expect(toFileGuardError(original, "op", "/p")).toBe(original);
  });
});

describe("FileGuardError", () => {
  it("separates caller mistakes from system failures", () => {
    expect(new PathNotFoundError("/x").isUserError()).toBe(true);
    expect(new EmptyContentError().isUserError()).toBe(true);
    expect(new OperationFailedError("/x", "op", "why").isUserError()).toBe(false);
  });

  it("exposes log details", () => {
    const error = new PathNotFoundError("/x", "the path does not exist", new Error("ENOENT"));
    const details = error.toLogDetails();

    expect(details.kind).toBe(ErrorKind.NOT_FOUND);
    expect(details.cause).toBe("ENOENT");
    expect(details.details).toEqual({ path: "/x", reason: "the path does not exist" });
    expect(error.name).toBe("PathNotFoundError");
    expect(error).toBeInstanceOf(FileGuardError);
  });
});

describe("guard / attempt / unwrap", () => {
  it("guard converts failures", async () => {
    await expect(
      guard(() => Promise.reject(errno("ENOENT")), "stat", "/missing")
    ).rejects.toBeInstanceOf(PathNotFoundError);
    await expect(guard(() => Promise.resolve(5), "stat", "/x")).resolves.toBe(5);
  });

  it("attempt returns results instead of throwing", async () => {
    const ok = await attempt(() => Promise.resolve("value"), "op", "/x");
    expect(ok).toEqual({ ok: true, value: "value" });

    const failed = await attempt(() => Promise.reject(errno("EEXIST")), "op", "/x");
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error.kind).toBe(ErrorKind.ALREADY_EXISTS);
    }
  });

  it("unwrap returns the value or throws the error", async () => {
    expect(unwrap({ ok: true, value: 3 })).toBe(3);
    const failed = await attempt(() => Promise.reject(errno("EISDIR")), "op", "/d");
    expect(() => unwrap(failed)).toThrow(IsADirectoryError);
  });
});

describe("withErrorHandling", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("logs user errors as warnings and rethrows them converted", async () => {
    const warn = vi.spyOn(getLogger(), "warn");
    const error = vi.spyOn(getLogger(), "error");

    await expect(
      withErrorHandling(() => Promise.reject(errno("ENOENT")), "read_file", { path: "/gone" })
    ).rejects.toBeInstanceOf(PathNotFoundError);

    expect(error).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ operation: "read_file", path: "/gone", kind: ErrorKind.NOT_FOUND }),
      "User error: Path validation failed (/gone): the path does not exist"
    );
  });

  it("logs system failures as errors", async () => {
    const error = vi.spyOn(getLogger(), "error");

    await expect(
      withErrorHandling(() => Promise.reject(errno("EIO")), "create_file", { path: "/disk" })
    ).rejects.toBeInstanceOf(OperationFailedError);

    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ isUserError: false, kind: ErrorKind.OPERATION_FAILED }),
      "System error: Path validation failed (/disk): create_file failed: boom"
    );
  });

  it("records successful operations", async () => {
    const operation = vi.spyOn(getLogger(), "operation");

    await expect(
      withErrorHandling(() => Promise.resolve(true), "delete_file", { path: "/a", ignoreMissing: true })
    ).resolves.toBe(true);
    expect(operation).toHaveBeenCalledWith("delete_file", { path: "/a", ignoreMissing: true });
  });
});

describe("getErrorMessage", () => {
  it("reads messages from errors and other values", () => {
    expect(getErrorMessage(new Error("m"))).toBe("m");
    expect(getErrorMessage(42)).toBe("42");
  });
});
