import { describe, it, expect } from "vitest";
import { IoError, UnexpectedEofError, io, toSiteError } from "./errors";

function errno(code: string, message: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe("toSiteError", () => {
  it("wraps filesystem errors as IoError", () => {
    const cause = errno("ENOENT", "ENOENT: no such file or directory");
    const wrapped = toSiteError(cause);

    expect(wrapped).toBeInstanceOf(IoError);
    expect(wrapped).toMatchObject({
      kind: "io",
      code: "ENOENT",
      message: "ENOENT: no such file or directory",
      cause,
    });
  });

  it("passes site errors and other values through", () => {
    const eof = new UnexpectedEofError("a.md");
    const plain = new Error("plain");

    expect(toSiteError(eof)).toBe(eof);
    expect(toSiteError(plain)).toBe(plain);
  });
});

describe("io", () => {
  it("resolves with the operation result", async () => {
    await expect(io(Promise.resolve(3))).resolves.toBe(3);
  });

  it("rejects with IoError for filesystem failures", async () => {
    await expect(io(Promise.reject(errno("EACCES", "denied")))).rejects.toBeInstanceOf(
      IoError,
    );
  });
});
