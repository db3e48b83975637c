import { describe, it, expect } from "vitest";
import {
  ConfigInvalidError,
  ConfigNotFoundError,
  FileIOError,
  PathOutsideVaultError,
  TermilinkError,
  VaultPathInvalidError,
  formatErrorLines,
  toFileIOError,
} from "../src/utils/errors.js";

describe("errors", () => {
  it("carries a code per kind", () => {
    expect(new ConfigNotFoundError().code).toBe("CONFIG_NOT_FOUND");
    expect(new PathOutsideVaultError("../x", "/vault").code).toBe("PATH_OUTSIDE_VAULT");
    expect(new VaultPathInvalidError("/v", "missing")).toBeInstanceOf(TermilinkError);
  });

  it("names the offending config field", () => {
    const error = new ConfigInvalidError("Required", "vault_path");
    expect(error.field).toBe("vault_path");
    expect(error.message).toBe("Invalid config field 'vault_path': Required");
  });

  it("wraps fs errors with their errno code", () => {
    const cause = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
    const wrapped = toFileIOError(cause, "append to", "/vault/note.md");

    expect(wrapped).toBeInstanceOf(FileIOError);
    expect(wrapped.message).toBe("Could not append to /vault/note.md (EACCES)");
    expect(wrapped.cause).toBe(cause);
  });

  it("passes its own errors through unchanged", () => {
    const original = new PathOutsideVaultError("../x", "/vault");
    expect(toFileIOError(original, "write", "/x")).toBe(original);
  });

  it("adds a hint for a missing config", () => {
    expect(formatErrorLines(new ConfigNotFoundError("No configuration found."))).toEqual([
      "No configuration found.",
      "Run 'termilink config init <vault_path>' to create one.",
    ]);
    expect(formatErrorLines(new Error("boom"))).toEqual(["boom"]);
    expect(formatErrorLines("odd")).toEqual(["odd"]);
  });
});
