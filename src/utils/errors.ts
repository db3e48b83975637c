export type ErrorCode =
  | "CONFIG_NOT_FOUND"
  | "CONFIG_INVALID"
  | "VAULT_PATH_INVALID"
  | "PATH_OUTSIDE_VAULT"
  | "FILE_EXISTS"
  | "EMPTY_CONTENT"
  | "INVALID_FORMAT"
  | "FILE_IO";

export class TermilinkError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "TermilinkError";
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigNotFoundError extends TermilinkError {
  constructor(message = "No configuration found.", options?: ErrorOptions) {
    super(message, "CONFIG_NOT_FOUND", options);
    this.name = "ConfigNotFoundError";
  }
}

export class ConfigInvalidError extends TermilinkError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string, options?: ErrorOptions) {
    super(field ? `Invalid config field '${field}': ${message}` : message, "CONFIG_INVALID", options);
    this.name = "ConfigInvalidError";
    this.field = field;
  }
}

export class VaultPathInvalidError extends TermilinkError {
  public readonly vaultPath: string;

  constructor(vaultPath: string, reason: "missing" | "not-a-directory") {
    super(
      reason === "missing"
        ? `Vault path does not exist: ${vaultPath}`
        : `Vault path is not a directory: ${vaultPath}`,
      "VAULT_PATH_INVALID"
    );
    this.name = "VaultPathInvalidError";
    this.vaultPath = vaultPath;
  }
}

export class PathOutsideVaultError extends TermilinkError {
  constructor(target: string, vaultPath: string) {
    super(`Path '${target}' resolves outside the vault (${vaultPath})`, "PATH_OUTSIDE_VAULT");
    this.name = "PathOutsideVaultError";
  }
}

export class FileExistsError extends TermilinkError {
  public readonly path: string;

  constructor(path: string, message = `File already exists: ${path}`) {
    super(message, "FILE_EXISTS");
    this.name = "FileExistsError";
    this.path = path;
  }
}

export class EmptyContentError extends TermilinkError {
  constructor(message = "Note content cannot be empty") {
    super(message, "EMPTY_CONTENT");
    this.name = "EmptyContentError";
  }
}

export class InvalidFormatError extends TermilinkError {
  constructor(format: string, allowed: readonly string[]) {
    super(`Invalid format '${format}'. Expected one of: ${allowed.join(", ")}`, "INVALID_FORMAT");
    this.name = "InvalidFormatError";
  }
}

export class FileIOError extends TermilinkError {
  public readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, "FILE_IO", options);
    this.name = "FileIOError";
    this.path = path;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function toFileIOError(error: unknown, action: string, path: string): TermilinkError {
  if (error instanceof TermilinkError) {
    return error;
  }
  const detail = isErrnoException(error) && error.code ? `${error.code}` : String(error);
  return new FileIOError(`Could not ${action} ${path} (${detail})`, path, { cause: error });
}

/**
 * Lines shown to the user for a failed command. Config problems get a hint
 * pointing at `config init`.
 */
export function formatErrorLines(error: unknown): string[] {
  if (error instanceof ConfigNotFoundError) {
    return [error.message, "Run 'termilink config init <vault_path>' to create one."];
  }
  if (error instanceof VaultPathInvalidError) {
    return [error.message, "Run 'termilink config set-vault <path>' to point at an existing vault."];
  }
  if (error instanceof Error) {
    return [error.message];
  }
  return [String(error)];
}
