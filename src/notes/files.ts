import {
  appendFileSync,
  closeSync,
  existsSync,
  mkdirSync,
  openSync,
  readSync,
  readdirSync,
  realpathSync,
  statSync,
  writeSync,
} from "fs";
import type { Dirent } from "fs";
import { basename, dirname, extname, isAbsolute, join, relative, resolve, sep } from "path";
import type { Config } from "../config/schema.js";
import { formatDate, parseDate } from "../utils/dates.js";
import {
  FileExistsError,
  PathOutsideVaultError,
  VaultPathInvalidError,
  isErrnoException,
  toFileIOError,
} from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import type { RecentNote } from "./types.js";

export const NOTE_EXTENSION = ".md";

function isInside(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel !== "" && rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

// Real path of the deepest existing ancestor, with the missing tail re-attached.
function realpathOfExisting(target: string): string {
  const missing: string[] = [];
  let current = target;
  while (!existsSync(current)) {
    const parent = dirname(current);
    if (parent === current) break;
    missing.unshift(basename(current));
    current = parent;
  }
  return join(realpathSync(current), ...missing);
}

/**
 * Resolves `relativePath` against the vault, following `..` and symlinks, and
 * rejects anything that does not land strictly inside the vault.
 */
export function resolveInsideVault(vaultPath: string, relativePath: string): string {
  let vaultReal: string;
  try {
    vaultReal = realpathSync(vaultPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new VaultPathInvalidError(vaultPath, "missing");
    }
    throw toFileIOError(error, "resolve vault", vaultPath);
  }

  const target = resolve(vaultPath, relativePath);
  let targetReal: string;
  try {
    targetReal = realpathOfExisting(target);
  } catch (error) {
    throw toFileIOError(error, "resolve", target);
  }

  if (!isInside(vaultReal, targetReal)) {
    throw new PathOutsideVaultError(relativePath, vaultPath);
  }
  return target;
}

export function withNoteExtension(name: string): string {
  return extname(name).toLowerCase() === NOTE_EXTENSION ? name : `${name}${NOTE_EXTENSION}`;
}

export function getDailyNotePath(config: Config, date: Date = new Date()): string {
  const fileName = formatDate(date, config.dailyNoteFormat) + NOTE_EXTENSION;
  return resolveInsideVault(config.vaultPath, join(config.dailyNotesPath, fileName));
}

export function parseDailyNoteDate(fileName: string, dailyNoteFormat: string): Date | null {
  const stem = fileName.endsWith(NOTE_EXTENSION)
    ? fileName.slice(0, -NOTE_EXTENSION.length)
    : fileName;
  return parseDate(stem, dailyNoteFormat);
}

function lastByte(path: string, size: number): string {
  const fd = openSync(path, "r");
  try {
    const buffer = Buffer.alloc(1);
    readSync(fd, buffer, 0, 1, size - 1);
    return buffer.toString("utf-8");
  } finally {
    closeSync(fd);
  }
}

/**
 * Appends `text` plus a newline in a single append-mode write. Existing
 * content is never rewritten; a missing final newline is repaired first and
 * `appendNewline` adds a blank separator line.
 */
export function appendToNote(path: string, text: string, appendNewline: boolean): void {
  try {
    mkdirSync(dirname(path), { recursive: true });

    const size = existsSync(path) ? statSync(path).size : 0;
    let prefix = "";
    if (size > 0) {
      if (lastByte(path, size) !== "\n") prefix += "\n";
      if (appendNewline) prefix += "\n";
    }

    appendFileSync(path, `${prefix}${text}\n`, "utf-8");
  } catch (error) {
    throw toFileIOError(error, "append to", path);
  }
  logger.debug({ path, bytes: Buffer.byteLength(text) }, "appended to note");
}

export function createNoteFile(path: string, initialContent: string): void {
  let fd: number;
  try {
    mkdirSync(dirname(path), { recursive: true });
    fd = openSync(path, "wx");
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") {
      throw new FileExistsError(path);
    }
    throw toFileIOError(error, "create", path);
  }

  try {
    writeSync(fd, initialContent, null, "utf-8");
  } catch (error) {
    throw toFileIOError(error, "write", path);
  } finally {
    closeSync(fd);
  }
  logger.debug({ path }, "created note");
}

function collectNotes(dir: string, into: RecentNote[]): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    logger.warn({ dir, code: isErrnoException(error) ? error.code : undefined }, "skipping unreadable directory");
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (!entry.name.startsWith(".")) {
        collectNotes(fullPath, into);
      }
      continue;
    }

    if (!entry.name.endsWith(NOTE_EXTENSION) || !(entry.isFile() || entry.isSymbolicLink())) {
      continue;
    }

    try {
      const stats = statSync(fullPath);
      if (stats.isFile()) {
        into.push({ path: fullPath, modified: stats.mtime });
      }
    } catch (error) {
      logger.warn({ path: fullPath, code: isErrnoException(error) ? error.code : undefined }, "skipping unreadable note");
    }
  }
}

export function listRecentNotes(vaultPath: string, limit: number): RecentNote[] {
  const notes: RecentNote[] = [];
  collectNotes(vaultPath, notes);

  return notes
    .sort((a, b) => b.modified.getTime() - a.modified.getTime() || a.path.localeCompare(b.path))
    .slice(0, Math.max(0, limit));
}
