import { existsSync, readFileSync } from "fs";
import { join, relative } from "path";
import moment from "moment";
import type { Config } from "../config/index.js";
import { formatDate } from "../utils/dates.js";
import { EmptyContentError, toFileIOError } from "../utils/errors.js";
import {
  appendToNote,
  createNoteFile,
  getDailyNotePath,
  listRecentNotes,
  resolveInsideVault,
  withNoteExtension,
} from "./files.js";
import { withFrontmatter } from "./frontmatter.js";
import { buildNote, formatContent } from "./note.js";
import type {
  AddNoteOptions,
  CreateNoteOptions,
  RecentNote,
  TodayStatus,
  WrittenNote,
} from "./types.js";

export class NoteManager {
  private config: Config;

  constructor(config: Config) {
    this.config = config;
  }

  getDailyNotePath(date: Date = new Date()): string {
    return getDailyNotePath(this.config, date);
  }

  relativePath(path: string): string {
    return relative(this.config.vaultPath, path);
  }

  private dailyNoteHeader(date: Date): string {
    return withFrontmatter("", { date: formatDate(date, "%Y-%m-%d") });
  }

  addNote(options: AddNoteOptions, now: Date = new Date()): WrittenNote {
    const note = buildNote({
      content: options.content,
      format: options.format ?? this.config.defaultFormat,
      tags: options.tags,
      includeTimestamp: options.includeTimestamp ?? this.config.includeTimestamp,
      timestamp: now,
    });
    const text = formatContent(note, this.config.timestampFormat);

    const file = options.file?.trim();
    if (file === "") {
      throw new EmptyContentError("Target file name cannot be empty");
    }
    const isDaily = file === undefined;
    const path =
      file === undefined
        ? this.getDailyNotePath(now)
        : resolveInsideVault(this.config.vaultPath, withNoteExtension(file));

    // New daily notes start with a frontmatter block
    const payload = isDaily && !existsSync(path) ? this.dailyNoteHeader(now) + text : text;
    appendToNote(path, payload, this.config.appendNewline);

    return { path, text };
  }

  quickNote(content: string, now: Date = new Date()): WrittenNote {
    return this.addNote({ content }, now);
  }

  createNote(options: CreateNoteOptions, now: Date = new Date()): string {
    const title = options.title.trim();
    if (!title) {
      throw new EmptyContentError("Note title cannot be empty");
    }

    const fileName = withNoteExtension(title);
    const relativeTarget = options.dir ? join(options.dir, fileName) : fileName;
    const path = resolveInsideVault(this.config.vaultPath, relativeTarget);

    let initialContent: string;
    if (options.frontmatter ?? true) {
      initialContent = withFrontmatter(options.content, { created: moment(now).format() });
    } else if (options.content === "" || options.content.endsWith("\n")) {
      initialContent = options.content;
    } else {
      initialContent = `${options.content}\n`;
    }

    createNoteFile(path, initialContent);
    return path;
  }

  getRecentNotes(limit: number = 10): RecentNote[] {
    return listRecentNotes(this.config.vaultPath, limit);
  }

  getTodayStatus(now: Date = new Date()): TodayStatus {
    const path = this.getDailyNotePath(now);
    return { path, exists: existsSync(path) };
  }

  readNote(path: string): string {
    try {
      return readFileSync(path, "utf-8");
    } catch (error) {
      throw toFileIOError(error, "read", path);
    }
  }
}
