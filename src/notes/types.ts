import type { NoteFormat } from "../config/schema.js";

export interface Note {
  content: string; // inserted verbatim
  format: NoteFormat;
  tags: string[];
  timestamp: Date | null; // null when timestamps are disabled
}

export interface NoteInput {
  content: string;
  format: string;
  tags?: string[];
  includeTimestamp: boolean;
  timestamp?: Date;
}

export interface AddNoteOptions {
  content: string;
  format?: string;
  tags?: string[];
  file?: string; // vault-relative target instead of the daily note
  includeTimestamp?: boolean;
}

export interface CreateNoteOptions {
  title: string;
  content: string;
  dir?: string;
  frontmatter?: boolean;
}

export interface WrittenNote {
  path: string;
  text: string;
}

export interface RecentNote {
  path: string;
  modified: Date;
}

export interface TodayStatus {
  path: string;
  exists: boolean;
}
