import { NOTE_FORMATS, NoteFormatSchema } from "../config/schema.js";
import { formatDate } from "../utils/dates.js";
import { EmptyContentError, InvalidFormatError } from "../utils/errors.js";
import type { Note, NoteInput } from "./types.js";

export function normalizeTags(tags: string[]): string[] {
  const cleaned = tags.map((tag) => tag.trim().replace(/^#+/, "")).filter(Boolean);
  return [...new Set(cleaned)];
}

export function buildNote(input: NoteInput): Note {
  if (!input.content.trim()) {
    throw new EmptyContentError();
  }

  const format = NoteFormatSchema.safeParse(input.format);
  if (!format.success) {
    throw new InvalidFormatError(input.format, NOTE_FORMATS);
  }

  return {
    content: input.content,
    format: format.data,
    tags: normalizeTags(input.tags ?? []),
    timestamp: input.includeTimestamp ? input.timestamp ?? new Date() : null,
  };
}

export function formatContent(note: Note, timestampFormat: string = "%H:%M"): string {
  const time = note.timestamp ? formatDate(note.timestamp, timestampFormat) : "";
  const tags = note.tags.map((tag) => `#${tag}`).join(" ");
  const suffix = tags ? ` ${tags}` : "";

  switch (note.format) {
    case "plain":
      return [time, note.content, tags].filter(Boolean).join(" ");
    case "timestamp":
      return (time ? `**${time}** - ` : "") + note.content + suffix;
    case "bullet":
      return "- " + (time ? `${time} - ` : "") + note.content + suffix;
    case "task":
      return "- [ ] " + (time ? `${time} - ` : "") + note.content + suffix;
  }
}
