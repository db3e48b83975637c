import { isAbsolute } from "path";
import { z } from "zod";
import { findPatternProblem } from "../utils/dates.js";

export const NOTE_FORMATS = ["plain", "timestamp", "bullet", "task"] as const;

export const NoteFormatSchema = z.enum(NOTE_FORMATS);

const DatePatternSchema = z
  .string()
  .min(1)
  .superRefine((pattern, ctx) => {
    const problem = findPatternProblem(pattern);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  });

// Keys as they appear in the YAML/JSON file
export const ConfigFileSchema = z.object({
  vault_path: z.string().min(1, "vault path is required"),
  daily_notes_path: z
    .string()
    .default("Daily Notes")
    .refine((p) => !isAbsolute(p), "must be relative to the vault"),
  daily_note_format: DatePatternSchema.default("%Y-%m-%d"),
  default_format: NoteFormatSchema.default("timestamp"),
  include_timestamp: z.boolean().default(true),
  timestamp_format: DatePatternSchema.default("%H:%M"),
  append_newline: z.boolean().default(true),
});

export const ConfigSchema = ConfigFileSchema.transform((file) => ({
  vaultPath: file.vault_path,
  dailyNotesPath: file.daily_notes_path,
  dailyNoteFormat: file.daily_note_format,
  defaultFormat: file.default_format,
  includeTimestamp: file.include_timestamp,
  timestampFormat: file.timestamp_format,
  appendNewline: file.append_newline,
}));

export type NoteFormat = z.infer<typeof NoteFormatSchema>;
export type ConfigFile = z.output<typeof ConfigFileSchema>;
export type Config = z.output<typeof ConfigSchema>;
export type ConfigOverrides = Partial<Omit<Config, "vaultPath">>;

export function toConfigFile(config: Config): ConfigFile {
  return {
    vault_path: config.vaultPath,
    daily_notes_path: config.dailyNotesPath,
    daily_note_format: config.dailyNoteFormat,
    default_format: config.defaultFormat,
    include_timestamp: config.includeTimestamp,
    timestamp_format: config.timestampFormat,
    append_newline: config.appendNewline,
  };
}

export const DEFAULT_SETTINGS = ConfigFileSchema.omit({ vault_path: true }).parse({});
