import prompts from "prompts";
import chalk from "chalk";
import { existsSync, statSync } from "fs";
import { z } from "zod";
import {
  Config,
  DEFAULT_SETTINGS,
  NOTE_FORMATS,
  NoteFormatSchema,
  createDefaultConfig,
  expandPath,
  saveConfig,
} from "../config/index.js";

export interface SetupOptions {
  /** Where the new config is written. */
  configPath: string;
  /** Config file that already exists, if any. */
  existingPath: string | null;
  force?: boolean;
  home?: string;
}

const SetupAnswersSchema = z.object({
  vaultPath: z.string().min(1),
  dailyNotesPath: z.string(),
  defaultFormat: NoteFormatSchema,
  includeTimestamp: z.boolean(),
});

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

export async function confirmOverwrite(existingPath: string): Promise<boolean> {
  const { overwrite } = await prompts({
    type: "confirm",
    name: "overwrite",
    message: `Config already exists at ${existingPath}. Overwrite?`,
    initial: false,
  });
  return overwrite === true;
}

export async function runInteractiveSetup(options: SetupOptions): Promise<Config | null> {
  console.log(chalk.bold("\ntermilink setup\n"));

  if (options.existingPath && !options.force) {
    if (!(await confirmOverwrite(options.existingPath))) {
      console.log(chalk.yellow("Setup cancelled."));
      return null;
    }
  }

  let cancelled = false;
  const responses = await prompts(
    [
      {
        type: "text",
        name: "vaultPath",
        message: "Path to your Obsidian vault:",
        validate: (value: string) => {
          if (!value.trim()) return "Vault path is required";
          if (!isDirectory(expandPath(value.trim(), options.home))) return "Not an existing directory";
          return true;
        },
      },
      {
        type: "text",
        name: "dailyNotesPath",
        message: "Daily notes folder (relative to the vault):",
        initial: DEFAULT_SETTINGS.daily_notes_path,
      },
      {
        type: "select",
        name: "defaultFormat",
        message: "Default note format:",
        choices: NOTE_FORMATS.map((format) => ({ title: format, value: format })),
        initial: NOTE_FORMATS.indexOf(DEFAULT_SETTINGS.default_format),
      },
      {
        type: "confirm",
        name: "includeTimestamp",
        message: "Prefix notes with the current time?",
        initial: DEFAULT_SETTINGS.include_timestamp,
      },
    ],
    {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    }
  );

  if (cancelled) {
    console.log(chalk.yellow("\nSetup cancelled."));
    return null;
  }

  const answers = SetupAnswersSchema.parse(responses);
  const config = createDefaultConfig(
    answers.vaultPath.trim(),
    {
      dailyNotesPath: answers.dailyNotesPath.trim() || DEFAULT_SETTINGS.daily_notes_path,
      defaultFormat: answers.defaultFormat,
      includeTimestamp: answers.includeTimestamp,
    },
    options.home
  );

  console.log(chalk.dim("\nCreating configuration..."));
  const savedPath = saveConfig(config, options.configPath);
  console.log(chalk.green(`✓ Created ${savedPath}`));

  console.log(chalk.bold.green("\nSetup complete!\n"));
  console.log("Next steps:");
  console.log(chalk.dim("  Add to today's note:   ") + 'termilink quick "first note"');
  console.log(chalk.dim("  Check the config:      ") + "termilink config show\n");

  return config;
}

export async function checkFirstRun(options: SetupOptions): Promise<Config | null> {
  console.log(chalk.yellow("No configuration found. Running first-time setup...\n"));
  return runInteractiveSetup(options);
}
