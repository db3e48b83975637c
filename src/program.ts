import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import moment from "moment";
import prompts from "prompts";
import { stringify as stringifyYaml } from "yaml";
import {
  ConfigLocationOptions,
  LoadedConfig,
  NOTE_FORMATS,
  NoteFormat,
  NoteFormatSchema,
  assertVaultDirectory,
  createDefaultConfig,
  expandPath,
  findConfigFile,
  getDefaultConfigPath,
  loadConfig,
  loadConfigForUpdate,
  saveConfig,
  toConfigFile,
} from "./config/index.js";
import { NoteManager } from "./notes/manager.js";
import { checkFirstRun, confirmOverwrite, runInteractiveSetup } from "./setup/interactive.js";
import {
  ConfigInvalidError,
  ConfigNotFoundError,
  FileExistsError,
  InvalidFormatError,
} from "./utils/errors.js";
import { setLogLevel } from "./utils/logger.js";

export interface ProgramOptions {
  home?: string;
  cwd?: string;
  /** Whether prompts may be shown; defaults to stdin being a TTY. */
  interactive?: boolean;
  now?: () => Date;
  version?: string;
}

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

interface AddCommandOptions {
  format?: NoteFormat;
  tag: string[];
  file?: string;
  timestamp: boolean;
}

interface CreateCommandOptions {
  dir?: string;
  frontmatter: boolean;
}

interface InitCommandOptions {
  dailyNotesPath?: string;
  dailyNoteFormat?: string;
  defaultFormat?: NoteFormat;
  force?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseNoteFormat(value: string): NoteFormat {
  const result = NoteFormatSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidFormatError(value, NOTE_FORMATS);
  }
  return result.data;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const interactive = options.interactive ?? process.stdin.isTTY === true;
  const now = options.now ?? (() => new Date());
  const program = new Command();

  const locations = (): ConfigLocationOptions => {
    const globals = program.opts<GlobalOptions>();
    return { home: options.home, cwd: options.cwd, configPath: globals.config };
  };

  // Loads the config, offering first-run setup when none exists
  const requireConfig = async (): Promise<LoadedConfig> => {
    try {
      return loadConfig(locations());
    } catch (error) {
      if (!(error instanceof ConfigNotFoundError) || !interactive) {
        throw error;
      }
      const configPath = getDefaultConfigPath(locations());
      const config = await checkFirstRun({ configPath, existingPath: null, home: options.home });
      if (!config) {
        throw error;
      }
      return { config, path: configPath };
    }
  };

  program
    .name("termilink")
    .description("Take notes in the terminal and append them to an Obsidian vault")
    .version(options.version ?? "0.0.0")
    .option("-c, --config <path>", "Use a specific config file")
    .option("-v, --verbose", "Log debug output to stderr")
    .exitOverride()
    .hook("preAction", () => {
      if (program.opts<GlobalOptions>().verbose) {
        setLogLevel("debug");
      }
    });

  program
    .command("add <content>")
    .description("Add a note to today's daily note or to a named file")
    .option("-F, --format <format>", `Note format (${NOTE_FORMATS.join(", ")})`, parseNoteFormat)
    .option("-t, --tag <tag>", "Tag to add (repeatable)", collect, [])
    .option("-f, --file <name>", "Target file in the vault instead of the daily note")
    .option("--no-timestamp", "Leave out the timestamp")
    .action(async (content: string, cmdOptions: AddCommandOptions) => {
      const { config } = await requireConfig();
      const manager = new NoteManager(config);

      const written = manager.addNote(
        {
          content,
          format: cmdOptions.format,
          tags: cmdOptions.tag,
          file: cmdOptions.file,
          includeTimestamp: config.includeTimestamp && cmdOptions.timestamp,
        },
        now()
      );

      console.log(chalk.green(`✓ Note added to: ${chalk.cyan(manager.relativePath(written.path))}`));
      console.log(chalk.dim(written.text));
    });

  program
    .command("quick <content>")
    .description("Add a note to today's daily note with the configured defaults")
    .action(async (content: string) => {
      const { config } = await requireConfig();
      const manager = new NoteManager(config);
      const written = manager.quickNote(content, now());
      console.log(chalk.green(`✓ Added to ${manager.relativePath(written.path)}`));
    });

  program
    .command("create <title> [content]")
    .description("Create a new note file in the vault")
    .option("-d, --dir <subdir>", "Subdirectory in the vault")
    .option("--no-frontmatter", "Write the content without a frontmatter block")
    .action(async (title: string, content: string | undefined, cmdOptions: CreateCommandOptions) => {
      const { config } = await requireConfig();
      const manager = new NoteManager(config);

      let body = content ?? "";
      if (content === undefined && interactive) {
        const { initial } = await prompts({
          type: "text",
          name: "initial",
          message: "Initial content (Enter to skip):",
          initial: "",
        });
        body = typeof initial === "string" ? initial : "";
      }

      const path = manager.createNote(
        { title, content: body, dir: cmdOptions.dir, frontmatter: cmdOptions.frontmatter },
        now()
      );
      console.log(chalk.green(`✓ Created: ${chalk.cyan(manager.relativePath(path))}`));
    });

  program
    .command("recent")
    .description("List recently modified notes")
    .option("-l, --limit <n>", "Number of notes to show", parsePositiveInt, 10)
    .action(async (cmdOptions: { limit: number }) => {
      const { config } = await requireConfig();
      const manager = new NoteManager(config);
      const notes = manager.getRecentNotes(cmdOptions.limit);

      if (notes.length === 0) {
        console.log(chalk.yellow("No notes found in vault."));
        return;
      }

      console.log(chalk.bold(`\nRecently modified notes (${notes.length}):\n`));
      for (const note of notes) {
        console.log(
          `${chalk.cyan(manager.relativePath(note.path))} ${chalk.dim(moment(note.modified).format("YYYY-MM-DD HH:mm"))}`
        );
      }
    });

  program
    .command("today")
    .description("Show the path of today's daily note")
    .option("-p, --print", "Also print the note's content")
    .action(async (cmdOptions: { print?: boolean }) => {
      const { config } = await requireConfig();
      const manager = new NoteManager(config);
      const status = manager.getTodayStatus(now());

      console.log(chalk.bold("Today's daily note: ") + chalk.cyan(manager.relativePath(status.path)));
      console.log(
        status.exists ? chalk.green("Status: ✓ exists") : chalk.yellow("Status: ✗ not created yet")
      );

      if (cmdOptions.print && status.exists) {
        console.log();
        console.log(manager.readNote(status.path));
      }
    });

  const configCmd = program.command("config").description("Manage configuration");

  configCmd
    .command("init [vault_path]")
    .description("Create a configuration file")
    .option("--daily-notes-path <path>", "Daily notes folder relative to the vault")
    .option("--daily-note-format <pattern>", "strftime-style pattern for daily note names")
    .option("--default-format <format>", `Default note format (${NOTE_FORMATS.join(", ")})`, parseNoteFormat)
    .option("--force", "Overwrite an existing configuration")
    .action(async (vaultArg: string | undefined, cmdOptions: InitCommandOptions) => {
      const existingPath = findConfigFile(locations());
      const configPath = existingPath ?? getDefaultConfigPath(locations());

      if (vaultArg === undefined) {
        if (!interactive) {
          throw new ConfigInvalidError("a vault path is required: termilink config init <vault_path>", "vault_path");
        }
        await runInteractiveSetup({ configPath, existingPath, force: cmdOptions.force, home: options.home });
        return;
      }

      if (existingPath && !cmdOptions.force) {
        const overwrite = interactive && (await confirmOverwrite(existingPath));
        if (!overwrite) {
          throw new FileExistsError(
            existingPath,
            `Configuration already exists at ${existingPath}. Use --force to override.`
          );
        }
      }

      const config = createDefaultConfig(
        vaultArg,
        {
          dailyNotesPath: cmdOptions.dailyNotesPath,
          dailyNoteFormat: cmdOptions.dailyNoteFormat,
          defaultFormat: cmdOptions.defaultFormat,
        },
        options.home
      );
      const savedPath = saveConfig(config, configPath);

      console.log(chalk.green(`✓ Configuration created at: ${chalk.cyan(savedPath)}`));
      console.log(`Vault: ${chalk.cyan(config.vaultPath)}`);
      console.log(`Daily notes: ${chalk.cyan(config.dailyNotesPath)}`);
    });

  configCmd
    .command("show")
    .description("Show the current configuration")
    .action(async () => {
      const { config, path } = await requireConfig();
      console.log(chalk.dim(`# ${path}`));
      console.log(stringifyYaml(toConfigFile(config)).trimEnd());
    });

  configCmd
    .command("set-vault <path>")
    .description("Point the configuration at a different vault")
    .action(async (vaultArg: string) => {
      const { config, path } = loadConfigForUpdate(locations());
      const vaultPath = expandPath(vaultArg, options.home);
      assertVaultDirectory(vaultPath);

      saveConfig({ ...config, vaultPath }, path);
      console.log(chalk.green(`✓ Vault path updated to: ${chalk.cyan(vaultPath)}`));
    });

  return program;
}
