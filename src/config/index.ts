import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from "fs";
import { homedir } from "os";
import { dirname, extname, join, resolve } from "path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import type { ZodError } from "zod";
import {
  Config,
  ConfigOverrides,
  ConfigSchema,
  toConfigFile,
} from "./schema.js";
import {
  ConfigInvalidError,
  ConfigNotFoundError,
  VaultPathInvalidError,
  isErrnoException,
  toFileIOError,
} from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export const CONFIG_FILENAME = ".termilink.yaml";

export interface ConfigLocationOptions {
  home?: string;
  cwd?: string;
  /** Explicit config file; skips the search when set. */
  configPath?: string;
}

export interface LoadedConfig {
  config: Config;
  path: string;
}

export function getConfigLocations(options: ConfigLocationOptions = {}): string[] {
  const home = options.home ?? homedir();
  const cwd = options.cwd ?? process.cwd();
  return [
    join(home, CONFIG_FILENAME),
    join(home, ".config", "termilink", "config.yaml"),
    join(cwd, CONFIG_FILENAME),
  ];
}

export function getDefaultConfigPath(options: ConfigLocationOptions = {}): string {
  if (options.configPath) {
    return expandPath(options.configPath, options.home);
  }
  return getConfigLocations(options)[0];
}

export function expandPath(path: string, home: string = homedir()): string {
  if (path === "~") {
    return home;
  }
  if (path.startsWith("~/")) {
    return join(home, path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(home, path.slice(6));
  }
  return resolve(path);
}

export function findConfigFile(options: ConfigLocationOptions = {}): string | null {
  if (options.configPath) {
    const explicit = expandPath(options.configPath, options.home);
    return existsSync(explicit) ? explicit : null;
  }
  return getConfigLocations(options).find((candidate) => existsSync(candidate)) ?? null;
}

export function assertVaultDirectory(vaultPath: string): void {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(vaultPath).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      throw new VaultPathInvalidError(vaultPath, "missing");
    }
    throw toFileIOError(error, "inspect vault", vaultPath);
  }
  if (!isDirectory) {
    throw new VaultPathInvalidError(vaultPath, "not-a-directory");
  }
}

function fromZodError(error: ZodError, configPath: string): ConfigInvalidError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
  const message = issue ? `${issue.message} (in ${configPath})` : `invalid config in ${configPath}`;
  return new ConfigInvalidError(message, field, { cause: error });
}

function readConfigFile(configPath: string): unknown {
  const extension = extname(configPath).toLowerCase();
  if (![".yaml", ".yml", ".json"].includes(extension)) {
    throw new ConfigInvalidError(`Unsupported config file format '${extension || "(none)"}': ${configPath}`);
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw toFileIOError(error, "read config file", configPath);
  }

  let data: unknown;
  try {
    data = extension === ".json" ? JSON.parse(raw) : parseYaml(raw);
  } catch (error) {
    const kind = extension === ".json" ? "JSON" : "YAML";
    throw new ConfigInvalidError(`Invalid ${kind} in config file: ${configPath}`, undefined, { cause: error });
  }

  if (data === null || data === undefined) {
    throw new ConfigInvalidError(`Config file is empty: ${configPath}`);
  }
  if (typeof data !== "object" || Array.isArray(data)) {
    throw new ConfigInvalidError(`Config file must contain a mapping of settings: ${configPath}`);
  }
  return data;
}

function validateConfig(data: unknown, source: string, home?: string): Config {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    throw fromZodError(result.error, source);
  }
  return { ...result.data, vaultPath: expandPath(result.data.vaultPath, home) };
}

/**
 * Parses and validates raw settings, expanding and checking the vault path.
 */
export function parseConfig(data: unknown, source: string, home?: string): Config {
  const config = validateConfig(data, source, home);
  assertVaultDirectory(config.vaultPath);
  return config;
}

function requireConfigPath(options: ConfigLocationOptions): string {
  const configPath = findConfigFile(options);
  if (!configPath) {
    const searched = options.configPath
      ? expandPath(options.configPath, options.home)
      : getConfigLocations(options).join(", ");
    throw new ConfigNotFoundError(`No configuration found (looked in: ${searched}).`);
  }
  return configPath;
}

export function loadConfig(options: ConfigLocationOptions = {}): LoadedConfig {
  const configPath = requireConfigPath(options);
  const config = parseConfig(readConfigFile(configPath), configPath, options.home);
  logger.debug({ path: configPath }, "loaded config");
  return { config, path: configPath };
}

/**
 * Loads the config without checking that its vault exists, so a config whose
 * vault has moved can still be repaired.
 */
export function loadConfigForUpdate(options: ConfigLocationOptions = {}): LoadedConfig {
  const configPath = requireConfigPath(options);
  const config = validateConfig(readConfigFile(configPath), configPath, options.home);
  logger.debug({ path: configPath }, "loaded config for update");
  return { config, path: configPath };
}

export function serializeConfig(config: Config, configPath: string): string {
  const data = toConfigFile(config);
  if (extname(configPath).toLowerCase() === ".json") {
    return JSON.stringify(data, null, 2) + "\n";
  }
  return stringifyYaml(data);
}

/**
 * Writes the config through a temp file in the same directory and renames it
 * into place, so a crash mid-write never leaves a truncated config.
 */
export function saveConfig(config: Config, configPath: string): string {
  const result = ConfigSchema.safeParse(toConfigFile(config));
  if (!result.success) {
    throw fromZodError(result.error, configPath);
  }
  const contents = serializeConfig(result.data, configPath);
  const tempPath = `${configPath}.${process.pid}.${Date.now()}.tmp`;

  try {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(tempPath, contents, { encoding: "utf-8", mode: 0o600 });
    renameSync(tempPath, configPath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw toFileIOError(error, "write config file", configPath);
  }

  logger.debug({ path: configPath }, "saved config");
  return configPath;
}

export function createDefaultConfig(
  vaultPath: string,
  overrides: ConfigOverrides = {},
  home?: string
): Config {
  const defaults = parseConfig({ vault_path: vaultPath }, "defaults", home);
  const merged: Config = { ...defaults, ...overrides, vaultPath: defaults.vaultPath };
  return parseConfig(toConfigFile(merged), "defaults", home);
}

export * from "./schema.js";
