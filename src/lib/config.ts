import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigError, describeError } from "./errors.js";
import { expandHome, resolveCommandsDir, resolveConfigFile } from "./paths.js";

export interface ShellConfig {
  sourcePath?: string;
  excludedCommands: string[];
  commandsDir: string;
  reportUnreadable: boolean;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function coerceString(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim()) return value.trim();
  return undefined;
}

function coerceBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(lowered)) return true;
    if (["0", "false", "no", "off"].includes(lowered)) return false;
  }
  return undefined;
}

function coerceStringList(value: unknown): string[] | undefined {
  if (typeof value === "string") return parseCommandList(value);
  if (!Array.isArray(value)) return undefined;
  return value.filter((entry): entry is string => typeof entry === "string").map(entry => entry.trim()).filter(Boolean);
}

/** Splits `"exit, status"` into keys; also used for `--exclude`. */
export function parseCommandList(value: string): string[] {
  return value.split(",").map(entry => entry.trim()).filter(Boolean);
}

function parseFileContents(content: string, ext: string, filePath: string): unknown {
  const lowered = ext.toLowerCase();
  try {
    if (lowered === ".json") return JSON.parse(content);
    if (lowered === ".yaml" || lowered === ".yml") return parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Unable to parse config file ${filePath}: ${describeError(error)}`, filePath);
  }
  // Unknown extension: JSON first, then YAML.
  try {
    return JSON.parse(content);
  } catch {
    try {
      return parseYaml(content);
    } catch (error) {
      throw new ConfigError(`Unable to parse config file ${filePath}: ${describeError(error)}`, filePath);
    }
  }
}

function extractCommandsNode(raw: unknown): RawConfig {
  if (!isRecord(raw)) return {};
  if (isRecord(raw.commands)) return raw.commands;
  return raw;
}

async function readConfigFile(filePath: string, required: boolean): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      if (!required) return undefined;
      throw new ConfigError(`Config file not found at ${filePath}`, filePath);
    }
    throw new ConfigError(`Failed to read config file ${filePath}: ${describeError(error)}`, filePath);
  }
  return parseFileContents(content, path.extname(filePath), filePath);
}

/**
 * Reads `filePath`, or the default config under the shell home when omitted.
 * Only an explicitly named file has to exist.
 */
export async function loadShellConfig(
  filePath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ShellConfig> {
  const resolved = path.resolve(expandHome(filePath ?? resolveConfigFile(env)));
  const raw = await readConfigFile(resolved, filePath !== undefined);
  const node = extractCommandsNode(raw);

  const excludedCommands = coerceStringList(env.AGENT_SHELL_EXCLUDED_COMMANDS)
    ?? coerceStringList(node.excludedCommands)
    ?? coerceStringList(node.exclude)
    ?? [];

  const configuredDir = coerceString(node.commandsDir) ?? coerceString(node.directory);
  // Relative directories are taken from the config file's location.
  let commandsDir = resolveCommandsDir(env);
  if (configuredDir && !env.AGENT_SHELL_COMMANDS_DIR?.trim()) {
    commandsDir = path.resolve(path.dirname(resolved), expandHome(configuredDir));
  }

  const reportUnreadable = coerceBoolean(node.reportUnreadable)
    ?? coerceBoolean(node.warnOnUnreadable)
    ?? true;

  return {
    sourcePath: raw === undefined ? undefined : resolved,
    excludedCommands,
    commandsDir,
    reportUnreadable,
  };
}

function isMissingFile(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
