import { buildCatalog } from "../domain/BuiltinCatalog.js";
import { isCustomCommand, type Command, type CommandKey, type CustomCommand } from "../domain/Command.js";
import { CommandAliasRegistry } from "../infrastructure/CommandAliasRegistry.js";
import { NodeCommandFileSystem, type CommandFileSystem } from "../infrastructure/CommandFileSystem.js";
import { LoggingService } from "../infrastructure/LoggingService.js";
import { loadCustomCommands, type CustomCommandSkip } from "./customCommands.js";
import { renderHelpText } from "./help.js";
import { resolveCommandsDir } from "./paths.js";

export interface CommandRegistryOptions {
  /** Catalog keys to leave out, e.g. `["exit"]`. Unknown keys are ignored. */
  excludedCommands?: readonly string[];
  commandsDir?: string;
  fileSystem?: CommandFileSystem;
  logger?: LoggingService;
  /** Warn through `logger` for each custom command file that cannot be read. */
  reportUnreadable?: boolean;
}

export interface CommandMatch {
  command: Command | CustomCommand | undefined;
  args: string;
}

export type ResolvedInput =
  | { kind: "builtin"; command: Command; args: string }
  | { kind: "custom"; command: CustomCommand; args: string; prompt: string }
  | { kind: "message"; text: string };

/**
 * Session-scoped lookup from typed input to command descriptors.
 *
 * Everything is built in the constructor and never changes afterwards;
 * reloading means constructing a new registry.
 */
export class CommandRegistry {
  readonly commands: ReadonlyMap<CommandKey, Command>;
  readonly customCommands: ReadonlyMap<string, CustomCommand>;
  readonly skippedFiles: readonly CustomCommandSkip[];
  readonly commandsDir: string;
  private readonly aliasMap: CommandAliasRegistry;

  constructor(options: CommandRegistryOptions = {}) {
    const logger = options.logger ?? new LoggingService();
    const reportUnreadable = options.reportUnreadable ?? true;

    this.commands = buildCatalog(options.excludedCommands);
    this.aliasMap = new CommandAliasRegistry(this.commands);
    this.commandsDir = options.commandsDir ?? resolveCommandsDir();

    const table = loadCustomCommands({
      directory: this.commandsDir,
      fileSystem: options.fileSystem ?? new NodeCommandFileSystem(),
      isReserved: alias => this.aliasMap.has(alias),
      onSkip: skip => {
        if (skip.reason === "unreadable") {
          if (!reportUnreadable) return;
          const detail = skip.message ?? "unreadable";
          logger.warn(
            skip.name
              ? `Skipping custom command ${skip.filePath}: ${detail}`
              : `Cannot list custom commands in ${skip.filePath}: ${detail}`
          );
          return;
        }
        logger.log(`Ignoring ${skip.filePath} (${skip.reason})`);
      },
    });
    this.customCommands = table.commands;
    this.skippedFiles = table.skipped;

    logger.log(
      `Loaded ${this.commands.size} built-in and ${this.customCommands.size} custom commands from ${this.commandsDir}`
    );
  }

  /** Exact alias lookup for an already isolated token; custom commands are not consulted. */
  findCommand(userInput: string): Command | undefined {
    const key = this.aliasMap.resolve(userInput.toLowerCase().trim());
    return key ? this.commands.get(key) : undefined;
  }

  findCommandWithArgs(userInput: string): CommandMatch {
    const { token, args } = splitCommandInput(userInput);
    const name = token.toLowerCase();

    const key = this.aliasMap.resolve(name);
    const builtin = key ? this.commands.get(key) : undefined;
    if (builtin) return { command: builtin, args };

    if (name.startsWith("/")) {
      const custom = this.customCommands.get(name.slice(1));
      if (custom) return { command: custom, args };
    }

    return { command: undefined, args: "" };
  }

  resolveInput(userInput: string): ResolvedInput {
    const { command, args } = this.findCommandWithArgs(userInput);
    if (!command) return { kind: "message", text: userInput };
    if (isCustomCommand(command)) {
      return { kind: "custom", command, args, prompt: command.render(args) };
    }
    return { kind: "builtin", command, args };
  }

  listAliases(): string[] {
    const aliases = Object.keys(this.aliasMap.getAll());
    for (const name of this.customCommands.keys()) {
      aliases.push(`/${name}`);
    }
    return aliases.sort();
  }

  getAliasMap(): Record<string, CommandKey> {
    return this.aliasMap.getAll();
  }

  getHelpText(): string {
    return renderHelpText(this.commands.values(), this.customCommands.values());
  }
}

export function splitCommandInput(userInput: string): { token: string; args: string } {
  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(userInput.trim());
  if (!match) return { token: "", args: "" };
  return { token: match[1], args: match[2] ?? "" };
}
