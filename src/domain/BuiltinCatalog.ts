import type { Command, CommandHandler, CommandKey } from "./Command.js";

interface CommandDefinition {
  key: CommandKey;
  aliases: string[];
  description: string;
  handler: CommandHandler;
  exits?: boolean;
}

/**
 * Built-in commands in help order. Every alias appears in exactly one entry.
 */
export const COMMAND_DEFINITIONS: readonly CommandDefinition[] = [
  {
    key: "help",
    aliases: ["/help"],
    description: "Show help message",
    handler: "showHelp",
  },
  {
    key: "config",
    aliases: ["/config", "/theme", "/model"],
    description: "Edit config settings",
    handler: "showConfig",
  },
  {
    key: "reload",
    aliases: ["/reload"],
    description: "Reload configuration from disk",
    handler: "reloadConfig",
  },
  {
    key: "clear",
    aliases: ["/clear"],
    description: "Clear conversation history",
    handler: "clearHistory",
  },
  {
    key: "log",
    aliases: ["/log"],
    description: "Show path to current interaction log file",
    handler: "showLogPath",
  },
  {
    key: "compact",
    aliases: ["/compact"],
    description: "Compact conversation history by summarizing",
    handler: "compactHistory",
  },
  {
    key: "exit",
    aliases: ["/exit"],
    description: "Exit the application",
    handler: "exitApp",
    exits: true,
  },
  {
    key: "terminal-setup",
    aliases: ["/terminal-setup"],
    description: "Configure Shift+Enter for newlines",
    handler: "setupTerminal",
  },
  {
    key: "status",
    aliases: ["/status"],
    description: "Display agent statistics",
    handler: "showStatus",
  },
];

export function isCommandKey(value: string): value is CommandKey {
  return COMMAND_DEFINITIONS.some(def => def.key === value);
}

/**
 * Builds the catalog minus `excludedCommands`. Unknown keys are ignored.
 */
export function buildCatalog(excludedCommands: readonly string[] = []): Map<CommandKey, Command> {
  const excluded = new Set(excludedCommands);
  const catalog = new Map<CommandKey, Command>();
  for (const def of COMMAND_DEFINITIONS) {
    if (excluded.has(def.key)) continue;
    catalog.set(def.key, {
      key: def.key,
      aliases: new Set(def.aliases),
      description: def.description,
      handler: def.handler,
      exits: Boolean(def.exits),
    });
  }
  return catalog;
}
