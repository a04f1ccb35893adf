export { CommandRegistry, splitCommandInput } from "./lib/registry.js";
export type { CommandMatch, CommandRegistryOptions, ResolvedInput } from "./lib/registry.js";
export { ARGUMENTS_PLACEHOLDER, CustomCommand, isCustomCommand } from "./domain/Command.js";
export type { Command, CommandHandler, CommandKey } from "./domain/Command.js";
export { COMMAND_DEFINITIONS, buildCatalog, isCommandKey } from "./domain/BuiltinCatalog.js";
export { NodeCommandFileSystem } from "./infrastructure/CommandFileSystem.js";
export type { CommandFileSystem } from "./infrastructure/CommandFileSystem.js";
export { LoggingService } from "./infrastructure/LoggingService.js";
export type { CustomCommandSkip, SkipReason } from "./lib/customCommands.js";
export { loadShellConfig } from "./lib/config.js";
export type { ShellConfig } from "./lib/config.js";
export { ConfigError } from "./lib/errors.js";
export { resolveCommandsDir, resolveShellHome } from "./lib/paths.js";
