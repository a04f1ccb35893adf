import * as path from "node:path";
import { CustomCommand } from "../domain/Command.js";
import { describeError } from "./errors.js";
import type { CommandFileSystem } from "../infrastructure/CommandFileSystem.js";

export const CUSTOM_COMMAND_EXTENSION = ".md";

export type SkipReason = "reserved" | "shadowed" | "unreadable";

export interface CustomCommandSkip {
  /** Empty when the directory itself could not be listed. */
  name: string;
  filePath: string;
  reason: SkipReason;
  message?: string;
}

export interface LoadCustomCommandsOptions {
  directory: string;
  fileSystem: CommandFileSystem;
  /** Aliases already taken by built-ins; a custom command never replaces one. */
  isReserved: (alias: string) => boolean;
  onSkip?: (skip: CustomCommandSkip) => void;
}

export interface CustomCommandTable {
  commands: Map<string, CustomCommand>;
  skipped: CustomCommandSkip[];
}

export function loadCustomCommands(options: LoadCustomCommandsOptions): CustomCommandTable {
  const { directory, fileSystem, isReserved, onSkip } = options;
  const table: CustomCommandTable = { commands: new Map(), skipped: [] };
  if (!fileSystem.isDirectory(directory)) return table;

  const skip = (entry: CustomCommandSkip) => {
    table.skipped.push(entry);
    onSkip?.(entry);
  };

  let files: string[];
  try {
    files = fileSystem.listFiles(directory, CUSTOM_COMMAND_EXTENSION);
  } catch (error) {
    // An unlistable directory counts as an empty one.
    skip({ name: "", filePath: directory, reason: "unreadable", message: describeError(error) });
    return table;
  }

  for (const filePath of files) {
    const name = path.basename(filePath, CUSTOM_COMMAND_EXTENSION);
    if (!name) continue;
    if (name.startsWith("_")) {
      skip({ name, filePath, reason: "reserved" });
      continue;
    }
    if (isReserved(`/${name}`)) {
      skip({ name, filePath, reason: "shadowed" });
      continue;
    }

    let template: string;
    try {
      template = fileSystem.readText(filePath);
    } catch (error) {
      skip({ name, filePath, reason: "unreadable", message: describeError(error) });
      continue;
    }
    table.commands.set(name, new CustomCommand({ name, template, sourcePath: filePath }));
  }

  return table;
}
