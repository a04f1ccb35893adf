import { isCustomCommand } from "../domain/Command.js";
import { formatAliases } from "./help.js";
import type { CommandRegistry } from "./registry.js";

export interface CommandListingEntry {
  type: "builtin" | "custom";
  name: string;
  aliases: string[];
  description: string;
  handler?: string;
  exits?: boolean;
  sourcePath?: string;
}

export function describeResolution(registry: CommandRegistry, userInput: string): string[] {
  const { command, args } = registry.findCommandWithArgs(userInput);
  if (!command) {
    return [`No command matched ${JSON.stringify(userInput.trim())}; it would be sent as a chat message.`];
  }

  if (isCustomCommand(command)) {
    return [
      `custom /${command.name} (${command.sourcePath})`,
      `  args: ${JSON.stringify(args)}`,
      "  prompt:",
      ...command.render(args).split("\n").map(line => `    ${line}`),
    ];
  }

  return [
    `built-in ${command.key} → ${command.handler}${command.exits ? " (ends session)" : ""}`,
    `  aliases: ${formatAliases(command.aliases)}`,
    `  args: ${JSON.stringify(args)}`,
  ];
}

export function listCommandEntries(registry: CommandRegistry): CommandListingEntry[] {
  const entries: CommandListingEntry[] = [];
  for (const command of registry.commands.values()) {
    entries.push({
      type: "builtin",
      name: command.key,
      aliases: [...command.aliases].sort(),
      description: command.description,
      handler: command.handler,
      exits: command.exits,
    });
  }
  for (const command of registry.customCommands.values()) {
    entries.push({
      type: "custom",
      name: command.name,
      aliases: [...command.aliases],
      description: command.description,
      sourcePath: command.sourcePath,
    });
  }
  return entries;
}

export function formatCommandListing(registry: CommandRegistry): string {
  const entries = listCommandEntries(registry);
  const width = Math.max(0, ...entries.map(entry => entry.aliases.join(", ").length));
  const rows = entries.map(entry => {
    const tag = entry.type === "custom" ? " [custom]" : "";
    return `  ${entry.aliases.join(", ").padEnd(width)} → ${entry.description}${tag}`;
  });
  return ["Slash Commands", "--------------", ...rows].join("\n");
}
