import type { Command, CustomCommand } from "../domain/Command.js";

const HELP_PREAMBLE = [
  "### Keyboard Shortcuts",
  "",
  "- `Enter` Submit message",
  "- `Ctrl+J` / `Shift+Enter` Insert newline",
  "- `Escape` Interrupt agent or close dialogs",
  "- `Ctrl+C` Quit (or clear input if text present)",
  "- `Ctrl+O` Toggle tool output view",
  "- `Ctrl+T` Toggle todo view",
  "- `Shift+Tab` Toggle auto-approve mode",
  "",
  "### Special Features",
  "",
  "- `!<command>` Execute bash command directly",
  "- `@path/to/file/` Autocompletes file paths",
  "",
  "### Commands",
  "",
] as const;

export function formatAliases(aliases: Iterable<string>): string {
  return [...aliases]
    .sort()
    .map(alias => `\`${alias}\``)
    .join(", ");
}

export function renderHelpText(
  commands: Iterable<Command>,
  customCommands: Iterable<CustomCommand>
): string {
  const lines: string[] = [...HELP_PREAMBLE];

  for (const command of commands) {
    lines.push(`- ${formatAliases(command.aliases)}: ${command.description}`);
  }

  const custom = [...customCommands];
  if (custom.length) {
    lines.push("", "### Custom Commands", "");
    for (const command of custom) {
      lines.push(`- \`/${command.name}\`: ${command.description}`);
    }
  }

  return lines.join("\n");
}
