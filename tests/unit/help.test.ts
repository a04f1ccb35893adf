import { describe, expect, it } from "vitest";
import { CommandRegistry } from "../../src/lib/registry.js";
import { MemoryFileSystem } from "../support/index.js";

const DIR = "/shell/commands";

function helpLines(files: Record<string, string> = {}, excludedCommands: string[] = []) {
  const fileSystem = new MemoryFileSystem().withDir(DIR);
  for (const [name, content] of Object.entries(files)) {
    fileSystem.withFile(`${DIR}/${name}`, content);
  }
  const registry = new CommandRegistry({ commandsDir: DIR, fileSystem, excludedCommands });
  return registry.getHelpText().split("\n");
}

function commandSection(lines: string[]) {
  const start = lines.indexOf("### Commands") + 2;
  const end = lines.indexOf("", start);
  return lines.slice(start, end === -1 ? undefined : end);
}

describe("help text", () => {
  it("opens with the keyboard shortcuts preamble", () => {
    const lines = helpLines();
    expect(lines.slice(0, 3)).toEqual(["### Keyboard Shortcuts", "", "- `Enter` Submit message"]);
    expect(lines).toContain("- `!<command>` Execute bash command directly");
    expect(lines).toContain("- `@path/to/file/` Autocompletes file paths");
  });

  it("lists one line per built-in in catalog order with sorted aliases", () => {
    expect(commandSection(helpLines())).toEqual([
      "- `/help`: Show help message",
      "- `/config`, `/model`, `/theme`: Edit config settings",
      "- `/reload`: Reload configuration from disk",
      "- `/clear`: Clear conversation history",
      "- `/log`: Show path to current interaction log file",
      "- `/compact`: Compact conversation history by summarizing",
      "- `/exit`: Exit the application",
      "- `/terminal-setup`: Configure Shift+Enter for newlines",
      "- `/status`: Display agent statistics",
    ]);
  });

  it("ends with the last built-in when there are no custom commands", () => {
    const lines = helpLines();
    expect(lines[lines.length - 1]).toBe("- `/status`: Display agent statistics");
    expect(lines).not.toContain("### Custom Commands");
  });

  it("omits excluded built-ins", () => {
    const section = commandSection(helpLines({}, ["exit", "log"]));
    expect(section).toHaveLength(7);
    expect(section).not.toContain("- `/exit`: Exit the application");
  });

  it("appends a custom commands section", () => {
    const lines = helpLines({ "review.md": "Review $ARGUMENTS please", "standup.md": "" });
    expect(lines.slice(-6)).toEqual([
      "- `/status`: Display agent statistics",
      "",
      "### Custom Commands",
      "",
      "- `/review`: Custom: Review $ARGUMENTS please...",
      "- `/standup`: Custom command",
    ]);
  });
});
