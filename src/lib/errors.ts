import path from "node:path";
import pc from "picocolors";
import type { CustomCommandSkip } from "./customCommands.js";

export class ConfigError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(message);
    this.name = "ConfigError";
    this.filePath = filePath;
  }
}

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Lines describing custom command files that were not registered.
 * Files that were only shadowed or reserved are listed when `includeExpected` is set.
 */
export function formatSkipSummary(
  skipped: readonly CustomCommandSkip[],
  options: { includeExpected?: boolean; cwd?: string } = {}
): string[] {
  const { includeExpected = false, cwd = process.cwd() } = options;
  const lines: string[] = [];
  for (const skip of skipped) {
    if (skip.reason !== "unreadable" && !includeExpected) continue;
    const location = path.relative(cwd, skip.filePath) || skip.filePath;
    const label = skip.name ? `/${skip.name}` : "commands directory";
    switch (skip.reason) {
      case "unreadable":
        lines.push(pc.red(`  ✗ ${label} (${location}): ${skip.message ?? "unreadable"}`));
        break;
      case "shadowed":
        lines.push(pc.dim(`  · /${skip.name} (${location}): shadowed by a built-in command`));
        break;
      case "reserved":
        lines.push(pc.dim(`  · ${skip.name} (${location}): reserved name, ignored`));
        break;
    }
  }
  return lines;
}
