#!/usr/bin/env node
import { Command } from "commander";
import { LoggingService } from "./infrastructure/LoggingService.js";
import { loadShellConfig, parseCommandList } from "./lib/config.js";
import { ConfigError, describeError, formatSkipSummary } from "./lib/errors.js";
import { describeResolution, formatCommandListing, listCommandEntries } from "./lib/inspect.js";
import { CommandRegistry } from "./lib/registry.js";

interface GlobalOptions {
  config?: string;
  commandsDir?: string;
  exclude?: string[];
  quietSkips?: boolean;
  verbose?: boolean;
}

const program = new Command();
program
  .name("agent-commands")
  .description("Inspect the slash commands an agent shell session would resolve.")
  .version("0.1.0")
  .option("-c, --config <file>", "config file (YAML or JSON)")
  .option("-d, --commands-dir <dir>", "directory holding custom <name>.md commands")
  .option("-x, --exclude <keys>", "comma-separated built-in command keys to leave out", parseCommandList)
  .option("--quiet-skips", "do not warn about unreadable custom command files")
  .option("-v, --verbose", "log what the registry loaded");

async function createRegistry(): Promise<{ registry: CommandRegistry; logger: LoggingService }> {
  const opts = program.opts<GlobalOptions>();
  const logger = new LoggingService(Boolean(opts.verbose));
  const config = await loadShellConfig(opts.config);
  if (config.sourcePath) logger.log(`Using config ${config.sourcePath}`);

  const registry = new CommandRegistry({
    excludedCommands: opts.exclude ?? config.excludedCommands,
    commandsDir: opts.commandsDir ?? config.commandsDir,
    reportUnreadable: opts.quietSkips ? false : config.reportUnreadable,
    logger,
  });
  return { registry, logger };
}

program.command("help-text")
  .description("Print the in-session /help output")
  .action(async () => {
    const { registry } = await createRegistry();
    console.log(registry.getHelpText());
  });

program.command("resolve")
  .description("Show how a line of input resolves")
  .argument("<input...>", "text as typed in the shell, e.g. /config dark")
  .action(async (input: string[]) => {
    const { registry } = await createRegistry();
    for (const line of describeResolution(registry, input.join(" "))) {
      console.log(line);
    }
  });

program.command("list")
  .description("List built-in and custom commands")
  .option("--json", "print machine-readable output")
  .option("--skipped", "also list custom command files that were not registered")
  .action(async (options: { json?: boolean; skipped?: boolean }) => {
    const { registry, logger } = await createRegistry();
    if (options.json) {
      console.log(JSON.stringify(listCommandEntries(registry), null, 2));
      return;
    }
    console.log(formatCommandListing(registry));
    if (options.skipped) {
      const lines = formatSkipSummary(registry.skippedFiles, { includeExpected: true });
      if (lines.length) {
        logger.info("Not registered:");
        for (const line of lines) console.log(line);
      }
    }
  });

program.parseAsync().catch((error: unknown) => {
  const logger = new LoggingService();
  logger.error(describeError(error));
  if (error instanceof ConfigError) {
    logger.info("Pass --config <file> or set AGENT_SHELL_HOME to point at a valid config.");
  }
  process.exitCode = 1;
});
