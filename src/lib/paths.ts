import os from "node:os";
import path from "node:path";

/**
 * Where the shell keeps its config and user-authored commands.
 */
export function resolveShellHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.AGENT_SHELL_HOME?.trim();
  if (override) return path.resolve(expandHome(override));
  return path.join(os.homedir(), ".agent-shell");
}

export function resolveCommandsDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.AGENT_SHELL_COMMANDS_DIR?.trim();
  if (override) return path.resolve(expandHome(override));
  return path.join(resolveShellHome(env), "commands");
}

export function resolveConfigFile(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveShellHome(env), "config.yaml");
}

export function expandHome(p: string) {
  if (!p) return p;
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}
