import type { Command, CommandKey } from "../domain/Command.js";

export class CommandAliasRegistry {
  private readonly aliases: Map<string, CommandKey>;

  constructor(commands: ReadonlyMap<CommandKey, Command>) {
    this.aliases = new Map();
    for (const [key, command] of commands) {
      for (const alias of command.aliases) {
        this.aliases.set(alias, key);
      }
    }
  }

  resolve(alias: string): CommandKey | undefined {
    return this.aliases.get(alias);
  }

  has(alias: string): boolean {
    return this.aliases.has(alias);
  }

  get size(): number {
    return this.aliases.size;
  }

  getAll(): Record<string, CommandKey> {
    return Object.fromEntries(this.aliases);
  }
}
