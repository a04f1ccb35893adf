export type CommandKey =
  | "clear"
  | "compact"
  | "config"
  | "exit"
  | "help"
  | "log"
  | "reload"
  | "status"
  | "terminal-setup";

/**
 * Tag the shell switches on to run a built-in command. Nothing here executes it.
 */
export type CommandHandler =
  | "clearHistory"
  | "compactHistory"
  | "exitApp"
  | "reloadConfig"
  | "setupTerminal"
  | "showConfig"
  | "showHelp"
  | "showLogPath"
  | "showStatus";

export interface Command {
  readonly key: CommandKey;
  readonly aliases: ReadonlySet<string>;
  readonly description: string;
  readonly handler: CommandHandler;
  /** The session ends once the handler succeeds. */
  readonly exits: boolean;
}

export const ARGUMENTS_PLACEHOLDER = "$ARGUMENTS";

const DESCRIPTION_PREVIEW_LENGTH = 50;

export interface CustomCommandProps {
  name: string;
  template: string;
  sourcePath?: string;
}

/**
 * A prompt template loaded from `<commands dir>/<name>.md`, invoked as `/<name>`.
 */
export class CustomCommand {
  readonly name: string;
  readonly template: string;
  readonly sourcePath: string;

  constructor(props: CustomCommandProps) {
    this.name = props.name;
    this.template = props.template;
    this.sourcePath = props.sourcePath ?? "";
  }

  get aliases(): ReadonlySet<string> {
    return new Set([`/${this.name}`]);
  }

  get description(): string {
    const firstLine = Array.from(this.template.split("\n")[0]).slice(0, DESCRIPTION_PREVIEW_LENGTH).join("");
    return firstLine ? `Custom: ${firstLine}...` : "Custom command";
  }

  render(args: string): string {
    return this.template.split(ARGUMENTS_PLACEHOLDER).join(args);
  }
}

export function isCustomCommand(command: Command | CustomCommand): command is CustomCommand {
  return command instanceof CustomCommand;
}
