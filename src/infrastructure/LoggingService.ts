import pc from "picocolors";

const PREFIX = "[agent-shell]";

export class LoggingService {
  verbose: boolean;

  constructor(verbose = false) {
    this.verbose = verbose;
  }

  log(message: string) {
    if (this.verbose) {
      // eslint-disable-next-line no-console
      console.log(`${PREFIX} ${message}`);
    }
  }

  info(message: string) {
    // eslint-disable-next-line no-console
    console.info(`${PREFIX} ${message}`);
  }

  warn(message: string) {
    // eslint-disable-next-line no-console
    console.warn(pc.yellow(`${PREFIX} ${message}`));
  }

  error(message: string) {
    // eslint-disable-next-line no-console
    console.error(pc.red(`${PREFIX} ${message}`));
  }
}
