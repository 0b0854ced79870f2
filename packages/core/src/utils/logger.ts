import { logInfo, logSuccess, logWarning } from './console';

/**
 * Thin facade over the console utilities that gates debug output on verbosity.
 * Everything goes to stderr; stdout stays free for machine-readable output.
 */
export class Logger {
  constructor(private readonly verbose: boolean = false) {}

  get isVerbose(): boolean {
    return this.verbose;
  }

  info(message: string): void {
    logInfo(message);
  }

  success(message: string): void {
    logSuccess(message);
  }

  warn(message: string): void {
    logWarning(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      logInfo(message);
    }
  }
}
