import type { LoggerService } from '@nestjs/common';
import { printError, printInfo, printWarning } from './banner';

/** Routes client logging through the CLI's print helpers. */
export class CliLogger implements LoggerService {
  constructor(private readonly verboseOutput = false) {}

  log(message: unknown): void {
    printInfo(String(message));
  }

  error(message: unknown): void {
    printError(String(message));
  }

  warn(message: unknown): void {
    printWarning(String(message));
  }

  debug(message: unknown): void {
    if (this.verboseOutput) {
      printInfo(String(message));
    }
  }

  verbose(message: unknown): void {
    if (this.verboseOutput) {
      printInfo(String(message));
    }
  }
}
