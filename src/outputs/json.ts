import { ReportOutput } from './base';
import { Report } from '../reporting/types';
import { Logger } from '../utils/logger';
import { errorMessage } from '../core/errors';

export class JSONOutput implements ReportOutput {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  writeReport(): string | null {
    return null;
  }

  finalize(reports: readonly Report[]): string | null {
    try {
      return `${JSON.stringify(reports)}\n`;
    } catch (error) {
      this.logger.error(`Error generating JSON report: ${errorMessage(error)}`);
      return null;
    }
  }
}
