import { CSVOutput } from '../../outputs/csv';
import { errorMessage } from '../../core/errors';
import { logger } from '../../utils/logger';

export function csvHeaderCommand(options: { csvDelimiter: string }): void {
  try {
    process.stdout.write(new CSVOutput(options.csvDelimiter, logger).header());
  } catch (error) {
    logger.error(`Failed to print CSV header: ${errorMessage(error)}`);
    process.exit(1);
  }
}
